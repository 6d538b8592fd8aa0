export type LogLevel = 'info' | 'warn' | 'error';

export interface ILogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export type LogSink = (level: LogLevel, line: string) => void;

const LEVEL_TAGS: Record<LogLevel, string> = {
  info: 'INFO',
  warn: 'WARN',
  error: 'ERROR',
};

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case 'info': console.log(line); break;
    case 'warn': console.warn(line); break;
    case 'error': console.error(line); break;
  }
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export interface ConsoleLoggerOptions {
  tag?: string;
  sink?: LogSink;
  clock?: () => Date;
}

/**
 * Writes "<timestamp> <LEVEL> [tag ]message" lines to the console.
 */
export class ConsoleLogger implements ILogger {
  private readonly tag: string | undefined;
  private readonly sink: LogSink;
  private readonly clock: () => Date;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.tag = options.tag;
    this.sink = options.sink ?? consoleSink;
    this.clock = options.clock ?? (() => new Date());
  }

  public info(message: string): void {
    this.write('info', message);
  }

  public warn(message: string): void {
    this.write('warn', message);
  }

  public error(message: string, err?: unknown): void {
    if (err === undefined) {
      this.write('error', message);
      return;
    }
    const detail = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
    this.write('error', `${message} ${detail}`);
  }

  private write(level: LogLevel, message: string): void {
    const prefix = this.tag ? `${this.tag} ` : '';
    this.sink(level, `${formatTimestamp(this.clock())} ${LEVEL_TAGS[level]} ${prefix}${message}`);
  }
}

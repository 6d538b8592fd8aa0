import { DEFAULT_CONFIG } from '../common/Config';
import { ConsoleLogger } from '../common/Logger';
import type { ILogger } from '../common/Logger';

export interface ReporterOptions {
  logger?: ILogger;
  maxLines?: number;
  clock?: () => number;
}

export interface ReportWriter {
  write(chunk: string): unknown;
}

/**
 * Logging plus an abbreviated written report.
 *
 *   const rep = new Reporter('Inventory', 'nightly comparison');
 *   rep.warn('missing on right: item-7');   // logged as "Inventory: missing on right: item-7"
 *   rep.write(process.stdout);
 *
 *   Inventory: nightly comparison
 *   :::::::::::::::::::::::::::::
 *   missing on right: item-7
 *
 * The subtitle only appears in the written report. Reports longer than
 * maxLines keep their first and last lines and drop the middle.
 */
export class Reporter {
  public readonly title: string;
  private readonly subtitle: string | undefined;
  private readonly logger: ILogger;
  private readonly maxLines: number;
  private readonly clock: () => number;
  private readonly startedAt: number;
  private finishedAt: number | null = null;
  private readonly head: string[] = [];
  private readonly tail: string[] = [];
  private tailNext: number = 0;
  private totalLines: number = 0;
  private messages: number = 0;

  constructor(title: string, subtitle?: string, options: ReporterOptions = {}) {
    this.title = title;
    this.subtitle = subtitle;
    this.logger = options.logger ?? new ConsoleLogger();
    this.maxLines = options.maxLines ?? DEFAULT_CONFIG.reportMaxLines;
    this.clock = options.clock ?? Date.now;
    this.startedAt = this.clock();

    if (!Number.isInteger(this.maxLines) || this.maxLines < 1) {
      throw new RangeError(`Reporter: maxLines must be an integer >= 1, got ${this.maxLines}`);
    }
  }

  public static note(message: string, out: ReportWriter, logger: ILogger = new ConsoleLogger()): void {
    logger.info(message);
    out.write(`${message}\n`);
  }

  public get messageCount(): number {
    return this.messages;
  }

  public get lineCount(): number {
    return this.totalLines;
  }

  /**
   * Lines actually held for the written report; never more than maxLines.
   */
  public get retainedLineCount(): number {
    return this.head.length + this.tail.length;
  }

  public info(...lines: string[]): void {
    this.record(lines, line => this.logger.info(line));
  }

  public warn(...lines: string[]): void {
    this.record(lines, line => this.logger.warn(line));
  }

  public error(...lines: string[]): void {
    this.record(lines, line => this.logger.error(line));
  }

  /**
   * Stamp the elapsed time since construction onto the report heading.
   */
  public done(): void {
    this.finishedAt = this.clock();
  }

  public isInteresting(): boolean {
    return this.messages > 0;
  }

  public heading(): string {
    let heading = this.title;
    if (this.subtitle) {
      heading += `: ${this.subtitle}`;
    }
    if (this.finishedAt !== null) {
      heading += ` (${((this.finishedAt - this.startedAt) / 1000).toFixed(2)} seconds)`;
    }
    return heading;
  }

  public *lines(): IterableIterator<string> {
    const heading = this.heading();
    yield heading;
    yield heading.replace(/./g, ':');

    const total = this.totalLines;
    const tail = [...this.tail.slice(this.tailNext), ...this.tail.slice(0, this.tailNext)];

    if (total > this.maxLines) {
      yield `Note: ${total - this.maxLines} of ${total} lines were discarded - see the system log for the complete report.`;
      yield* this.head;
      yield ' ...';
      yield* tail;
    } else {
      yield* this.head;
      yield* tail;
    }

    yield '';
  }

  public write(out: ReportWriter): void {
    for (const line of this.lines()) {
      out.write(`${line}\n`);
    }
  }

  private record(lines: string[], log: (line: string) => void): void {
    this.messages++;

    if (lines.length === 0) {
      this.keep('');
      return;
    }

    for (const line of lines) {
      if (line.length > 0) {
        log(`${this.title}: ${line}`);
      }
      this.keep(line);
    }
  }

  // First ceil(maxLines/2) lines stay put; the last floor(maxLines/2) rotate
  // through a ring.
  private keep(line: string): void {
    this.totalLines++;

    if (this.head.length < Math.ceil(this.maxLines / 2)) {
      this.head.push(line);
      return;
    }

    const bottom = Math.floor(this.maxLines / 2);
    if (bottom === 0) {
      return;
    }

    if (this.tail.length < bottom) {
      this.tail.push(line);
    } else {
      this.tail[this.tailNext] = line;
      this.tailNext = (this.tailNext + 1) % bottom;
    }
  }
}

import { ConfigError } from '../common/Errors';
import type { ReconcileConfig } from '../common/Config';

export type Command = 'diff' | 'report' | 'merge' | 'fold' | 'unique' | 'serve';

const COMMAND_ARITY: Record<Command, { min: number; max: number }> = {
  diff: { min: 2, max: 2 },
  report: { min: 2, max: 2 },
  merge: { min: 1, max: Infinity },
  fold: { min: 1, max: 1 },
  unique: { min: 1, max: 1 },
  serve: { min: 0, max: 0 },
};

const VALUE_FLAGS = ['--http-port', '--max-lines', '--config', '--sections'];

export interface CLIOptions {
  readonly command: Command | null;
  readonly files: string[];
  readonly help: boolean;
  readonly configPath: string | undefined;
  readonly sections: string[];
  readonly overrides: Partial<ReconcileConfig>;
}

function isCommand(value: string): value is Command {
  return Object.prototype.hasOwnProperty.call(COMMAND_ARITY, value);
}

export class CLIParser {
  private readonly args: string[];

  constructor(args: string[] = process.argv.slice(2)) {
    this.args = args;
  }

  public parse(): CLIOptions {
    const positionals = this.getPositionals();
    const [first, ...files] = positionals;

    if (this.hasFlag('--help') || this.hasFlag('-h') || first === undefined) {
      return { command: null, files: [], help: true, configPath: undefined, sections: [], overrides: {} };
    }

    if (!isCommand(first)) {
      throw new ConfigError(`Unknown command: ${first}. Must be one of ${Object.keys(COMMAND_ARITY).join(', ')}`);
    }

    const arity = COMMAND_ARITY[first];
    if (files.length < arity.min || files.length > arity.max) {
      throw new ConfigError(`${first} expects ${CLIParser.describeArity(arity)}, got ${files.length}`);
    }

    const configPath = this.getString('--config');
    const sectionList = this.getString('--sections');
    const sections = sectionList ? sectionList.split(',').map(s => s.trim()).filter(s => s.length > 0) : [];

    if (configPath && sections.length === 0) {
      throw new ConfigError('--config requires --sections naming at least one section');
    }
    if (!configPath && sectionList !== undefined) {
      throw new ConfigError('--sections requires --config');
    }

    const httpPort = this.getNumber('--http-port');
    const reportMaxLines = this.getNumber('--max-lines');

    const overrides: Partial<ReconcileConfig> = {
      ...(httpPort !== undefined && { httpPort }),
      ...(reportMaxLines !== undefined && { reportMaxLines }),
      ...(this.hasFlag('--unique') && { uniqueInputs: true }),
    };

    return { command: first, files, help: false, configPath, sections, overrides };
  }

  private static describeArity(arity: { min: number; max: number }): string {
    if (arity.min === arity.max) {
      return `${arity.min} file${arity.min === 1 ? '' : 's'}`;
    }
    return `at least ${arity.min} file${arity.min === 1 ? '' : 's'}`;
  }

  private getPositionals(): string[] {
    const positionals: string[] = [];

    for (let i = 0; i < this.args.length; i++) {
      const arg = this.args[i];
      if (arg === undefined) {
        continue;
      }
      if (arg.startsWith('-')) {
        if (VALUE_FLAGS.includes(arg)) {
          i++;
        }
        continue;
      }
      positionals.push(arg);
    }

    return positionals;
  }

  private getString(flag: string): string | undefined {
    const prefixed = this.args.find(arg => arg.startsWith(`${flag}=`));
    if (prefixed !== undefined) {
      return prefixed.slice(flag.length + 1);
    }

    const flagIndex = this.args.indexOf(flag);
    if (flagIndex === -1) {
      return undefined;
    }

    const value = this.args[flagIndex + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new ConfigError(`${flag} requires a value`);
    }
    return value;
  }

  private getNumber(flag: string): number | undefined {
    const str = this.getString(flag);
    if (!str) return undefined;

    const num = parseInt(str, 10);
    if (isNaN(num)) {
      throw new ConfigError(`Invalid number for ${flag}: ${str}`);
    }
    return num;
  }

  private hasFlag(flag: string): boolean {
    return this.args.includes(flag);
  }

  public static printHelp(): void {
    console.log(`
Sorted stream toolkit

Usage: node dist/index.js <command> [options] [files...]

Input files hold one record per line: a key followed by whitespace
separated value fields, sorted by key.

Commands:
  diff LEFT RIGHT         Full outer join of two files (key, left, right; "-" when absent)
  report LEFT RIGHT       Reconcile two files and print a discrepancy report
  merge FILE...           k-way merge; one line per key with every value found
  fold FILE               Group adjacent records sharing a key
  unique FILE             Keep the first record for each key
  serve                   Start the HTTP API

Options:
  --help, -h              Show this help message
  --unique                De-duplicate keys before diff/report
  --http-port=PORT        HTTP server port (default: 3000)
  --max-lines=N           Longest written report before truncation (default: 2000)
  --config=PATH           JSON configuration file
  --sections=A,B          Sections of the configuration file to read, in order

Examples:
  node dist/index.js diff yesterday.txt today.txt
  node dist/index.js report --unique --max-lines=200 left.txt right.txt
  node dist/index.js serve --config=settings.json --sections=defaults,inventory
`);
  }
}

import { describe, it, expect } from 'vitest';
import { CLIParser } from '../src/cli/CLIParser';
import { ConfigError } from '../src/common/Errors';

describe('CLIParser', () => {
  it('should ask for help when no command is given', () => {
    expect(new CLIParser([]).parse()).toEqual({
      command: null,
      files: [],
      help: true,
      configPath: undefined,
      sections: [],
      overrides: {},
    });
  });

  it('should honour -h alongside a command', () => {
    expect(new CLIParser(['diff', 'a', 'b', '-h']).parse().help).toBe(true);
  });

  it('should parse a command and its files', () => {
    const options = new CLIParser(['diff', 'left.txt', 'right.txt']).parse();

    expect(options.command).toBe('diff');
    expect(options.files).toEqual(['left.txt', 'right.txt']);
    expect(options.overrides).toEqual({});
    expect(options.help).toBe(false);
  });

  it('should skip flag values when collecting files', () => {
    const options = new CLIParser(['--max-lines', '5', 'report', '--unique', 'a.txt', 'b.txt']).parse();

    expect(options.command).toBe('report');
    expect(options.files).toEqual(['a.txt', 'b.txt']);
    expect(options.overrides).toEqual({ reportMaxLines: 5, uniqueInputs: true });
  });

  it('should read --flag=value options', () => {
    const options = new CLIParser([
      'serve',
      '--http-port=8080',
      '--config=settings.json',
      '--sections=defaults, inventory',
    ]).parse();

    expect(options.overrides).toEqual({ httpPort: 8080 });
    expect(options.configPath).toBe('settings.json');
    expect(options.sections).toEqual(['defaults', 'inventory']);
  });

  it('should accept any number of files for merge', () => {
    expect(new CLIParser(['merge', 'a', 'b', 'c', 'd']).parse().files).toEqual(['a', 'b', 'c', 'd']);
  });

  it('should reject an unknown command', () => {
    expect(() => new CLIParser(['frobnicate']).parse()).toThrow(ConfigError);
    expect(() => new CLIParser(['frobnicate']).parse()).toThrow(/Unknown command: frobnicate/);
  });

  it('should check how many files a command takes', () => {
    expect(() => new CLIParser(['diff', 'a']).parse()).toThrow('diff expects 2 files, got 1');
    expect(() => new CLIParser(['merge']).parse()).toThrow('merge expects at least 1 file, got 0');
    expect(() => new CLIParser(['serve', 'x']).parse()).toThrow('serve expects 0 files, got 1');
  });

  it('should require sections alongside a config file', () => {
    expect(() => new CLIParser(['serve', '--config=settings.json']).parse()).toThrow(
      '--config requires --sections naming at least one section'
    );
  });

  it('should not take another flag as an option value', () => {
    expect(() => new CLIParser(['diff', 'a', 'b', '--config', '--unique']).parse()).toThrow(
      '--config requires a value'
    );
  });

  it('should reject a value flag given last without a value', () => {
    expect(() => new CLIParser(['serve', '--max-lines']).parse()).toThrow('--max-lines requires a value');
  });

  it('should reject sections without a config file', () => {
    expect(() => new CLIParser(['serve', '--sections=inventory']).parse()).toThrow('--sections requires --config');
  });

  it('should reject a non-numeric number option', () => {
    expect(() => new CLIParser(['serve', '--max-lines=abc']).parse()).toThrow('Invalid number for --max-lines: abc');
  });
});

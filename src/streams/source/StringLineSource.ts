import { RewindError, StreamUsageError } from '../../common/Errors';
import type { ILineSource } from './ILineSource';

export class StringLineSource implements ILineSource {
  private readonly lines: string[];
  private readonly label: string;
  private index: number = 0;
  private closed: boolean = false;

  constructor(text: string, label: string = 'string') {
    this.lines = text.split(/\r?\n/);
    // "a\nb\n" holds two lines, not three
    if (this.lines[this.lines.length - 1] === '') {
      this.lines.pop();
    }
    this.label = label;
  }

  public readLine(): string | null {
    this.ensureOpen();
    if (this.index >= this.lines.length) {
      return null;
    }
    return this.lines[this.index++] ?? null;
  }

  public isExhausted(): boolean {
    return this.index >= this.lines.length;
  }

  public rewind(): void {
    if (this.closed) {
      throw new RewindError(this.describe());
    }
    this.index = 0;
  }

  public close(): void {
    this.closed = true;
  }

  public isClosed(): boolean {
    return this.closed;
  }

  public describe(): string {
    return `StringLineSource(${this.label})`;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new StreamUsageError(`${this.describe()}: read after close`);
    }
  }
}

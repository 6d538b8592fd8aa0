import { RewindError } from '../common/Errors';
import { SortedStream } from './SortedStream';
import type { ILineSource } from './source/ILineSource';
import { fieldValueFrom } from './StreamTypes';
import type { StreamRecord, FieldValue } from './StreamTypes';

const FIELD_SEPARATOR = /\s+/;

/**
 * Whitespace-delimited records, one per line: the first field is the key,
 * the rest make up the value. Every line should carry the same number of
 * fields; skew is passed through untouched.
 */
export class TextRecordStream extends SortedStream<string, FieldValue> {
  private readonly source: ILineSource;

  constructor(source: ILineSource) {
    super();
    this.source = source;
  }

  public static parseLine(line: string): StreamRecord<string, FieldValue> | null {
    const trimmed = line.trim();
    if (trimmed.length === 0) {
      return null;
    }
    const [head, ...tail] = trimmed.split(FIELD_SEPARATOR);
    if (head === undefined) {
      return null;
    }
    return { key: head, value: fieldValueFrom(tail) };
  }

  protected read(): StreamRecord<string, FieldValue> | null {
    const line = this.source.readLine();
    if (line === null) {
      return null;
    }
    return TextRecordStream.parseLine(line);
  }

  protected isSourceExhausted(): boolean {
    return this.source.isExhausted();
  }

  protected rewindSource(): void {
    if (this.source.isClosed()) {
      throw new RewindError(this.source.describe());
    }
    this.source.rewind();
  }

  public toString(): string {
    return `TextRecordStream from ${this.source.describe()}`;
  }
}

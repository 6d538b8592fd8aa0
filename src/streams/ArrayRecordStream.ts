import { SortedStream } from './SortedStream';
import type { StreamKey, StreamRecord } from './StreamTypes';

/**
 * Stream over records already held in memory. The array must be sorted by key.
 */
export class ArrayRecordStream<K extends StreamKey, V> extends SortedStream<K, V> {
  private readonly entries: ReadonlyArray<StreamRecord<K, V>>;
  private index: number = 0;

  constructor(entries: ReadonlyArray<StreamRecord<K, V>>) {
    super();
    this.entries = entries;
  }

  public static fromPairs<K extends StreamKey, V>(pairs: ReadonlyArray<readonly [K, V]>): ArrayRecordStream<K, V> {
    return new ArrayRecordStream(pairs.map(([key, value]) => ({ key, value })));
  }

  protected read(): StreamRecord<K, V> | null {
    if (this.index >= this.entries.length) {
      return null;
    }
    return this.entries[this.index++] ?? null;
  }

  protected isSourceExhausted(): boolean {
    return this.index >= this.entries.length;
  }

  protected rewindSource(): void {
    this.index = 0;
  }

  public toString(): string {
    return `ArrayRecordStream of ${this.entries.length} records`;
  }
}

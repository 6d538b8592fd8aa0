import { SortedStream } from './SortedStream';
import type { ISortedStream } from './ISortedStream';
import type { StreamKey, StreamRecord } from './StreamTypes';

/**
 * Groups adjacent records sharing a key into one record whose value is the
 * array of their values, in input order. Singleton groups still get an array.
 */
export class FoldedStream<K extends StreamKey, V> extends SortedStream<K, V[]> {
  private readonly inner: ISortedStream<K, V>;

  constructor(inner: ISortedStream<K, V>) {
    super();
    this.inner = inner;
  }

  protected read(): StreamRecord<K, V[]> | null {
    const upcoming = this.inner.pull();
    if (upcoming === null) {
      return null;
    }

    const values: V[] = [upcoming.value];

    for (;;) {
      const next = this.inner.pull();

      if (next === null) {
        if (this.inner.atEnd()) {
          return { key: upcoming.key, value: values };
        }
        continue;
      }

      if (next.key === upcoming.key) {
        values.push(next.value);
      } else {
        this.inner.pushback();
        return { key: upcoming.key, value: values };
      }
    }
  }

  protected isSourceExhausted(): boolean {
    return this.inner.atEnd();
  }

  protected rewindSource(): void {
    this.inner.rewind();
  }

  public toString(): string {
    return `FoldedStream folding ${String(this.inner)}`;
  }
}

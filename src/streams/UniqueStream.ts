import { SortedStream } from './SortedStream';
import type { ISortedStream } from './ISortedStream';
import type { StreamKey, StreamRecord } from './StreamTypes';

/**
 * Drops repeated keys, keeping the first record seen for each.
 */
export class UniqueStream<K extends StreamKey, V> extends SortedStream<K, V> {
  private readonly inner: ISortedStream<K, V>;

  constructor(inner: ISortedStream<K, V>) {
    super();
    this.inner = inner;
  }

  protected read(): StreamRecord<K, V> | null {
    const upcoming = this.inner.pull();
    if (upcoming === null) {
      return null;
    }

    for (;;) {
      const next = this.inner.pull();

      if (next === null) {
        if (this.inner.atEnd()) {
          return upcoming;
        }
        continue;
      }

      if (next.key !== upcoming.key) {
        this.inner.pushback();
        return upcoming;
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
    return `UniqueStream wrapping ${String(this.inner)}`;
  }
}

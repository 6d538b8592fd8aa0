import type { ComparisonStream } from './ComparisonStream';
import type {
  StreamKey,
  StreamRecord,
  StreamFilter,
  RecordVisitor,
} from './StreamTypes';

/**
 * A sequence of key/value records in non-decreasing key order.
 *
 * Lifecycle:
 * 1. Build the stream over its source (or over other streams)
 * 2. Drive it with pull()/pushback(), or hand it to filteredIterate()
 * 3. rewind() to walk it again, if the source allows
 */
export interface ISortedStream<K extends StreamKey, V> {
  readonly filters: ReadonlyArray<StreamFilter<K, V>>;

  /**
   * Next raw record, bypassing filters. Returns null at end of stream.
   */
  pull(): StreamRecord<K, V> | null;

  /**
   * Re-deliver the last pulled record on the next pull().
   * Only one level is supported; a second pushback throws PushbackError.
   */
  pushback(): void;

  isPushbackPending(): boolean;

  atEnd(): boolean;

  rewind(): this;

  addFilter(filter: StreamFilter<K, V>): this;

  filteredIterate(visit: RecordVisitor<K, V>): void;

  iterate(): IterableIterator<StreamRecord<K, V>>;

  /**
   * Pair this stream (left) with other (right) in a ComparisonStream.
   */
  diffAgainst<R>(other: ISortedStream<K, R>): ComparisonStream<K, V, R>;
}

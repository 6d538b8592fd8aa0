import { StreamUsageError } from '../common/Errors';
import { SortedStream } from './SortedStream';
import type { ISortedStream } from './ISortedStream';
import { arrayCollector } from './StreamTypes';
import type { StreamKey, StreamRecord, ValueCollector } from './StreamTypes';

interface ScorecardEntry<K extends StreamKey, V> {
  readonly stream: ISortedStream<K, V>;
  readonly record: StreamRecord<K, V>;
}

/**
 * k-way merge of sorted streams.
 *
 * Each read pulls one record from every live input, emits the smallest key
 * with all values found for it (in input order), and pushes the rest back
 * onto their own streams. O(k) per output record; at most one record per
 * input is held back between reads.
 */
export class MultiStream<K extends StreamKey, V, C> extends SortedStream<K, C> {
  private readonly inputs: ReadonlyArray<ISortedStream<K, V>>;
  private readonly collector: ValueCollector<V, C>;

  constructor(streams: ReadonlyArray<ISortedStream<K, V>>, collector: ValueCollector<V, C>) {
    super();
    if (streams.length === 0) {
      throw new StreamUsageError('MultiStream: at least one stream is required');
    }
    this.inputs = [...streams];
    this.collector = collector;
  }

  /**
   * Merge into plain arrays of values.
   */
  public static merge<K extends StreamKey, V>(...streams: ISortedStream<K, V>[]): MultiStream<K, V, V[]> {
    return new MultiStream(streams, arrayCollector<V>());
  }

  public get streams(): ReadonlyArray<ISortedStream<K, V>> {
    return this.inputs;
  }

  protected read(): StreamRecord<K, C> | null {
    const scorecard: ScorecardEntry<K, V>[] = [];
    let blank = false;

    for (const stream of this.inputs) {
      const record = stream.pull();
      if (record !== null) {
        scorecard.push({ stream, record });
      } else if (!stream.atEnd()) {
        blank = true;
      }
    }

    // An input still holding records gave back a blank; retry next read so
    // its upcoming key takes part in choosing the minimum.
    if (blank) {
      for (const { stream } of scorecard) {
        stream.pushback();
      }
      return null;
    }

    const first = scorecard[0];
    if (first === undefined) {
      return null;
    }

    let minKey = first.record.key;
    for (const { record } of scorecard) {
      if (record.key < minKey) {
        minKey = record.key;
      }
    }

    const values = this.collector.create();

    for (const { stream, record } of scorecard) {
      if (record.key === minKey) {
        this.collector.append(values, record.value);
      } else {
        stream.pushback();
      }
    }

    return { key: minKey, value: values };
  }

  protected isSourceExhausted(): boolean {
    return this.inputs.every(stream => stream.atEnd());
  }

  protected rewindSource(): void {
    for (const stream of this.inputs) {
      stream.rewind();
    }
  }

  public toString(): string {
    return `MultiStream wrapping ${this.inputs.map(stream => String(stream)).join(', ')}`;
  }
}

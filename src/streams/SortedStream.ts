import { PushbackError } from '../common/Errors';
import type { ISortedStream } from './ISortedStream';
import { ComparisonStream } from './ComparisonStream';
import type {
  StreamKey,
  StreamRecord,
  StreamFilter,
  RecordVisitor,
} from './StreamTypes';

interface PushbackSlot<K extends StreamKey, V> {
  last: StreamRecord<K, V> | null;
  hasLast: boolean;
  pending: boolean;
}

/**
 * Pull, pushback and filtered iteration shared by every stream.
 *
 * Subclasses provide read(), isSourceExhausted() and rewindSource();
 * atEnd() here folds in the pending pushback so subclasses never have to.
 */
export abstract class SortedStream<K extends StreamKey, V> implements ISortedStream<K, V> {
  private readonly filterList: StreamFilter<K, V>[] = [];
  private slot: PushbackSlot<K, V> = { last: null, hasLast: false, pending: false };

  public get filters(): ReadonlyArray<StreamFilter<K, V>> {
    return this.filterList;
  }

  protected abstract read(): StreamRecord<K, V> | null;

  protected abstract isSourceExhausted(): boolean;

  protected abstract rewindSource(): void;

  public pull(): StreamRecord<K, V> | null {
    if (this.slot.pending) {
      this.slot.pending = false;
      return this.slot.last;
    }

    if (this.atEnd()) {
      return null;
    }

    const record = this.read();
    this.slot.last = record;
    this.slot.hasLast = true;
    return record;
  }

  public pushback(): void {
    if (this.slot.pending) {
      throw new PushbackError(this.toString(), 'cannot push back twice in a row');
    }
    if (!this.slot.hasLast) {
      throw new PushbackError(this.toString(), 'nothing has been pulled yet');
    }
    this.slot.pending = true;
  }

  public isPushbackPending(): boolean {
    return this.slot.pending;
  }

  public atEnd(): boolean {
    return !this.slot.pending && this.isSourceExhausted();
  }

  public rewind(): this {
    this.rewindSource();
    this.slot = { last: null, hasLast: false, pending: false };
    return this;
  }

  public addFilter(filter: StreamFilter<K, V>): this {
    this.filterList.push(filter);
    return this;
  }

  public *iterate(): IterableIterator<StreamRecord<K, V>> {
    while (!this.atEnd()) {
      const record = this.pull();
      if (this.passesFilters(record)) {
        yield record;
      }
    }
  }

  public filteredIterate(visit: RecordVisitor<K, V>): void {
    for (const record of this.iterate()) {
      visit(record.key, record.value);
    }
  }

  public diffAgainst<R>(other: ISortedStream<K, R>): ComparisonStream<K, V, R> {
    return new ComparisonStream(this, other);
  }

  public toString(): string {
    return `${this.constructor.name}`;
  }

  private passesFilters(record: StreamRecord<K, V> | null): record is StreamRecord<K, V> {
    if (record === null) {
      return false;
    }
    return this.filterList.every(filter => filter(record.key, record.value));
  }
}

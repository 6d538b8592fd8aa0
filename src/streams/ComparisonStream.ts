import type { ISortedStream } from './ISortedStream';
import type { StreamKey, ComparisonRow, RowVisitor } from './StreamTypes';

/**
 * Full outer join of two sorted streams.
 *
 *   key on both sides  - { key, left, right }
 *   key only on left   - { key, left, right: null }
 *   key only on right  - { key, left: null, right }
 *
 * Both inputs must carry unique, ascending keys; wrap them in UniqueStream
 * or FoldedStream first when they may not. Duplicate keys interleave in an
 * unspecified order but the walk still terminates.
 */
export class ComparisonStream<K extends StreamKey, L, R> {
  private readonly left: ISortedStream<K, L>;
  private readonly right: ISortedStream<K, R>;

  constructor(left: ISortedStream<K, L>, right: ISortedStream<K, R>) {
    this.left = left;
    this.right = right;
  }

  public get streams(): readonly [ISortedStream<K, L>, ISortedStream<K, R>] {
    return [this.left, this.right];
  }

  public atEnd(): boolean {
    return this.left.atEnd() && this.right.atEnd();
  }

  public rewind(): this {
    this.left.rewind();
    this.right.rewind();
    return this;
  }

  /**
   * Next row, or null once both sides are exhausted.
   */
  public get(): ComparisonRow<K, L, R> | null {
    while (!this.atEnd()) {
      const row = this.step();
      if (row !== null) {
        return row;
      }
    }
    return null;
  }

  // One pull from each side. Null when a side handed back an end marker
  // (a blank line) without being at end; the other side's record is pushed
  // back so the next step sees it again.
  private step(): ComparisonRow<K, L, R> | null {
    const l = this.left.pull();
    const r = this.right.pull();

    if (r === null) {
      if (l === null) {
        return null;
      }
      if (!this.right.atEnd()) {
        this.left.pushback();
        return null;
      }
      return { key: l.key, left: l.value, right: null };
    }

    if (l === null) {
      if (!this.left.atEnd()) {
        this.right.pushback();
        return null;
      }
      return { key: r.key, left: null, right: r.value };
    }

    if (l.key < r.key) {
      this.right.pushback();
      return { key: l.key, left: l.value, right: null };
    }

    if (l.key > r.key) {
      this.left.pushback();
      return { key: r.key, left: null, right: r.value };
    }

    return { key: l.key, left: l.value, right: r.value };
  }

  public *iterate(): IterableIterator<ComparisonRow<K, L, R>> {
    for (let row = this.get(); row !== null; row = this.get()) {
      yield row;
    }
  }

  public each(visit: RowVisitor<K, L, R>): void {
    for (const row of this.iterate()) {
      visit(row);
    }
  }

  public toString(): string {
    return `ComparisonStream comparing ${String(this.left)} with ${String(this.right)}`;
  }
}

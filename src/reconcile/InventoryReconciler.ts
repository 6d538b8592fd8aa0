import { UniqueStream } from '../streams/UniqueStream';
import type { ISortedStream } from '../streams/ISortedStream';
import type { FieldValue } from '../streams/StreamTypes';
import type { Reporter } from '../report/Reporter';
import { formatFields, sameFields } from '../report/Format';

export interface ReconcileOptions {
  unique?: boolean;
}

export interface ReconcileSummary {
  readonly matching: number;
  readonly differing: number;
  readonly leftOnly: number;
  readonly rightOnly: number;
}

type InventoryStream = ISortedStream<string, FieldValue>;

/**
 * Walks two sorted inventories side by side and reports every key that is
 * missing from one side or carries different fields on each.
 */
export class InventoryReconciler {
  private readonly reporter: Reporter;

  constructor(reporter: Reporter) {
    this.reporter = reporter;
  }

  public compare(left: InventoryStream, right: InventoryStream, options: ReconcileOptions = {}): ReconcileSummary {
    const l: InventoryStream = options.unique ? new UniqueStream(left) : left;
    const r: InventoryStream = options.unique ? new UniqueStream(right) : right;

    let matching = 0;
    let differing = 0;
    let leftOnly = 0;
    let rightOnly = 0;

    l.diffAgainst(r).each(({ key, left: lv, right: rv }) => {
      if (rv === null) {
        if (lv !== null) {
          leftOnly++;
          this.reporter.warn(`only in left: ${key} ${formatFields(lv)}`.trimEnd());
        }
        return;
      }

      if (lv === null) {
        rightOnly++;
        this.reporter.warn(`only in right: ${key} ${formatFields(rv)}`.trimEnd());
        return;
      }

      if (sameFields(lv, rv)) {
        matching++;
      } else {
        differing++;
        this.reporter.warn(`differs: ${key} left=[${formatFields(lv)}] right=[${formatFields(rv)}]`);
      }
    });

    const summary = { matching, differing, leftOnly, rightOnly };
    this.reporter.info(
      `${matching} matching, ${differing} differing, ${leftOnly} only in left, ${rightOnly} only in right`
    );
    this.reporter.done();
    return summary;
  }
}

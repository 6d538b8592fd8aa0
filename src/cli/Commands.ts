import type { ReconcileConfig } from '../common/Config';
import type { ILogger } from '../common/Logger';
import { TextRecordStream } from '../streams/TextRecordStream';
import { UniqueStream } from '../streams/UniqueStream';
import { FoldedStream } from '../streams/FoldedStream';
import { MultiStream } from '../streams/MultiStream';
import { withFileSource, withFileSources } from '../streams/source/FileLineSource';
import type { ISortedStream } from '../streams/ISortedStream';
import type { FieldValue } from '../streams/StreamTypes';
import { Reporter } from '../report/Reporter';
import type { ReportWriter } from '../report/Reporter';
import { formatRow, formatRecord, formatGroup } from '../report/Format';
import { InventoryReconciler } from '../reconcile/InventoryReconciler';
import type { ReconcileSummary } from '../reconcile/InventoryReconciler';

export interface CommandContext {
  readonly config: ReconcileConfig;
  readonly out: ReportWriter;
  readonly logger: ILogger;
}

function maybeUnique(stream: ISortedStream<string, FieldValue>, unique: boolean): ISortedStream<string, FieldValue> {
  return unique ? new UniqueStream(stream) : stream;
}

function bothSides<T>(sources: readonly T[]): [T, T] {
  const [left, right] = sources;
  if (left === undefined || right === undefined) {
    throw new Error('Expected exactly two inputs');
  }
  return [left, right];
}

export function runDiff(leftPath: string, rightPath: string, ctx: CommandContext): number {
  return withFileSources([leftPath, rightPath], sources => {
    const [leftSource, rightSource] = bothSides(sources);
    const left = maybeUnique(new TextRecordStream(leftSource), ctx.config.uniqueInputs);
    const right = maybeUnique(new TextRecordStream(rightSource), ctx.config.uniqueInputs);

    let rows = 0;
    left.diffAgainst(right).each(row => {
      ctx.out.write(`${formatRow(row)}\n`);
      rows++;
    });
    return rows;
  });
}

export function runReport(leftPath: string, rightPath: string, ctx: CommandContext): ReconcileSummary {
  return withFileSources([leftPath, rightPath], sources => {
    const [leftSource, rightSource] = bothSides(sources);
    const reporter = new Reporter('Reconcile', `${leftPath} vs ${rightPath}`, {
      logger: ctx.logger,
      maxLines: ctx.config.reportMaxLines,
    });

    const summary = new InventoryReconciler(reporter).compare(
      new TextRecordStream(leftSource),
      new TextRecordStream(rightSource),
      { unique: ctx.config.uniqueInputs }
    );
    reporter.write(ctx.out);
    return summary;
  });
}

export function runMerge(paths: readonly string[], ctx: CommandContext): number {
  return withFileSources(paths, sources => {
    const merged = MultiStream.merge(...sources.map(source => new TextRecordStream(source)));
    let records = 0;
    merged.filteredIterate((key, value) => {
      ctx.out.write(`${formatGroup({ key, value })}\n`);
      records++;
    });
    return records;
  });
}

export function runFold(path: string, ctx: CommandContext): number {
  return withFileSource(path, source => {
    let records = 0;
    new FoldedStream(new TextRecordStream(source)).filteredIterate((key, value) => {
      ctx.out.write(`${formatGroup({ key, value })}\n`);
      records++;
    });
    return records;
  });
}

export function runUnique(path: string, ctx: CommandContext): number {
  return withFileSource(path, source => {
    let records = 0;
    new UniqueStream(new TextRecordStream(source)).filteredIterate((key, value) => {
      ctx.out.write(`${formatRecord({ key, value })}\n`);
      records++;
    });
    return records;
  });
}

import { fieldsOf } from '../streams/StreamTypes';
import type { ComparisonRow, FieldValue, StreamRecord } from '../streams/StreamTypes';

export const ABSENT_MARKER = '-';

export function formatFields(value: FieldValue): string {
  return fieldsOf(value).join(' ');
}

export function sameFields(a: FieldValue, b: FieldValue): boolean {
  const left = fieldsOf(a);
  const right = fieldsOf(b);
  return left.length === right.length && left.every((field, i) => field === right[i]);
}

/**
 * key<TAB>left<TAB>right, with "-" standing in for an absent side.
 */
export function formatRow(row: ComparisonRow<string, FieldValue, FieldValue>): string {
  const left = row.left === null ? ABSENT_MARKER : formatFields(row.left);
  const right = row.right === null ? ABSENT_MARKER : formatFields(row.right);
  return `${row.key}\t${left}\t${right}`;
}

export function formatRecord(record: StreamRecord<string, FieldValue>): string {
  const fields = formatFields(record.value);
  return fields.length > 0 ? `${record.key}\t${fields}` : record.key;
}

/**
 * key<TAB>value<TAB>value... for folded or merged records.
 */
export function formatGroup(record: StreamRecord<string, Iterable<FieldValue>>): string {
  const parts = [record.key];
  for (const value of record.value) {
    parts.push(formatFields(value));
  }
  return parts.join('\t');
}

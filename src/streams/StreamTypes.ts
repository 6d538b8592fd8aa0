/**
 * Shared type definitions for sorted streams.
 */

export type StreamKey = string | number | bigint;

export interface StreamRecord<K extends StreamKey, V> {
  readonly key: K;
  readonly value: V;
}

export type StreamFilter<K extends StreamKey, V> = (key: K, value: V) => boolean;

export type RecordVisitor<K extends StreamKey, V> = (key: K, value: V) => void;

/**
 * Value carried by a text record: the fields following the key.
 */
export type FieldValue =
  | { readonly kind: 'empty' }
  | { readonly kind: 'scalar'; readonly value: string }
  | { readonly kind: 'sequence'; readonly values: readonly string[] };

export interface ComparisonRow<K extends StreamKey, L, R> {
  readonly key: K;
  readonly left: L | null;
  readonly right: R | null;
}

export type RowVisitor<K extends StreamKey, L, R> = (row: ComparisonRow<K, L, R>) => void;

/**
 * Builds the container a MultiStream gathers same-key values into.
 */
export interface ValueCollector<V, C> {
  create(): C;
  append(container: C, value: V): void;
}

export function arrayCollector<V>(): ValueCollector<V, V[]> {
  return {
    create: () => [],
    append: (container, value) => {
      container.push(value);
    },
  };
}

export function setCollector<V>(): ValueCollector<V, Set<V>> {
  return {
    create: () => new Set<V>(),
    append: (container, value) => {
      container.add(value);
    },
  };
}

export function fieldsOf(value: FieldValue): string[] {
  switch (value.kind) {
    case 'empty': return [];
    case 'scalar': return [value.value];
    case 'sequence': return [...value.values];
  }
}

export function fieldValueFrom(fields: readonly string[]): FieldValue {
  if (fields.length === 0) {
    return { kind: 'empty' };
  }
  if (fields.length === 1) {
    return { kind: 'scalar', value: fields[0] ?? '' };
  }
  return { kind: 'sequence', values: [...fields] };
}

export type {
  StreamKey,
  StreamRecord,
  StreamFilter,
  RecordVisitor,
  FieldValue,
  ComparisonRow,
  RowVisitor,
  ValueCollector,
} from './StreamTypes';

export {
  arrayCollector,
  setCollector,
  fieldsOf,
  fieldValueFrom,
} from './StreamTypes';

export type { ISortedStream } from './ISortedStream';
export type { ILineSource } from './source/ILineSource';

export { SortedStream } from './SortedStream';
export { TextRecordStream } from './TextRecordStream';
export { ArrayRecordStream } from './ArrayRecordStream';
export { UniqueStream } from './UniqueStream';
export { FoldedStream } from './FoldedStream';
export { MultiStream } from './MultiStream';
export { ComparisonStream } from './ComparisonStream';
export { StringLineSource } from './source/StringLineSource';
export {
  FileLineSource,
  DEFAULT_CHUNK_SIZE,
  withFileSource,
  withFileSources,
} from './source/FileLineSource';

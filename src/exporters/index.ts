// Humdrum exporters
export { serialize } from './humdrum';
export type { SerializeOptions } from './humdrum';
export { serializeCsv } from './csv';
export type { CsvOptions } from './csv';
export { serializeCompressed } from './humdrum-compressed';

// Spine structure dumps
export { formatSpineInfo, formatTrackInfo, formatDataTypeInfo } from './spine-info';

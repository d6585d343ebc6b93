// Humdrum importers
export { parse } from './humdrum';
export { parseCsv } from './csv';
export { parseCompressed, isCompressed, parseAuto } from './humdrum-compressed';

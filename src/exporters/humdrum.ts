import { getLineText } from '../line';
import type { HumdrumFile, HumdrumFormat } from '../types';
import { serializeCsv } from './csv';

export interface SerializeOptions {
  /** Output layout (default: 'tsv') */
  format?: HumdrumFormat;
  /** Field separator for CSV output (default: ',') */
  separator?: string;
  /** Rebuild each TSV line from its tokens instead of the stored line text (default: true); CSV output always uses the tokens */
  fromTokens?: boolean;
}

/**
 * Serialize a parsed file back to Humdrum text, one newline-terminated line per input line
 */
export function serialize(file: HumdrumFile, options: SerializeOptions = {}): string {
  if (options.format === 'csv') {
    return serializeCsv(file, options);
  }

  const fromTokens = options.fromTokens ?? true;
  return file.lines
    .map((line) => (fromTokens ? getLineText(file, line) : line.text) + '\n')
    .join('');
}

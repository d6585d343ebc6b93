import { getLineTokens } from '../line';
import { quoteCsvField } from '../utils';
import type { HumdrumFile } from '../types';

export interface CsvOptions {
  /** Field separator (default: ',') */
  separator?: string;
}

/**
 * Serialize a parsed file as CSV, always from the current token text.
 * Global lines are written literally, other fields are quoted when needed.
 */
export function serializeCsv(file: HumdrumFile, options: CsvOptions = {}): string {
  const separator = options.separator ?? ',';

  let output = '';
  for (const line of file.lines) {
    const fields = getLineTokens(file, line).map((t) => t.text);
    if (!line.hasSpines) {
      output += fields.join('\t') + '\n';
      continue;
    }
    output += fields.map((field) => quoteCsvField(field, separator)).join(separator) + '\n';
  }
  return output;
}

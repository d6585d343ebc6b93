import { analyzeLines } from '../parser';
import type { RawLine } from '../parser';
import { isGlobalText } from '../line';
import { splitCsvLine, splitLines } from '../utils';
import type { ParseOptions, ParseResult } from '../types';

/**
 * Parse Humdrum data stored as CSV.
 * Global records are kept literally; other records are split into fields, quoted fields
 * keeping any separators or tabs they contain. The spine analysis is the same as for TSV.
 */
export function parseCsv(text: string, options: ParseOptions = {}): ParseResult {
  const separator = options.separator ?? ',';
  const lines: RawLine[] = splitLines(text).map((line) =>
    isGlobalText(line) ? line : splitCsvLine(line, separator)
  );
  return analyzeLines(lines, { ...options, format: 'csv' });
}

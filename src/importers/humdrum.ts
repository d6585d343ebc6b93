import { analyzeLines } from '../parser';
import { splitLines } from '../utils';
import type { ParseOptions, ParseResult } from '../types';
import { parseCsv } from './csv';

/**
 * Parse Humdrum text into a linked token graph.
 * Never throws: check `result.valid` before using `result.file`.
 */
export function parse(text: string, options: ParseOptions = {}): ParseResult {
  if (options.format === 'csv') {
    return parseCsv(text, options);
  }
  return analyzeLines(splitLines(text), { ...options, format: 'tsv' });
}

import { readFile, writeFile } from 'fs/promises';
import { parse, parseCompressed, isCompressed } from './importers';
import { serialize, serializeCompressed } from './exporters';
import type { SerializeOptions } from './exporters';
import type { HumdrumFile, ParseOptions, ParseResult } from './types';

/**
 * Parse a Humdrum file from disk
 * Gzip-compressed files are detected from their content; a `.csv` path is read as CSV
 * unless `options.format` says otherwise. A missing or unreadable file is an invalid result.
 * @param filePath - Path to the file
 */
export async function parseFile(filePath: string, options: ParseOptions = {}): Promise<ParseResult> {
  let data: Buffer;
  try {
    data = await readFile(filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    const result: ParseResult = {
      valid: false,
      error: { code: 'IO_ERROR', message: `Cannot open file ${filePath} for reading: ${reason}` },
    };
    if (options.verbose) {
      console.error(result.error.message);
    }
    return result;
  }

  const format = options.format ?? (filePath.toLowerCase().endsWith('.csv') ? 'csv' : 'tsv');
  const bytes = new Uint8Array(data);

  if (isCompressed(bytes)) {
    return parseCompressed(bytes, { ...options, format });
  }

  return parse(data.toString('utf-8'), { ...options, format });
}

/**
 * Serialize a parsed file to disk
 * Format is determined by file extension:
 * - .gz: gzip-compressed Humdrum
 * - .csv: CSV
 * - anything else: tab-delimited Humdrum
 * @param file - The parsed file
 * @param filePath - Path to write the file
 * @param options - Serialization options
 */
export async function serializeToFile(
  file: HumdrumFile,
  filePath: string,
  options: SerializeOptions = {}
): Promise<void> {
  const lowerPath = filePath.toLowerCase();

  if (lowerPath.endsWith('.gz')) {
    await writeFile(filePath, serializeCompressed(file, options));
  } else if (lowerPath.endsWith('.csv')) {
    await writeFile(filePath, serialize(file, { format: 'csv', ...options }), 'utf-8');
  } else {
    await writeFile(filePath, serialize(file, options), 'utf-8');
  }
}

import { gunzipSync, strFromU8 } from 'fflate';
import type { ParseOptions, ParseResult } from '../types';
import { parse } from './humdrum';

/**
 * Check if data is gzip-compressed
 * @returns true if the data starts with the gzip magic bytes (0x1f 0x8b)
 */
export function isCompressed(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b;
}

/**
 * Parse a gzip-compressed Humdrum file (.krn.gz)
 * A corrupt archive is reported as an invalid result.
 */
export function parseCompressed(data: Uint8Array, options: ParseOptions = {}): ParseResult {
  let text: string;
  try {
    text = strFromU8(gunzipSync(data));
  } catch (error) {
    return {
      valid: false,
      error: {
        code: 'DECOMPRESSION_ERROR',
        message: `Cannot decompress Humdrum data: ${error instanceof Error ? error.message : String(error)}`,
      },
    };
  }
  return parse(text, options);
}

/**
 * Parse compressed or plain Humdrum data, detecting the format from the content
 */
export function parseAuto(data: Uint8Array | string, options: ParseOptions = {}): ParseResult {
  if (typeof data === 'string') {
    return parse(data, options);
  }

  if (isCompressed(data)) {
    return parseCompressed(data, options);
  }

  return parse(strFromU8(data), options);
}

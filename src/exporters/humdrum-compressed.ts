import { gzipSync, strToU8 } from 'fflate';
import type { HumdrumFile } from '../types';
import { serialize } from './humdrum';
import type { SerializeOptions } from './humdrum';

export type { SerializeOptions };

/**
 * Serialize a parsed file to gzip-compressed Humdrum (.krn.gz)
 * @returns The compressed data
 */
export function serializeCompressed(file: HumdrumFile, options: SerializeOptions = {}): Uint8Array {
  return gzipSync(strToU8(serialize(file, options)), { level: 6 });
}

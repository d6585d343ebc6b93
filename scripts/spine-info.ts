#!/usr/bin/env tsx
/**
 * Humdrum spine structure dump
 *
 * Usage:
 *   npx tsx scripts/spine-info.ts <input.krn> [--tracks|--types]
 *
 * Examples:
 *   npx tsx scripts/spine-info.ts tests/fixtures/humdrum/split-merge.krn
 *   npx tsx scripts/spine-info.ts tests/fixtures/humdrum/add-exchange.krn --tracks
 */

import { parseFile } from '../src/file';
import { getParseError } from '../src/parser';
import { getMaxTrack, getTrackEndCount } from '../src/accessors';
import { formatDataTypeInfo, formatSpineInfo, formatTrackInfo } from '../src/exporters';

async function main() {
  const args = process.argv.slice(2);
  const inputPath = args.find((arg) => !arg.startsWith('--'));

  if (!inputPath) {
    console.log('Humdrum Spine Info');
    console.log('');
    console.log('Usage:');
    console.log('  npx tsx scripts/spine-info.ts <input.krn> [--tracks|--types]');
    process.exit(1);
  }

  const result = await parseFile(inputPath);
  if (!result.valid) {
    console.error(getParseError(result));
    process.exit(1);
  }

  const file = result.file;
  if (args.includes('--tracks')) {
    process.stdout.write(formatTrackInfo(file));
  } else if (args.includes('--types')) {
    process.stdout.write(formatDataTypeInfo(file));
  } else {
    process.stdout.write(formatSpineInfo(file));
  }

  const maxTrack = getMaxTrack(file);
  console.log('');
  console.log(`Tracks: ${maxTrack}`);
  for (let track = 1; track <= maxTrack; track++) {
    console.log(`  ${track}: ${getTrackEndCount(file, track)} terminator(s)`);
  }
}

main().catch((error) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});

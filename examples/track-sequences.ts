/**
 * Walking the spines of a small two-voice score
 *
 * The lower voice splits into two subspines for a bar, a lyric spine is added
 * under the upper voice, and both are printed track by track.
 *
 * Run: npx tsx examples/track-sequences.ts
 */

import {
  parse,
  assertParsed,
  getMaxTrack,
  getTrackStart,
  getPrimaryTrackSequence,
  getTrackSequence,
  getNextNonNullDataTokens,
  formatSpineInfo,
} from '../src';

const score = [
  '!!!OTL: Two voices',
  '**kern\t**kern',
  '*clefF4\t*clefG2',
  '4C\t4e',
  '*^\t*+',
  '*\t*\t*\t**text',
  '8G\t4c\t4g\tla',
  '8F\t.\t.\t.',
  '*v\t*v\t*\t*',
  '=1\t=1\t=1',
  '2C\t2c\tli',
  '*-\t*-\t*-',
].join('\n');

const file = assertParsed(parse(score));

console.log('Spine paths:');
console.log(formatSpineInfo(file));

for (let track = 1; track <= getMaxTrack(file); track++) {
  const start = getTrackStart(file, track);
  const primary = getPrimaryTrackSequence(file, track, { skipNulls: true, skipGlobals: true });
  console.log(`Track ${track} (${start?.text ?? '?'}): ${primary.map((t) => t.text).join(' ')}`);

  const rows = getTrackSequence(file, track, { skipGlobals: true });
  console.log(`  by line: ${rows.map((row) => row.map((t) => t.text).join('|')).join(' ')}`);
}

const firstNote = file.tokens.find((t) => t.text === '4C');
if (firstNote) {
  const following = getNextNonNullDataTokens(file, firstNote);
  console.log(`After 4C: ${following.map((t) => t.text).join(', ')}`);
}

import { getLineTokens } from '../line';
import { getTrackString } from '../token';
import type { HumdrumFile, HumdrumToken } from '../types';

// Debugging dumps: one output line per input line, global lines reproduced as they are.

function formatTokens(file: HumdrumFile, describe: (token: HumdrumToken) => string): string {
  return file.lines
    .map((line) => {
      if (!line.hasSpines) return line.text + '\n';
      return getLineTokens(file, line).map(describe).join('\t') + '\n';
    })
    .join('');
}

/** Spine path of every token */
export function formatSpineInfo(file: HumdrumFile): string {
  return formatTokens(file, (token) => token.spinePath);
}

/** Track of every token, as "track" or "track.subtrack" */
export function formatTrackInfo(file: HumdrumFile): string {
  return formatTokens(file, getTrackString);
}

/** Exclusive interpretation of every token's column */
export function formatDataTypeInfo(file: HumdrumFile): string {
  return formatTokens(file, (token) => token.dataType);
}

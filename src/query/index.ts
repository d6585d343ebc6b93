import { getNextToken, getTrackStart } from '../accessors';
import { getLineTokens } from '../line';
import { isNull, isSpineManipulator } from '../token';
import type { HumdrumFile, HumdrumToken, TokenId, TrackSequenceOptions } from '../types';

function isFilteredOut(token: HumdrumToken, options: TrackSequenceOptions): boolean {
  if (options.skipNulls && isNull(token)) return true;
  // exclusive interpretations and terminators always stay
  if (options.skipManipulators && isSpineManipulator(token) && token.kind !== 'terminate') return true;
  return false;
}

/**
 * Tokens of a track from its exclusive interpretation to its end, following the first
 * forward link on every line, so only the first subspine is visited after a split.
 * Unless `skipGlobals` is set, tokens of global lines are interleaved in line order.
 */
export function getPrimaryTrackSequence(
  file: HumdrumFile,
  track: number,
  options: TrackSequenceOptions = {}
): HumdrumToken[] {
  const start = getTrackStart(file, track);
  if (!start) return [];

  const output: HumdrumToken[] = [];
  let nextLine = 0;
  const addGlobalsBefore = (lineIndex: number) => {
    if (!options.skipGlobals) {
      for (let i = nextLine; i < lineIndex; i++) {
        const line = file.lines[i];
        if (!line.hasSpines) output.push(file.tokens[line.tokens[0]]);
      }
    }
    nextLine = Math.max(nextLine, lineIndex + 1);
  };

  let current: HumdrumToken | undefined = start;
  while (current) {
    addGlobalsBefore(current.lineIndex);
    if (!isFilteredOut(current, options)) {
      output.push(current);
    }
    current = getNextToken(file, current);
  }
  addGlobalsBefore(file.lines.length);

  return output;
}

/**
 * Tokens of a track grouped by line, every subspine included.
 * Lines without tokens of the track are left out; global lines contribute their single
 * token unless `skipGlobals` is set.
 */
export function getTrackSequence(
  file: HumdrumFile,
  track: number,
  options: TrackSequenceOptions = {}
): HumdrumToken[][] {
  const output: HumdrumToken[][] = [];

  for (const line of file.lines) {
    const tokens = getLineTokens(file, line);
    if (!line.hasSpines) {
      if (!options.skipGlobals) output.push(tokens);
      continue;
    }
    const row = tokens.filter((t) => t.track === track && !isFilteredOut(t, options));
    if (row.length > 0) {
      output.push(row);
    }
  }

  return output;
}

/**
 * Nearest non-null data tokens before the given token, one per incoming branch.
 * Null data, interpretations, comments and barlines are skipped.
 */
export function getPreviousNonNullDataTokens(file: HumdrumFile, token: HumdrumToken): HumdrumToken[] {
  return findNonNullData(file, token.previous, (t) => t.previous);
}

/**
 * Nearest non-null data tokens after the given token, one per outgoing branch.
 */
export function getNextNonNullDataTokens(file: HumdrumFile, token: HumdrumToken): HumdrumToken[] {
  return findNonNullData(file, token.next, (t) => t.next);
}

function findNonNullData(
  file: HumdrumFile,
  startIds: TokenId[],
  follow: (token: HumdrumToken) => TokenId[]
): HumdrumToken[] {
  const found: HumdrumToken[] = [];
  const visited = new Set<TokenId>();
  const pending = [...startIds];

  while (pending.length > 0) {
    const id = pending.pop();
    if (id === undefined || visited.has(id)) continue;
    visited.add(id);

    const token = file.tokens[id];
    if (token.kind === 'data') {
      found.push(token);
    } else {
      pending.push(...follow(token));
    }
  }

  return found.sort((a, b) => a.lineIndex - b.lineIndex || a.fieldIndex - b.fieldIndex);
}

/**
 * Iterate over every token in line order
 */
export function* iterateTokens(file: HumdrumFile): Generator<HumdrumToken> {
  for (const line of file.lines) {
    for (const id of line.tokens) {
      yield file.tokens[id];
    }
  }
}

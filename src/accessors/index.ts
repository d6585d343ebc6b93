import { classifyToken } from '../token';
import { classifyLine, getLineTokens } from '../line';
import { getMaxTrackNumber, getTrackEndIds, getTrackStartId } from '../spines/tracks';
import { resolveIndex } from '../utils';
import type { HumdrumFile, HumdrumLine, HumdrumToken, TokenId } from '../types';

// ============================================================
// Lines and fields
// ============================================================

export function getLineCount(file: HumdrumFile): number {
  return file.lines.length;
}

/**
 * Get a line by index; negative indexes count from the end (-1 is the last line)
 */
export function getLine(file: HumdrumFile, index: number): HumdrumLine | undefined {
  const resolved = resolveIndex(index, file.lines.length);
  return resolved === undefined ? undefined : file.lines[resolved];
}

export function getFieldCount(line: HumdrumLine): number {
  return line.tokens.length;
}

/**
 * Get the token at a line and field; both indexes may be negative to count from the end
 */
export function getToken(file: HumdrumFile, lineIndex: number, fieldIndex: number): HumdrumToken | undefined {
  const line = getLine(file, lineIndex);
  if (!line) return undefined;

  const field = resolveIndex(fieldIndex, line.tokens.length);
  return field === undefined ? undefined : file.tokens[line.tokens[field]];
}

export function getTokenById(file: HumdrumFile, id: TokenId): HumdrumToken | undefined {
  return file.tokens[id];
}

/** Line that owns the token */
export function getTokenLine(file: HumdrumFile, token: HumdrumToken): HumdrumLine {
  return file.lines[token.lineIndex];
}

/** Number of active columns on a structural line, 0 for global lines */
export function getSpineWidth(line: HumdrumLine): number {
  return line.hasSpines ? line.tokens.length : 0;
}

// ============================================================
// Tracks
// ============================================================

/** Highest track number in the file */
export function getMaxTrack(file: HumdrumFile): number {
  return getMaxTrackNumber(file.tracks);
}

/** Track number with negative values counting down from the highest track */
function resolveTrack(file: HumdrumFile, track: number): number | undefined {
  return resolveIndex(track, file.tracks.ends.length);
}

/** Exclusive interpretation that opened the track; -1 is the highest track */
export function getTrackStart(file: HumdrumFile, track: number): HumdrumToken | undefined {
  const resolved = resolveTrack(file, track);
  const id = resolved === undefined ? null : getTrackStartId(file.tracks, resolved);
  return id === null ? undefined : file.tokens[id];
}

/** Number of terminators of the track; a track split before it ends has several */
export function getTrackEndCount(file: HumdrumFile, track: number): number {
  return getTrackEnds(file, track).length;
}

/**
 * Get one terminator of a track; a negative track or subtrack counts from the end
 */
export function getTrackEnd(file: HumdrumFile, track: number, subtrack = 0): HumdrumToken | undefined {
  const ends = getTrackEnds(file, track);
  const index = resolveIndex(subtrack, ends.length);
  return index === undefined ? undefined : ends[index];
}

export function getTrackEnds(file: HumdrumFile, track: number): HumdrumToken[] {
  const resolved = resolveTrack(file, track);
  if (resolved === undefined) return [];
  return getTrackEndIds(file.tracks, resolved).map((id) => file.tokens[id]);
}

// ============================================================
// Links
// ============================================================

export function getNextTokens(file: HumdrumFile, token: HumdrumToken): HumdrumToken[] {
  return token.next.map((id) => file.tokens[id]);
}

export function getPreviousTokens(file: HumdrumFile, token: HumdrumToken): HumdrumToken[] {
  return token.previous.map((id) => file.tokens[id]);
}

/** First forward link, if any */
export function getNextToken(file: HumdrumFile, token: HumdrumToken): HumdrumToken | undefined {
  return token.next.length > 0 ? file.tokens[token.next[0]] : undefined;
}

/** First backward link, if any */
export function getPreviousToken(file: HumdrumFile, token: HumdrumToken): HumdrumToken | undefined {
  return token.previous.length > 0 ? file.tokens[token.previous[0]] : undefined;
}

// ============================================================
// Editing
// ============================================================

/**
 * Replace a token's text in place.
 * The token is reclassified, but links and spine data are not recomputed; `reanalyze` rebuilds
 * them from the token text. The stored line text is refreshed by `createLinesFromTokens`.
 */
export function setTokenText(file: HumdrumFile, id: TokenId, text: string): void {
  const token = file.tokens[id];
  if (!token) return;

  token.text = text;
  if (token.kind !== 'global') {
    token.kind = classifyToken(text);
  }

  const line = file.lines[token.lineIndex];
  if (line.hasSpines) {
    line.kind = classifyLine(line.text, getLineTokens(file, line));
  }
}

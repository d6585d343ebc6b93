import { appendFields, appendLine, getLineTokens } from './line';
import { advanceSpines, createSpineState, finishSpines } from './spines/topology';
import { stitchLines } from './spines/stitch';
import { createTrackTable } from './spines/tracks';
import type { HumdrumFile, HumdrumFormat, HumdrumLine, ParseError, ParseOptions, ParseResult } from './types';

/** A line of input: tab-delimited text, or fields already split by the reader */
export type RawLine = string | string[];

/**
 * Analyze input lines into a linked token graph.
 *
 * Stages run in order and the first failure stops the pipeline:
 * tokenize, spine topology, links, track finalization.
 */
export function analyzeLines(rawLines: RawLine[], options: ParseOptions = {}): ParseResult {
  const file = createFile(options.format ?? 'tsv');
  for (const raw of rawLines) {
    if (typeof raw === 'string') {
      appendLine(file, raw);
    } else {
      appendFields(file, raw);
    }
  }

  const error = analyzeSpines(file) ?? analyzeLinks(file) ?? analyzeTracks(file);
  if (error) {
    if (options.verbose) {
      console.error(error.message);
    }
    return { valid: false, error };
  }
  return { valid: true, file };
}

export function createFile(format: HumdrumFormat = 'tsv'): HumdrumFile {
  return { lines: [], tokens: [], tracks: createTrackTable(), format };
}

/**
 * Re-tokenize and re-analyze a file from the current text of its tokens,
 * picking up edits made with `setTokenText`.
 * The given file is left as it is; a new file is returned on success.
 */
export function reanalyze(file: HumdrumFile, options: ParseOptions = {}): ParseResult {
  return analyzeLines(
    file.lines.map((line) => {
      const texts = getLineTokens(file, line).map((t) => t.text);
      return line.hasSpines ? texts : texts.join('\t');
    }),
    { format: file.format, ...options }
  );
}

/** Validate column counts, assign spine paths and track numbers, and fill the track table */
export function analyzeSpines(file: HumdrumFile): ParseError | undefined {
  const state = createSpineState();
  for (const line of file.lines) {
    if (!line.hasSpines) continue;
    const error = advanceSpines(state, file, line);
    if (error) return error;
  }
  return finishSpines(state);
}

/** Stitch every pair of consecutive structural lines */
export function analyzeLinks(file: HumdrumFile): ParseError | undefined {
  let previous: HumdrumLine | undefined;
  for (const line of file.lines) {
    if (!line.hasSpines) continue;
    if (previous) {
      const error = stitchLines(file, previous, line);
      if (error) return error;
    }
    previous = line;
  }
  return undefined;
}

/** Number the columns of tracks that occupy more than one column on a line */
export function analyzeTracks(file: HumdrumFile): ParseError | undefined {
  for (const line of file.lines) {
    if (!line.hasSpines) continue;
    const tokens = getLineTokens(file, line);

    const counts = new Map<number, number>();
    for (const token of tokens) {
      counts.set(token.track, (counts.get(token.track) ?? 0) + 1);
    }

    const seen = new Map<number, number>();
    for (const token of tokens) {
      if (token.track <= 0) {
        return {
          code: 'INTERNAL_ERROR',
          message: `Error on line ${line.index + 1}: token "${token.text}" at field ${token.fieldIndex + 1} has no track`,
          line: line.index + 1,
          field: token.fieldIndex,
        };
      }
      if ((counts.get(token.track) ?? 0) > 1) {
        const subtrack = (seen.get(token.track) ?? 0) + 1;
        seen.set(token.track, subtrack);
        token.subtrack = subtrack;
      } else {
        token.subtrack = 0;
      }
    }
  }
  return undefined;
}

// ============================================================
// Result helpers
// ============================================================

/** True if the parse succeeded */
export function isValid(result: ParseResult): boolean {
  return result.valid;
}

/** Message of the parse error, or an empty string for a valid parse */
export function getParseError(result: ParseResult): string {
  return result.valid ? '' : result.error.message;
}

/**
 * Return the parsed file or throw
 */
export function assertParsed(result: ParseResult): HumdrumFile {
  if (!result.valid) {
    throw new HumdrumParseError(result.error);
  }
  return result.file;
}

export class HumdrumParseError extends Error {
  constructor(public readonly error: ParseError) {
    super(`[${error.code}] ${error.message}`);
    this.name = 'HumdrumParseError';
  }
}

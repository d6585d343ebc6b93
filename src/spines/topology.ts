import { getLineNumber, getLineTokens, hasManipulators } from '../line';
import type { HumdrumFile, HumdrumLine, HumdrumToken, ParseError } from '../types';
import { closeTrack, isTrackPending, openTrack, reserveTrack } from './tracks';

/** Current layout of one active column */
export interface SpineColumn {
  /** Exclusive interpretation; empty while a track opened by *+ waits for its ** token */
  dataType: string;
  spinePath: string;
}

export interface SpineState {
  initialized: boolean;
  columns: SpineColumn[];
  /** Last structural line seen, for end-of-input messages */
  lastLine?: HumdrumLine;
}

export function createSpineState(): SpineState {
  return { initialized: false, columns: [] };
}

/** Track number encoded in a spine path: its first integer */
export function trackFromSpinePath(spinePath: string): number {
  const match = spinePath.match(/\d+/);
  return match ? Number(match[0]) : 0;
}

/**
 * Spine path of a merged column.
 * Two halves of the same split collapse back to the parent, in either order; anything else is joined with spaces.
 */
export function mergeSpinePaths(paths: string[]): string {
  if (paths.length === 2) {
    const first = paths[0].match(/^\((.*)\)([ab])$/);
    const second = paths[1].match(/^\((.*)\)([ab])$/);
    if (first && second && first[1] === second[1] && first[2] !== second[2]) {
      return first[1];
    }
  }
  return paths.join(' ');
}

/**
 * Advance the spine layout over one structural line.
 * Tokens on the line receive the layout in effect before the line's own manipulators.
 */
export function advanceSpines(state: SpineState, file: HumdrumFile, line: HumdrumLine): ParseError | undefined {
  const tokens = getLineTokens(file, line);
  const previous = state.lastLine;
  state.lastLine = line;

  if (!state.initialized || !previous) {
    return initializeSpines(state, file, line, tokens);
  }

  if (tokens.length !== state.columns.length) {
    const lineNumber = getLineNumber(line);
    const previousNumber = getLineNumber(previous);
    return {
      code: 'FIELD_COUNT_MISMATCH',
      message:
        `Error on line ${lineNumber}: expected ${state.columns.length} fields after line ${previousNumber}, but found ${tokens.length}\n` +
        `Line ${previousNumber}: ${previous.text}\n` +
        `Line ${lineNumber}: ${line.text}`,
      line: lineNumber,
      relatedLine: previousNumber,
    };
  }

  for (let i = 0; i < tokens.length; i++) {
    const column = state.columns[i];
    if (isColumnPending(file, column) && tokens[i].kind !== 'exclusive') {
      return missingExclusive(line, i);
    }
    assignColumn(tokens[i], column);
  }

  if (!hasManipulators(line)) {
    return undefined;
  }

  return adjustSpines(state, file, line, tokens);
}

/** Check that every track opened by *+ received its exclusive interpretation */
export function finishSpines(state: SpineState): ParseError | undefined {
  const index = state.columns.findIndex((c) => c.dataType === '');
  if (index >= 0 && state.lastLine) {
    const lineNumber = getLineNumber(state.lastLine);
    return {
      code: 'MISSING_EXCLUSIVE_AFTER_ADD',
      message: `Error: input ends after spine add on line ${lineNumber} without an exclusive interpretation for the new spine`,
      line: lineNumber,
      field: index,
    };
  }
  return undefined;
}

function initializeSpines(
  state: SpineState,
  file: HumdrumFile,
  line: HumdrumLine,
  tokens: HumdrumToken[]
): ParseError | undefined {
  const offending = tokens.find((t) => t.kind !== 'exclusive');
  if (offending) {
    const lineNumber = getLineNumber(line);
    return {
      code: 'DATA_BEFORE_EXCLUSIVE',
      message: `Error on line ${lineNumber}: data found before exclusive interpretation\nLine ${lineNumber}: ${line.text}`,
      line: lineNumber,
      field: offending.fieldIndex,
    };
  }

  state.initialized = true;
  state.columns = tokens.map((token) => {
    const track = openTrack(file.tracks, token.id);
    const column = { dataType: token.text, spinePath: String(track) };
    assignColumn(token, column);
    return column;
  });
  return undefined;
}

function isColumnPending(file: HumdrumFile, column: SpineColumn): boolean {
  return isTrackPending(file.tracks, trackFromSpinePath(column.spinePath));
}

function assignColumn(token: HumdrumToken, column: SpineColumn): void {
  token.spinePath = column.spinePath;
  token.track = trackFromSpinePath(column.spinePath);
  token.dataType = column.dataType;
}

function adjustSpines(
  state: SpineState,
  file: HumdrumFile,
  line: HumdrumLine,
  tokens: HumdrumToken[]
): ParseError | undefined {
  const columns: SpineColumn[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const column = state.columns[i];

    switch (token.kind) {
      case 'split':
        columns.push(
          { dataType: column.dataType, spinePath: `(${column.spinePath})a` },
          { dataType: column.dataType, spinePath: `(${column.spinePath})b` }
        );
        break;

      case 'merge': {
        let last = i;
        while (last + 1 < tokens.length && tokens[last + 1].kind === 'merge') {
          last++;
        }
        const merging = state.columns.slice(i, last + 1);
        columns.push({
          dataType: column.dataType,
          spinePath: mergeSpinePaths(merging.map((c) => c.spinePath)),
        });
        i = last;
        break;
      }

      case 'exchange': {
        if (i + 1 >= tokens.length || tokens[i + 1].kind !== 'exchange') {
          const lineNumber = getLineNumber(line);
          return {
            code: 'UNMATCHED_EXCHANGE',
            message: `Error on line ${lineNumber}: spine exchange at field ${i + 1} has no adjacent *x partner\nLine ${lineNumber}: ${line.text}`,
            line: lineNumber,
            field: i,
          };
        }
        columns.push(state.columns[i + 1], column);
        i++;
        break;
      }

      case 'add': {
        const track = reserveTrack(file.tracks);
        columns.push(column, { dataType: '', spinePath: String(track) });
        break;
      }

      case 'terminate':
        closeTrack(file.tracks, token.track, token.id);
        break;

      case 'exclusive': {
        if (!isColumnPending(file, column)) {
          const lineNumber = getLineNumber(line);
          return {
            code: 'UNPREPARED_EXCLUSIVE',
            message: `Error on line ${lineNumber}: exclusive interpretation ${token.text} at field ${i + 1} was not prepared by a spine add\nLine ${lineNumber}: ${line.text}`,
            line: lineNumber,
            field: i,
          };
        }
        openTrack(file.tracks, token.id, token.track);
        token.dataType = token.text;
        columns.push({ dataType: token.text, spinePath: column.spinePath });
        break;
      }

      default:
        columns.push(column);
    }
  }

  state.columns = columns;
  return undefined;
}

function missingExclusive(line: HumdrumLine, field: number): ParseError {
  const lineNumber = getLineNumber(line);
  return {
    code: 'MISSING_EXCLUSIVE_AFTER_ADD',
    message: `Error on line ${lineNumber}: expected an exclusive interpretation at field ${field + 1} after spine add\nLine ${lineNumber}: ${line.text}`,
    line: lineNumber,
    field,
  };
}

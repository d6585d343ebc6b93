// ============================================================
// Tokens
// ============================================================

/** Handle of a token in `HumdrumFile.tokens` */
export type TokenId = number;

export type TokenKind =
  | 'exclusive'      // **kern
  | 'split'          // *^
  | 'merge'          // *v
  | 'exchange'       // *x
  | 'add'            // *+
  | 'terminate'      // *-
  | 'interpretation' // any other *...
  | 'comment'        // local comment !...
  | 'barline'        // =...
  | 'null'           // .
  | 'data'
  | 'global';        // whole text of a line outside the spine model

export type ManipulatorKind = 'split' | 'merge' | 'exchange' | 'add' | 'terminate';

export interface HumdrumToken {
  id: TokenId;
  text: string;
  kind: TokenKind;
  lineIndex: number;
  fieldIndex: number;
  /** Logical spine, 1-based; 0 for tokens of global lines */
  track: number;
  /** 0 when the track occupies a single column on the line, otherwise 1..n */
  subtrack: number;
  /** Position within nested splits, e.g. "((2)a)b" */
  spinePath: string;
  /** Exclusive interpretation of the column, e.g. "**kern" */
  dataType: string;
  next: TokenId[];
  previous: TokenId[];
}

// ============================================================
// Lines
// ============================================================

export type LineKind =
  | 'empty'
  | 'globalComment'
  | 'referenceRecord'
  | 'exclusive'
  | 'manipulator'
  | 'interpretation'
  | 'localComment'
  | 'barline'
  | 'data';

export interface HumdrumLine {
  index: number;
  text: string;
  kind: LineKind;
  /** False for empty lines, global comments and reference records */
  hasSpines: boolean;
  tokens: TokenId[];
}

// ============================================================
// Tracks
// ============================================================

export interface TrackTable {
  /** Slot 0 is reserved and always null; a reserved but unopened track is null too */
  starts: (TokenId | null)[];
  ends: TokenId[][];
}

// ============================================================
// File
// ============================================================

export type HumdrumFormat = 'tsv' | 'csv';

export interface HumdrumFile {
  lines: HumdrumLine[];
  tokens: HumdrumToken[];
  tracks: TrackTable;
  format: HumdrumFormat;
}

// ============================================================
// Parse results
// ============================================================

export type ParseErrorCode =
  | 'IO_ERROR'
  | 'DECOMPRESSION_ERROR'
  | 'DATA_BEFORE_EXCLUSIVE'
  | 'FIELD_COUNT_MISMATCH'
  | 'MISSING_EXCLUSIVE_AFTER_ADD'
  | 'UNPREPARED_EXCLUSIVE'
  | 'UNMATCHED_EXCHANGE'
  | 'LINE_LENGTH_MISMATCH'
  | 'ALIGNMENT_ERROR'
  | 'INTERNAL_ERROR';

export interface ParseError {
  code: ParseErrorCode;
  message: string;
  /** 1-based line number */
  line?: number;
  field?: number;
  /** Second line involved, for errors between two lines */
  relatedLine?: number;
}

export type ParseResult =
  | { valid: true; file: HumdrumFile; error?: undefined }
  | { valid: false; error: ParseError; file?: undefined };

export interface ParseOptions {
  /** Input layout (default: 'tsv') */
  format?: HumdrumFormat;
  /** Field separator for CSV input (default: ',') */
  separator?: string;
  /** Print the parse error to stderr (default: false) */
  verbose?: boolean;
}

export interface TrackSequenceOptions {
  /** Leave out null data tokens (default: false) */
  skipNulls?: boolean;
  /** Leave out *^ *v *x *+ tokens; ** and *- are kept (default: false) */
  skipManipulators?: boolean;
  /** Leave out global lines (default: false) */
  skipGlobals?: boolean;
}

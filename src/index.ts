// Core types
export type {
  TokenId,
  TokenKind,
  ManipulatorKind,
  HumdrumToken,
  LineKind,
  HumdrumLine,
  TrackTable,
  HumdrumFormat,
  HumdrumFile,
  ParseErrorCode,
  ParseError,
  ParseResult,
  ParseOptions,
  TrackSequenceOptions,
} from './types';

// Importers
export { parse, parseCsv, parseCompressed, isCompressed, parseAuto } from './importers';

// Exporters
export {
  serialize,
  serializeCsv,
  serializeCompressed,
  formatSpineInfo,
  formatTrackInfo,
  formatDataTypeInfo,
} from './exporters';
export type { SerializeOptions, CsvOptions } from './exporters';

// Pipeline and parse results
export {
  analyzeLines,
  analyzeSpines,
  analyzeLinks,
  analyzeTracks,
  createFile,
  reanalyze,
  isValid,
  getParseError,
  assertParsed,
  HumdrumParseError,
} from './parser';
export type { RawLine } from './parser';

// Tokens and lines
export {
  classifyToken,
  isManipulator,
  isSpineManipulator,
  isExclusive,
  isTerminator,
  isNull,
  isData,
  isInterpretation,
  getTrackString,
} from './token';
export {
  appendLine,
  appendFields,
  classifyLine,
  isGlobalText,
  hasManipulators,
  getLineTokens,
  getLineNumber,
  getLineText,
  createLinesFromTokens,
} from './line';

// Spine topology, stitching and tracks
export {
  createSpineState,
  advanceSpines,
  finishSpines,
  mergeSpinePaths,
  trackFromSpinePath,
  stitchLines,
  makeForwardLink,
  createTrackTable,
  reserveTrack,
  openTrack,
  closeTrack,
  isTrackPending,
  getTrackStartId,
  getTrackEndIds,
} from './spines';
export type { SpineColumn, SpineState } from './spines';

// Accessors
export {
  getLineCount,
  getLine,
  getFieldCount,
  getToken,
  getTokenById,
  getTokenLine,
  getSpineWidth,
  getMaxTrack,
  getTrackStart,
  getTrackEndCount,
  getTrackEnd,
  getTrackEnds,
  getNextTokens,
  getPreviousTokens,
  getNextToken,
  getPreviousToken,
  setTokenText,
} from './accessors';

// Query
export {
  getPrimaryTrackSequence,
  getTrackSequence,
  getPreviousNonNullDataTokens,
  getNextNonNullDataTokens,
  iterateTokens,
} from './query';

// File operations
export { parseFile, serializeToFile } from './file';

// Utils
export { splitLines, splitCsvLine, quoteCsvField, resolveIndex } from './utils';

// Validator
export {
  validate,
  validateLinks,
  validateLinkSymmetry,
  validateManipulators,
  validateTracks,
  validateSpinePaths,
  isGraphValid,
  assertGraphValid,
  formatLocation,
  GraphValidationException,
} from './validator';
export type {
  ValidationError,
  ValidationResult,
  ValidationLocation,
  ValidationErrorCode,
  ValidationLevel,
  ValidateOptions,
} from './validator';

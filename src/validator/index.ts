import { getLineTokens } from '../line';
import { trackFromSpinePath } from '../spines/topology';
import { getMaxTrackNumber, getTrackEndIds, getTrackStartId } from '../spines/tracks';
import type { HumdrumFile, HumdrumToken } from '../types';

// ============================================================
// Validation Error Types
// ============================================================

export type ValidationErrorCode =
  // Links
  | 'MISSING_FORWARD_LINK'
  | 'MISSING_BACKWARD_LINK'
  | 'ASYMMETRIC_LINK'
  // Manipulators
  | 'SPLIT_ARITY'
  | 'MERGE_ARITY'
  // Tracks
  | 'TRACK_START_MISSING'
  | 'TRACK_NOT_TERMINATED'
  | 'TRACK_SPINE_PATH_MISMATCH';

export type ValidationLevel = 'error' | 'warning' | 'info';

export interface ValidationLocation {
  lineIndex?: number;
  fieldIndex?: number;
  track?: number;
}

export interface ValidationError {
  code: ValidationErrorCode;
  level: ValidationLevel;
  message: string;
  location: ValidationLocation;
  details?: Record<string, unknown>;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationError[];
  infos: ValidationError[];
}

export interface ValidateOptions {
  /** Check that tokens before the last structural line continue forward (default: true) */
  checkForwardLinks?: boolean;
  /** Check that tokens after the first structural line have a predecessor (default: true) */
  checkBackwardLinks?: boolean;
  /** Check that every forward link has a matching backward link (default: true) */
  checkLinkSymmetry?: boolean;
  /** Check the fan-out of split and merge tokens (default: true) */
  checkManipulators?: boolean;
  /** Check track starts and ends (default: true) */
  checkTracks?: boolean;
  /** Check that token tracks agree with their spine paths (default: true) */
  checkSpinePaths?: boolean;
}

const DEFAULT_OPTIONS: Required<ValidateOptions> = {
  checkForwardLinks: true,
  checkBackwardLinks: true,
  checkLinkSymmetry: true,
  checkManipulators: true,
  checkTracks: true,
  checkSpinePaths: true,
};

// ============================================================
// Main Validate Function
// ============================================================

/**
 * Validate the token graph of a parsed file for internal consistency
 */
export function validate(file: HumdrumFile, options: ValidateOptions = {}): ValidationResult {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const allErrors: ValidationError[] = [];

  if (opts.checkForwardLinks || opts.checkBackwardLinks) {
    allErrors.push(...validateLinks(file, opts.checkForwardLinks, opts.checkBackwardLinks));
  }

  if (opts.checkLinkSymmetry) {
    allErrors.push(...validateLinkSymmetry(file));
  }

  if (opts.checkManipulators) {
    allErrors.push(...validateManipulators(file));
  }

  if (opts.checkTracks) {
    allErrors.push(...validateTracks(file));
  }

  if (opts.checkSpinePaths) {
    allErrors.push(...validateSpinePaths(file));
  }

  const errors = allErrors.filter(e => e.level === 'error');
  const warnings = allErrors.filter(e => e.level === 'warning');
  const infos = allErrors.filter(e => e.level === 'info');

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    infos,
  };
}

// ============================================================
// Individual Validators
// ============================================================

function locate(token: HumdrumToken): ValidationLocation {
  return { lineIndex: token.lineIndex, fieldIndex: token.fieldIndex, track: token.track };
}

function structuralTokens(file: HumdrumFile): HumdrumToken[][] {
  return file.lines.filter(line => line.hasSpines).map(line => getLineTokens(file, line));
}

/**
 * Validate that every token inside the spine graph is connected on both sides.
 * Terminators end a branch; exclusive interpretations start one.
 */
export function validateLinks(file: HumdrumFile, forward = true, backward = true): ValidationError[] {
  const errors: ValidationError[] = [];
  const rows = structuralTokens(file);

  for (let r = 0; r < rows.length; r++) {
    for (const token of rows[r]) {
      if (forward && r < rows.length - 1 && token.kind !== 'terminate' && token.next.length === 0) {
        errors.push({
          code: 'MISSING_FORWARD_LINK',
          level: 'error',
          message: `Token "${token.text}" has no forward link`,
          location: locate(token),
        });
      }
      if (backward && r > 0 && token.kind !== 'exclusive' && token.previous.length === 0) {
        errors.push({
          code: 'MISSING_BACKWARD_LINK',
          level: 'error',
          message: `Token "${token.text}" has no backward link`,
          location: locate(token),
        });
      }
    }
  }

  return errors;
}

/**
 * Validate that links are recorded on both of their ends
 */
export function validateLinkSymmetry(file: HumdrumFile): ValidationError[] {
  const errors: ValidationError[] = [];

  for (const token of file.tokens) {
    for (const id of token.next) {
      const target = file.tokens[id];
      if (!target || !target.previous.includes(token.id)) {
        errors.push({
          code: 'ASYMMETRIC_LINK',
          level: 'error',
          message: `Forward link from "${token.text}" to token ${id} has no backward counterpart`,
          location: locate(token),
          details: { target: id },
        });
      }
    }
  }

  return errors;
}

/**
 * Validate split fan-out and merge convergence
 */
export function validateManipulators(file: HumdrumFile): ValidationError[] {
  const errors: ValidationError[] = [];

  for (const token of file.tokens) {
    if (token.kind === 'split' && token.next.length !== 2) {
      errors.push({
        code: 'SPLIT_ARITY',
        level: 'error',
        message: `Split token has ${token.next.length} forward links, expected 2`,
        location: locate(token),
      });
    }
    if (token.kind === 'merge' && token.next.length !== 1) {
      errors.push({
        code: 'MERGE_ARITY',
        level: 'error',
        message: `Merge token has ${token.next.length} forward links, expected 1`,
        location: locate(token),
      });
    }
  }

  return errors;
}

/**
 * Validate that every track has a start and reaches at least one terminator
 */
export function validateTracks(file: HumdrumFile): ValidationError[] {
  const errors: ValidationError[] = [];
  const maxTrack = getMaxTrackNumber(file.tracks);

  for (let track = 1; track <= maxTrack; track++) {
    if (getTrackStartId(file.tracks, track) === null) {
      errors.push({
        code: 'TRACK_START_MISSING',
        level: 'error',
        message: `Track ${track} has no exclusive interpretation`,
        location: { track },
      });
    }
    if (getTrackEndIds(file.tracks, track).length === 0) {
      errors.push({
        code: 'TRACK_NOT_TERMINATED',
        level: 'warning',
        message: `Track ${track} never reaches a *- terminator`,
        location: { track },
      });
    }
  }

  return errors;
}

/**
 * Validate that each token's track is the one named by its spine path
 */
export function validateSpinePaths(file: HumdrumFile): ValidationError[] {
  const errors: ValidationError[] = [];

  for (const row of structuralTokens(file)) {
    for (const token of row) {
      const expected = trackFromSpinePath(token.spinePath);
      if (expected !== token.track) {
        errors.push({
          code: 'TRACK_SPINE_PATH_MISMATCH',
          level: 'error',
          message: `Token "${token.text}" is in track ${token.track} but its spine path "${token.spinePath}" names track ${expected}`,
          location: locate(token),
        });
      }
    }
  }

  return errors;
}

// ============================================================
// Helpers
// ============================================================

/**
 * Quick check if the token graph is valid
 */
export function isGraphValid(file: HumdrumFile, options?: ValidateOptions): boolean {
  return validate(file, options).valid;
}

/**
 * Validate and throw if invalid
 */
export function assertGraphValid(file: HumdrumFile, options?: ValidateOptions): void {
  const result = validate(file, options);
  if (!result.valid) {
    const errorMessages = result.errors.map(e =>
      `[${e.code}] ${e.message} at ${formatLocation(e.location)}`
    ).join('\n');
    throw new GraphValidationException(result.errors, errorMessages);
  }
}

/**
 * Format a validation location for display
 */
export function formatLocation(location: ValidationLocation): string {
  const parts: string[] = [];

  if (location.lineIndex !== undefined) {
    parts.push(`line=${location.lineIndex + 1}`);
  }

  if (location.fieldIndex !== undefined) {
    parts.push(`field[${location.fieldIndex}]`);
  }

  if (location.track !== undefined) {
    parts.push(`track=${location.track}`);
  }

  return parts.length > 0 ? parts.join(', ') : 'file';
}

/**
 * Exception thrown when validation fails
 */
export class GraphValidationException extends Error {
  constructor(
    public readonly errors: ValidationError[],
    message: string
  ) {
    super(message);
    this.name = 'GraphValidationException';
  }
}

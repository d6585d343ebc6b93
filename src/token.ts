import type { HumdrumToken, ManipulatorKind, TokenId, TokenKind } from './types';

const MANIPULATORS: Record<string, ManipulatorKind> = {
  '*^': 'split',
  '*v': 'merge',
  '*x': 'exchange',
  '*+': 'add',
  '*-': 'terminate',
};

/**
 * Classify a field by its text.
 * Manipulators must match exactly so that interpretations such as `*vib` stay interpretations.
 */
export function classifyToken(text: string): TokenKind {
  if (text.startsWith('**')) return 'exclusive';
  if (text.startsWith('*')) {
    return MANIPULATORS[text] ?? 'interpretation';
  }
  if (text.startsWith('!')) return 'comment';
  if (text.startsWith('=')) return 'barline';
  if (text === '.') return 'null';
  return 'data';
}

/** Create an unlinked token; spine fields are filled in by the spine analysis */
export function createToken(id: TokenId, text: string, lineIndex: number, fieldIndex: number): HumdrumToken {
  return {
    id,
    text,
    kind: classifyToken(text),
    lineIndex,
    fieldIndex,
    track: 0,
    subtrack: 0,
    spinePath: '',
    dataType: '',
    next: [],
    previous: [],
  };
}

// ============================================================
// Predicates
// ============================================================

/** True for *^ *v *x *+ *- and exclusive interpretations */
export function isManipulator(token: HumdrumToken): boolean {
  return token.kind === 'exclusive' || isSpineManipulator(token);
}

/** True for *^ *v *x *+ *- only */
export function isSpineManipulator(token: HumdrumToken): boolean {
  switch (token.kind) {
    case 'split':
    case 'merge':
    case 'exchange':
    case 'add':
    case 'terminate':
      return true;
    default:
      return false;
  }
}

export function isExclusive(token: HumdrumToken): boolean {
  return token.kind === 'exclusive';
}

export function isTerminator(token: HumdrumToken): boolean {
  return token.kind === 'terminate';
}

export function isNull(token: HumdrumToken): boolean {
  return token.kind === 'null';
}

/** True for data tokens, null data tokens included */
export function isData(token: HumdrumToken): boolean {
  return token.kind === 'data' || token.kind === 'null';
}

export function isInterpretation(token: HumdrumToken): boolean {
  return token.kind === 'interpretation' || isManipulator(token);
}

/** "track" or "track.subtrack" */
export function getTrackString(token: HumdrumToken): string {
  return token.subtrack > 0 ? `${token.track}.${token.subtrack}` : String(token.track);
}

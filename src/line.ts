import { createToken, isSpineManipulator } from './token';
import type { HumdrumFile, HumdrumLine, HumdrumToken, LineKind } from './types';

/** Empty lines, global comments and reference records sit outside the spine model */
export function isGlobalText(text: string): boolean {
  return text === '' || text.startsWith('!!');
}

/**
 * Tokenize one tab-delimited line into the file's token arena and append the line.
 * Global lines get a single token holding the whole text.
 */
export function appendLine(file: HumdrumFile, text: string): HumdrumLine {
  if (isGlobalText(text)) {
    return pushLine(file, text, [text], false);
  }
  return pushLine(file, text, text.split('\t'), true);
}

/**
 * Append a structural line whose fields are already split, as read from CSV.
 * Fields may contain tabs; the stored line text joins them with tabs.
 */
export function appendFields(file: HumdrumFile, fields: string[]): HumdrumLine {
  return pushLine(file, fields.join('\t'), fields, true);
}

function pushLine(file: HumdrumFile, text: string, fields: string[], hasSpines: boolean): HumdrumLine {
  const index = file.lines.length;
  const tokens: HumdrumToken[] = fields.map((field, fieldIndex) => {
    const token = createToken(file.tokens.length + fieldIndex, field, index, fieldIndex);
    if (!hasSpines) token.kind = 'global';
    return token;
  });
  file.tokens.push(...tokens);

  const line: HumdrumLine = {
    index,
    text,
    kind: classifyLine(text, tokens),
    hasSpines,
    tokens: tokens.map((t) => t.id),
  };
  file.lines.push(line);
  return line;
}

/** Derive the line classification from its text and tokens */
export function classifyLine(text: string, tokens: HumdrumToken[]): LineKind {
  if (text === '') return 'empty';
  if (text.startsWith('!!!')) return 'referenceRecord';
  if (text.startsWith('!!')) return 'globalComment';

  if (tokens.some((t) => t.kind === 'exclusive')) return 'exclusive';
  if (tokens.some(isSpineManipulator)) return 'manipulator';

  switch (tokens[0]?.kind) {
    case 'interpretation':
      return 'interpretation';
    case 'comment':
      return 'localComment';
    case 'barline':
      return 'barline';
    default:
      return 'data';
  }
}

/** True if any token on the line changes the spine layout (exclusive interpretations included) */
export function hasManipulators(line: HumdrumLine): boolean {
  return line.kind === 'exclusive' || line.kind === 'manipulator';
}

export function getLineTokens(file: HumdrumFile, line: HumdrumLine): HumdrumToken[] {
  return line.tokens.map((id) => file.tokens[id]);
}

/** 1-based line number for messages */
export function getLineNumber(line: HumdrumLine): number {
  return line.index + 1;
}

/** Rebuild a line's text from the current contents of its tokens */
export function getLineText(file: HumdrumFile, line: HumdrumLine): string {
  return getLineTokens(file, line).map((t) => t.text).join('\t');
}

/** Rewrite every line's stored text from its tokens, after tokens were edited in place */
export function createLinesFromTokens(file: HumdrumFile): void {
  for (const line of file.lines) {
    line.text = getLineText(file, line);
  }
}

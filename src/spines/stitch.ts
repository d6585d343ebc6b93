import { getLineNumber, getLineTokens, hasManipulators } from '../line';
import type { HumdrumFile, HumdrumLine, HumdrumToken, ParseError } from '../types';

/** Link `from` forward to `to` and `to` backward to `from` */
export function makeForwardLink(from: HumdrumToken, to: HumdrumToken): void {
  from.next.push(to.id);
  to.previous.push(from.id);
}

/**
 * Create forward/backward links between two consecutive structural lines.
 * Fan-out and fan-in follow the manipulators on the previous line.
 */
export function stitchLines(file: HumdrumFile, previous: HumdrumLine, next: HumdrumLine): ParseError | undefined {
  const prevTokens = getLineTokens(file, previous);
  const nextTokens = getLineTokens(file, next);

  if (!hasManipulators(previous)) {
    if (prevTokens.length !== nextTokens.length) {
      return {
        code: 'LINE_LENGTH_MISMATCH',
        message:
          `Error: lines ${getLineNumber(previous)} and ${getLineNumber(next)} are not the same length\n` +
          describeLines(previous, next),
        line: getLineNumber(previous),
        relatedLine: getLineNumber(next),
      };
    }
    for (let i = 0; i < prevTokens.length; i++) {
      makeForwardLink(prevTokens[i], nextTokens[i]);
    }
    return undefined;
  }

  let i = 0;
  let ii = 0;
  const overrun = (): ParseError => alignmentError(previous, next, i, ii, prevTokens.length, nextTokens.length);

  for (; i < prevTokens.length; i++) {
    const token = prevTokens[i];

    switch (token.kind) {
      case 'split':
        if (ii + 2 > nextTokens.length) return overrun();
        makeForwardLink(token, nextTokens[ii++]);
        makeForwardLink(token, nextTokens[ii++]);
        break;

      case 'merge': {
        if (ii >= nextTokens.length) return overrun();
        const target = nextTokens[ii++];
        while (i < prevTokens.length && prevTokens[i].kind === 'merge') {
          makeForwardLink(prevTokens[i], target);
          i++;
        }
        i--;
        break;
      }

      case 'exchange': {
        const partner = prevTokens[i + 1];
        if (!partner || partner.kind !== 'exchange') {
          return {
            code: 'UNMATCHED_EXCHANGE',
            message: `Error on line ${getLineNumber(previous)}: spine exchange at field ${i + 1} has no adjacent *x partner`,
            line: getLineNumber(previous),
            field: i,
          };
        }
        if (ii + 2 > nextTokens.length) return overrun();
        makeForwardLink(partner, nextTokens[ii++]);
        makeForwardLink(token, nextTokens[ii++]);
        i++;
        break;
      }

      case 'terminate':
        break;

      case 'add': {
        const opening = nextTokens[ii + 1];
        if (!opening || opening.kind !== 'exclusive') {
          return {
            code: 'MISSING_EXCLUSIVE_AFTER_ADD',
            message:
              `Error: expecting exclusive interpretation on line ${getLineNumber(next)} at field ${ii + 2} ` +
              `but got ${opening ? opening.text : 'end of line'}`,
            line: getLineNumber(next),
            field: ii + 1,
            relatedLine: getLineNumber(previous),
          };
        }
        makeForwardLink(token, nextTokens[ii]);
        ii += 2;
        break;
      }

      default:
        // exclusive interpretations and ordinary tokens continue one-to-one
        if (ii >= nextTokens.length) return overrun();
        makeForwardLink(token, nextTokens[ii++]);
    }
  }

  if (i !== prevTokens.length || ii !== nextTokens.length) {
    return overrun();
  }

  return undefined;
}

function describeLines(previous: HumdrumLine, next: HumdrumLine): string {
  return `Line ${getLineNumber(previous)}: ${previous.text}\nLine ${getLineNumber(next)}: ${next.text}`;
}

function alignmentError(
  previous: HumdrumLine,
  next: HumdrumLine,
  i: number,
  ii: number,
  prevCount: number,
  nextCount: number
): ParseError {
  return {
    code: 'ALIGNMENT_ERROR',
    message:
      `Error: cannot stitch lines ${getLineNumber(previous)} and ${getLineNumber(next)} together due to alignment problem\n` +
      `${describeLines(previous, next)}\n` +
      `I = ${i} token count ${prevCount}\n` +
      `II = ${ii} token count ${nextCount}`,
    line: getLineNumber(previous),
    relatedLine: getLineNumber(next),
  };
}

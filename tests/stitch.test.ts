import { describe, it, expect } from 'vitest';
import { appendLine } from '../src/line';
import { createFile } from '../src/parser';
import { stitchLines } from '../src/spines/stitch';

function stitch(previousText: string, nextText: string) {
  const file = createFile();
  const previous = appendLine(file, previousText);
  const next = appendLine(file, nextText);
  const error = stitchLines(file, previous, next);
  const prev = previous.tokens.map((id) => file.tokens[id]);
  const following = next.tokens.map((id) => file.tokens[id]);
  return { file, error, prev, following };
}

describe('Line Stitcher', () => {
  it('should link plain lines one to one', () => {
    const { error, prev, following } = stitch('4c\t4e\t4g', '4d\t.\t4a');

    expect(error).toBeUndefined();
    expect(prev.map((t) => t.next)).toEqual([[3], [4], [5]]);
    expect(following.map((t) => t.previous)).toEqual([[0], [1], [2]]);
  });

  it('should reject plain lines of different lengths', () => {
    const { error } = stitch('4c\t4e', '4d');

    expect(error?.code).toBe('LINE_LENGTH_MISMATCH');
    expect(error?.line).toBe(1);
    expect(error?.relatedLine).toBe(2);
    expect(error?.message).toBe('Error: lines 1 and 2 are not the same length\nLine 1: 4c\t4e\nLine 2: 4d');
  });

  it('should link exclusive interpretations one to one', () => {
    const { error, prev } = stitch('**kern\t**text', '4c\tla');

    expect(error).toBeUndefined();
    expect(prev.map((t) => t.next)).toEqual([[2], [3]]);
  });

  it('should fan a split out to two tokens', () => {
    const { error, prev, following } = stitch('*^\t*', '4c\t4e\t4g');

    expect(error).toBeUndefined();
    expect(prev[0].next).toEqual([2, 3]);
    expect(prev[1].next).toEqual([4]);
    expect(following[0].previous).toEqual([0]);
    expect(following[1].previous).toEqual([0]);
  });

  it('should converge a run of merges on one token', () => {
    const { error, prev, following } = stitch('*\t*v\t*v\t*v', '*\t*');

    expect(error).toBeUndefined();
    expect(prev.map((t) => t.next)).toEqual([[4], [5], [5], [5]]);
    expect(following[1].previous).toEqual([1, 2, 3]);
  });

  it('should cross exchanged tokens', () => {
    const { error, prev, following } = stitch('*x\t*x', 'A\tB');

    expect(error).toBeUndefined();
    expect(following[0].previous).toEqual([1]);
    expect(following[1].previous).toEqual([0]);
    expect(prev[0].next).toEqual([3]);
    expect(prev[1].next).toEqual([2]);
  });

  it('should reject an exchange without a partner', () => {
    const { error } = stitch('*x\t*', 'A\tB');

    expect(error?.code).toBe('UNMATCHED_EXCHANGE');
    expect(error?.field).toBe(0);
  });

  it('should leave terminated tokens without forward links', () => {
    const { error, prev } = stitch('*-\t*', '4c');

    expect(error).toBeUndefined();
    expect(prev[0].next).toEqual([]);
    expect(prev[1].next).toEqual([2]);
  });

  it('should continue an added spine and leave the new exclusive unlinked', () => {
    const { error, prev, following } = stitch('*+\t*', '*\t**text\t*');

    expect(error).toBeUndefined();
    expect(prev[0].next).toEqual([2]);
    expect(prev[1].next).toEqual([4]);
    expect(following[1].previous).toEqual([]);
  });

  it('should require an exclusive interpretation after an add', () => {
    const { error } = stitch('*+\t*', '*\t*\t*');

    expect(error?.code).toBe('MISSING_EXCLUSIVE_AFTER_ADD');
    expect(error?.line).toBe(2);
    expect(error?.relatedLine).toBe(1);
    expect(error?.field).toBe(1);
  });

  it('should report leftover tokens as an alignment error naming both lines', () => {
    const { error } = stitch('*^', '4c\t4e\t4g');

    expect(error?.code).toBe('ALIGNMENT_ERROR');
    expect(error?.line).toBe(1);
    expect(error?.relatedLine).toBe(2);
    expect(error?.message.split('\n')[0]).toBe(
      'Error: cannot stitch lines 1 and 2 together due to alignment problem'
    );
  });

  it('should report running past the next line as an alignment error', () => {
    const { error } = stitch('*^\t*', '4c\t4e');

    expect(error?.code).toBe('ALIGNMENT_ERROR');
  });
});

import { describe, it, expect } from 'vitest';
import { appendLine } from '../src/line';
import { createFile } from '../src/parser';
import { isTrackPending } from '../src/spines/tracks';
import {
  advanceSpines,
  createSpineState,
  finishSpines,
  mergeSpinePaths,
  trackFromSpinePath,
} from '../src/spines/topology';
import type { HumdrumFile } from '../src/types';

function advanceAll(file: HumdrumFile, texts: string[]) {
  const state = createSpineState();
  for (const text of texts) {
    const line = appendLine(file, text);
    if (!line.hasSpines) continue;
    const error = advanceSpines(state, file, line);
    if (error) return { state, error };
  }
  return { state, error: undefined };
}

const paths = (file: HumdrumFile, lineIndex: number) =>
  file.lines[lineIndex].tokens.map((id) => file.tokens[id].spinePath);

describe('Spine-Topology Tracker', () => {
  describe('trackFromSpinePath', () => {
    it('should read the first integer of a label', () => {
      expect(trackFromSpinePath('3')).toBe(3);
      expect(trackFromSpinePath('((12)a)b')).toBe(12);
      expect(trackFromSpinePath('(2)a 5')).toBe(2);
      expect(trackFromSpinePath('')).toBe(0);
    });
  });

  describe('mergeSpinePaths', () => {
    it('should collapse the two halves of one split to the parent', () => {
      expect(mergeSpinePaths(['(1)a', '(1)b'])).toBe('1');
      expect(mergeSpinePaths(['((2)a)a', '((2)a)b'])).toBe('(2)a');
    });

    it('should collapse exchanged halves of one split to the parent', () => {
      expect(mergeSpinePaths(['(1)b', '(1)a'])).toBe('1');
      expect(mergeSpinePaths(['((3)b)b', '((3)b)a'])).toBe('(3)b');
    });

    it('should concatenate labels of unrelated lineages', () => {
      expect(mergeSpinePaths(['1', '2'])).toBe('1 2');
      expect(mergeSpinePaths(['(1)a', '(2)b'])).toBe('(1)a (2)b');
      expect(mergeSpinePaths(['(1)a', '(1)a'])).toBe('(1)a (1)a');
    });

    it('should concatenate three or more labels', () => {
      expect(mergeSpinePaths(['((1)a)a', '((1)a)b', '(1)b'])).toBe('((1)a)a ((1)a)b (1)b');
    });
  });

  describe('advanceSpines', () => {
    it('should initialize one column per exclusive interpretation', () => {
      const file = createFile();
      const { state, error } = advanceAll(file, ['!! header', '**kern\t**dynam']);

      expect(error).toBeUndefined();
      expect(state.columns).toEqual([
        { dataType: '**kern', spinePath: '1' },
        { dataType: '**dynam', spinePath: '2' },
      ]);
      expect(file.tracks.starts).toEqual([null, 1, 2]);
      expect(file.tokens[2].track).toBe(2);
    });

    it('should reject data before the first exclusive interpretation', () => {
      const file = createFile();
      const { error } = advanceAll(file, ['!!!OTL: x', '4c']);

      expect(error?.code).toBe('DATA_BEFORE_EXCLUSIVE');
      expect(error?.line).toBe(2);
      expect(error?.field).toBe(0);
    });

    it('should reject a first line that mixes exclusive and other tokens', () => {
      const file = createFile();
      const { error } = advanceAll(file, ['**kern\t4c']);

      expect(error?.code).toBe('DATA_BEFORE_EXCLUSIVE');
      expect(error?.field).toBe(1);
    });

    it('should pass lines without manipulators straight through', () => {
      const file = createFile();
      const { state } = advanceAll(file, ['**kern\t**kern']);
      const before = state.columns;

      const line = appendLine(file, '4c\t4e');
      expect(advanceSpines(state, file, line)).toBeUndefined();
      expect(state.columns).toBe(before);
      expect(paths(file, 1)).toEqual(['1', '2']);
    });

    it('should report a column count mismatch with both line numbers', () => {
      const file = createFile();
      const { error } = advanceAll(file, ['**kern\t**kern', '4c\t4d', '4e']);

      expect(error?.code).toBe('FIELD_COUNT_MISMATCH');
      expect(error?.line).toBe(3);
      expect(error?.relatedLine).toBe(2);
      expect(error?.message).toBe(
        'Error on line 3: expected 2 fields after line 2, but found 1\nLine 2: 4c\t4d\nLine 3: 4e'
      );
    });

    it('should split one column into two labelled subspines', () => {
      const file = createFile();
      const { state, error } = advanceAll(file, ['**kern', '*^', '4c\t4e']);

      expect(error).toBeUndefined();
      expect(state.columns).toEqual([
        { dataType: '**kern', spinePath: '(1)a' },
        { dataType: '**kern', spinePath: '(1)b' },
      ]);
      expect(paths(file, 1)).toEqual(['1']);
      expect(paths(file, 2)).toEqual(['(1)a', '(1)b']);
    });

    it('should merge a run of merge tokens into one column', () => {
      const file = createFile();
      const { state, error } = advanceAll(file, ['**kern', '*^', '*^\t*', '4c\t4e\t4g', '*v\t*v\t*', '*v\t*v']);

      expect(error).toBeUndefined();
      expect(paths(file, 3)).toEqual(['((1)a)a', '((1)a)b', '(1)b']);
      expect(paths(file, 5)).toEqual(['(1)a', '(1)b']);
      expect(state.columns).toEqual([{ dataType: '**kern', spinePath: '1' }]);
    });

    it('should take the merged data type from the first column', () => {
      const file = createFile();
      const { state } = advanceAll(file, ['**kern\t**dynam', '*v\t*v']);

      expect(state.columns).toEqual([{ dataType: '**kern', spinePath: '1 2' }]);
    });

    it('should pass a lone merge token through', () => {
      const file = createFile();
      const { state, error } = advanceAll(file, ['**kern\t**kern', '*v\t*']);

      expect(error).toBeUndefined();
      expect(state.columns.map((c) => c.spinePath)).toEqual(['1', '2']);
    });

    it('should swap exchanged columns', () => {
      const file = createFile();
      const { state, error } = advanceAll(file, ['**kern\t**text\t**dynam', '*\t*x\t*x', 'a\tb\tc']);

      expect(error).toBeUndefined();
      expect(state.columns).toEqual([
        { dataType: '**kern', spinePath: '1' },
        { dataType: '**dynam', spinePath: '3' },
        { dataType: '**text', spinePath: '2' },
      ]);
      expect(file.lines[2].tokens.map((id) => file.tokens[id].track)).toEqual([1, 3, 2]);
    });

    it('should reject an exchange without a partner', () => {
      const file = createFile();
      const { error } = advanceAll(file, ['**kern\t**kern', '*x\t*']);

      expect(error?.code).toBe('UNMATCHED_EXCHANGE');
      expect(error?.line).toBe(2);
      expect(error?.field).toBe(0);
    });

    it('should reject an exchange in the last column', () => {
      const file = createFile();
      const { error } = advanceAll(file, ['**kern\t**kern', '*\t*x']);

      expect(error?.code).toBe('UNMATCHED_EXCHANGE');
      expect(error?.field).toBe(1);
    });

    it('should open a new track after a spine add', () => {
      const file = createFile();
      const { state, error } = advanceAll(file, ['**kern\t**dynam', '*+\t*', '*\t**text\t*']);

      expect(error).toBeUndefined();
      expect(file.tracks.starts).toEqual([null, 0, 1, 5]);
      expect(state.columns).toEqual([
        { dataType: '**kern', spinePath: '1' },
        { dataType: '**text', spinePath: '3' },
        { dataType: '**dynam', spinePath: '2' },
      ]);
      expect(file.tokens[5].track).toBe(3);
      expect(file.tokens[5].dataType).toBe('**text');
    });

    it('should keep an added track pending until its exclusive interpretation', () => {
      const file = createFile();
      const state = createSpineState();

      advanceSpines(state, file, appendLine(file, '**kern'));
      advanceSpines(state, file, appendLine(file, '*+'));
      expect(isTrackPending(file.tracks, 2)).toBe(true);
      expect(isTrackPending(file.tracks, 1)).toBe(false);

      expect(advanceSpines(state, file, appendLine(file, '*\t**text'))).toBeUndefined();
      expect(isTrackPending(file.tracks, 2)).toBe(false);
    });

    it('should require an exclusive interpretation after a spine add', () => {
      const file = createFile();
      const { error } = advanceAll(file, ['**kern', '*+', '*\t*']);

      expect(error?.code).toBe('MISSING_EXCLUSIVE_AFTER_ADD');
      expect(error?.line).toBe(3);
      expect(error?.field).toBe(1);
    });

    it('should report a spine add at the end of input', () => {
      const file = createFile();
      const { state, error } = advanceAll(file, ['**kern', '*+']);

      expect(error).toBeUndefined();
      const finished = finishSpines(state);
      expect(finished?.code).toBe('MISSING_EXCLUSIVE_AFTER_ADD');
      expect(finished?.line).toBe(2);
    });

    it('should reject an exclusive interpretation that was not prepared', () => {
      const file = createFile();
      const { error } = advanceAll(file, ['**kern', '**text']);

      expect(error?.code).toBe('UNPREPARED_EXCLUSIVE');
      expect(error?.line).toBe(2);
    });

    it('should record terminators against their own track', () => {
      const file = createFile();
      const { state, error } = advanceAll(file, ['**kern\t**dynam', '*\t*-', '*-']);

      expect(error).toBeUndefined();
      expect(file.tracks.ends).toEqual([[], [4], [3]]);
      expect(state.columns).toEqual([]);
    });
  });
});

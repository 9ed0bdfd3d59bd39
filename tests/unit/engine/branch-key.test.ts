import { describe, it, expect } from 'vitest';
import { classifyBranchKey, describeBranchKey } from '../../../src/engine/branch-key.js';
import { range } from '../../../src/engine/range.js';

enum Color {
  Red = 'red',
}

describe('classifyBranchKey', () => {
  it('classifies functions as predicates', () => {
    function isEven(v: unknown) {
      return typeof v === 'number' && v % 2 === 0;
    }
    const key = classifyBranchKey(isEven);
    expect(key.kind).toBe('predicate');
    if (key.kind === 'predicate') {
      expect(key.name).toBe('isEven');
      expect(key.test(4)).toBe(true);
    }
  });

  it('classifies [string, reference] pairs as operator keys', () => {
    expect(classifyBranchKey(['>=', 640])).toEqual({ kind: 'operator', symbol: '>=', reference: 640 });
    const r = range(1, 2);
    expect(classifyBranchKey(['in', r])).toEqual({ kind: 'operator', symbol: 'in', reference: r });
  });

  it('classifies everything else as literals', () => {
    expect(classifyBranchKey(Color.Red)).toEqual({ kind: 'literal', value: 'red' });
    expect(classifyBranchKey(true)).toEqual({ kind: 'literal', value: true });
    expect(classifyBranchKey([1, 2])).toEqual({ kind: 'literal', value: [1, 2] });
    expect(classifyBranchKey(['a', 'b', 'c'])).toEqual({ kind: 'literal', value: ['a', 'b', 'c'] });
    expect(classifyBranchKey(null)).toEqual({ kind: 'literal', value: null });
  });
});

describe('describeBranchKey', () => {
  it('renders each kind', () => {
    expect(describeBranchKey(classifyBranchKey(['in', ['US', 'Canada']]))).toBe('in ["US", "Canada"]');
    expect(describeBranchKey(classifyBranchKey('car'))).toBe('== "car"');
    expect(describeBranchKey(classifyBranchKey(() => true))).toBe('predicate anonymous');
  });
});

import { describe, it, expect } from 'vitest';
import { OperatorRegistry, DEFAULT_OPERATORS } from '../../../src/engine/operator-registry.js';
import { range, IntegerRange } from '../../../src/engine/range.js';
import { isDecisionTreeAuthoringError } from '../../../src/core/errors/authoring-error.js';

function captureAuthoringError(fn: () => unknown) {
  try {
    fn();
  } catch (e) {
    if (isDecisionTreeAuthoringError(e)) return e.issue;
    throw e;
  }
  throw new Error('expected an authoring error');
}

describe('OperatorRegistry', () => {
  const registry = new OperatorRegistry();
  const apply = (symbol: string, input: unknown, reference: unknown) => registry.lookup(symbol)(input, reference);

  it('starts with the default operators in order', () => {
    expect(registry.symbols()).toEqual(['==', '!=', '>', '>=', '<', '<=', 'in', 'not in', 'regex']);
    expect(DEFAULT_OPERATORS).toHaveLength(9);
  });

  it('can start empty', () => {
    expect(new OperatorRegistry({ empty: true }).symbols()).toEqual([]);
  });

  describe('equality', () => {
    it('compares structurally', () => {
      expect(apply('==', 640, 640)).toBe(true);
      expect(apply('==', [1, 2], [1, 2])).toBe(true);
      expect(apply('==', { a: 1 }, { a: 1 })).toBe(true);
      expect(apply('==', '640', 640)).toBe(false);
      expect(apply('!=', '640', 640)).toBe(true);
      expect(apply('!=', true, true)).toBe(false);
    });

    it('compares numbers by value so -0 equals 0 and NaN equals nothing', () => {
      expect(apply('==', -0, 0)).toBe(true);
      expect(apply('!=', -0, 0)).toBe(false);
      expect(apply('==', NaN, NaN)).toBe(false);
      expect(apply('!=', NaN, NaN)).toBe(true);
    });
  });

  describe('ordering', () => {
    it('compares numbers, strings and bigints', () => {
      expect(apply('<', 600, 640)).toBe(true);
      expect(apply('>=', 640, 640)).toBe(true);
      expect(apply('>', 640, 640)).toBe(false);
      expect(apply('<=', 10000, 10000)).toBe(true);
      expect(apply('<', 'apple', 'banana')).toBe(true);
      expect(apply('>', 5n, 4)).toBe(true);
    });

    it('is false for operands of unrelated types', () => {
      expect(apply('<', '600', 640)).toBe(false);
      expect(apply('>=', '600', 640)).toBe(false);
      expect(apply('<', null, 1)).toBe(false);
      expect(apply('>', [2], [1])).toBe(false);
    });
  });

  describe('membership', () => {
    it('tests arrays with structural equality', () => {
      expect(apply('in', 'US', ['US', 'Canada'])).toBe(true);
      expect(apply('in', [1, 2], [[1, 2], [3]])).toBe(true);
      expect(apply('not in', 'France', ['US', 'Canada'])).toBe(true);
      expect(apply('not in', 'US', ['US', 'Canada'])).toBe(false);
    });

    it('uses the same number equality as == for array members', () => {
      expect(apply('in', -0, [0, 1])).toBe(true);
      expect(apply('in', NaN, [NaN])).toBe(false);
      expect(apply('not in', NaN, [NaN])).toBe(true);
    });

    it('tests sets, map keys and ranges', () => {
      expect(apply('in', 'Canada', new Set(['US', 'Canada']))).toBe(true);
      expect(apply('in', 'k', new Map([['k', 1]]))).toBe(true);
      expect(apply('in', 1, new Map([['k', 1]]))).toBe(false);
      expect(apply('in', 135, range(130, 140))).toBe(true);
      expect(apply('in', 140, range(130, 140))).toBe(false);
      expect(apply('not in', 129, range(130, 140))).toBe(true);
    });

    it('treats a string reference as substring containment for string inputs only', () => {
      expect(apply('in', 'nad', 'Canada')).toBe(true);
      expect(apply('in', 1, '123')).toBe(false);
    });

    it('rejects references that are not containers', () => {
      const issue = captureAuthoringError(() => apply('in', 1, 42));
      expect(issue).toEqual({
        _tag: 'InvalidReference',
        symbol: 'in',
        reference: '42',
        message: 'Operator "in" cannot use 42 as a reference',
      });
      expect(captureAuthoringError(() => apply('not in', 1, null))._tag).toBe('InvalidReference');
    });
  });

  describe('regex', () => {
    it('requires a full match of the stringified input', () => {
      expect(apply('regex', 'A123', '[A-Z]\\d+')).toBe(true);
      expect(apply('regex', 'xA123', '[A-Z]\\d+')).toBe(false);
      expect(apply('regex', 'A123x', '[A-Z]\\d+')).toBe(false);
      expect(apply('regex', 42, '\\d{2}')).toBe(true);
    });

    it('accepts RegExp references and keeps their flags except global and sticky', () => {
      const pattern = /ab+/gi;
      expect(apply('regex', 'ABB', pattern)).toBe(true);
      expect(apply('regex', 'ABB', pattern)).toBe(true);
    });

    it('rejects non-pattern references', () => {
      expect(captureAuthoringError(() => apply('regex', 'x', 5))._tag).toBe('InvalidReference');
    });
  });

  describe('registration', () => {
    it('adds and overwrites operators', () => {
      const custom = new OperatorRegistry();
      custom.register('divisible_by', (a, b) => typeof a === 'number' && typeof b === 'number' && a % b === 0);
      expect(custom.has('divisible_by')).toBe(true);
      expect(custom.lookup('divisible_by')(10, 5)).toBe(true);

      custom.register('==', () => true);
      expect(custom.lookup('==')(1, 2)).toBe(true);
      expect(registry.lookup('==')(1, 2)).toBe(false);
    });

    it('throws UnknownOperator listing registered symbols', () => {
      const small = new OperatorRegistry({ empty: true }).register('==', () => true);
      const issue = captureAuthoringError(() => small.lookup('~='));
      expect(issue).toEqual({
        _tag: 'UnknownOperator',
        symbol: '~=',
        registered: ['=='],
        message: 'Unsupported operator "~=". Register it first (registered: ==).',
      });
    });
  });
});

describe('IntegerRange', () => {
  it('is half-open and integer-only', () => {
    const r = range(120, 130);
    expect(r.has(120)).toBe(true);
    expect(r.has(129)).toBe(true);
    expect(r.has(130)).toBe(false);
    expect(r.has(125.5)).toBe(false);
    expect(r.has('125')).toBe(false);
    expect(r.size).toBe(10);
  });

  it('renders and serializes', () => {
    expect(String(range(130, 140))).toBe('range(130, 140)');
    expect(JSON.stringify({ ref: range(1, 3) })).toBe('{"ref":{"range":[1,3]}}');
  });

  it('rejects fractional bounds', () => {
    expect(() => new IntegerRange(1.5, 3)).toThrow(RangeError);
  });
});

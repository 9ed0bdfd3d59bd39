import { isDeepStrictEqual } from 'node:util';
import { DecisionTreeAuthoringError } from '../core/errors/authoring-error.js';
import { Err } from '../core/errors/factories.js';
import { renderValue } from './render-value.js';

/**
 * Binary predicate applied as `predicate(input, reference)`.
 *
 * Predicates are trusted: whatever they throw reaches the caller of the
 * evaluator untouched.
 */
export type OperatorPredicate = (input: unknown, reference: unknown) => boolean;

/**
 * Read side of the registry, which is all the matcher needs.
 */
export interface OperatorLookup {
  lookup(symbol: string): OperatorPredicate;
}

// =============================================================================
// Default operators
// =============================================================================

/**
 * Value equality: primitives by `===` (so `-0` equals `0` and `NaN` equals
 * nothing), arrays and objects structurally.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (typeof a === 'object' && a !== null && typeof b === 'object' && b !== null) {
    return isDeepStrictEqual(a, b);
  }
  return a === b;
}

type Ordered = number | bigint | string;

function orderedPair(a: unknown, b: unknown): [Ordered, Ordered] | null {
  const numeric = (v: unknown): v is number | bigint => typeof v === 'number' || typeof v === 'bigint';
  if (numeric(a) && numeric(b)) return [a, b];
  if (typeof a === 'string' && typeof b === 'string') return [a, b];
  return null;
}

/**
 * Builds an ordering operator. Operands of unrelated types never compare,
 * so `"600" < 640` is false instead of relying on coercion.
 */
function ordering(compare: (a: Ordered, b: Ordered) => boolean): OperatorPredicate {
  return (input, reference) => {
    const pair = orderedPair(input, reference);
    return pair !== null && compare(pair[0], pair[1]);
  };
}

function membership(symbol: string): (input: unknown, reference: unknown) => boolean {
  return (input, reference) => {
    if (Array.isArray(reference)) {
      return reference.some((item) => valuesEqual(item, input));
    }
    if (typeof reference === 'string') {
      return typeof input === 'string' && reference.includes(input);
    }
    // Set, Map, IntegerRange and any other container exposing has()
    if (typeof reference === 'object' && reference !== null && 'has' in reference && typeof reference.has === 'function') {
      return Boolean(reference.has(input));
    }
    throw new DecisionTreeAuthoringError(Err.invalidReference(symbol, renderValue(reference)));
  };
}

function fullMatch(input: unknown, reference: unknown): boolean {
  let source: string;
  let flags = '';
  if (reference instanceof RegExp) {
    source = reference.source;
    flags = reference.flags.replace(/[gy]/g, '');
  } else if (typeof reference === 'string') {
    source = reference;
  } else {
    throw new DecisionTreeAuthoringError(Err.invalidReference('regex', renderValue(reference)));
  }
  return new RegExp(`^(?:${source})$`, flags).test(String(input));
}

const contains = membership('in');
const containsNot = membership('not in');

export const DEFAULT_OPERATORS: ReadonlyArray<readonly [string, OperatorPredicate]> = [
  ['==', valuesEqual],
  ['!=', (a, b) => !valuesEqual(a, b)],
  ['>', ordering((a, b) => a > b)],
  ['>=', ordering((a, b) => a >= b)],
  ['<', ordering((a, b) => a < b)],
  ['<=', ordering((a, b) => a <= b)],
  ['in', (a, b) => contains(a, b)],
  ['not in', (a, b) => !containsNot(a, b)],
  ['regex', fullMatch],
];

// =============================================================================
// Registry
// =============================================================================

export interface OperatorRegistryOptions {
  /** Start empty instead of with DEFAULT_OPERATORS */
  readonly empty?: boolean;
}

/**
 * Named binary predicates usable in `[symbol, reference]` branch keys.
 *
 * Write-once-then-read-many: register everything a tree needs before
 * evaluating it. Registering a symbol while evaluations that use it are in
 * flight is outside the contract.
 */
export class OperatorRegistry implements OperatorLookup {
  private readonly operators = new Map<string, OperatorPredicate>();

  constructor(options: OperatorRegistryOptions = {}) {
    if (!options.empty) {
      for (const [symbol, predicate] of DEFAULT_OPERATORS) {
        this.operators.set(symbol, predicate);
      }
    }
  }

  /** Inserts or overwrites. No arity or type checking. */
  register(symbol: string, predicate: OperatorPredicate): this {
    this.operators.set(symbol, predicate);
    return this;
  }

  /**
   * @throws DecisionTreeAuthoringError (UnknownOperator) when the symbol was never registered
   */
  lookup(symbol: string): OperatorPredicate {
    const predicate = this.operators.get(symbol);
    if (predicate === undefined) {
      throw new DecisionTreeAuthoringError(Err.unknownOperator(symbol, this.symbols()));
    }
    return predicate;
  }

  has(symbol: string): boolean {
    return this.operators.has(symbol);
  }

  /** Registered symbols in registration order. */
  symbols(): string[] {
    return [...this.operators.keys()];
  }
}

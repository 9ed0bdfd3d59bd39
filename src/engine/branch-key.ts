/**
 * Branch key classification.
 *
 * Every edge key is classified exactly once, when the tree is compiled.
 * The union is closed: adding a fourth kind breaks every exhaustive
 * switch over `kind` at compile time.
 */

import { renderValue } from './render-value.js';

export interface PredicateKey {
  readonly kind: 'predicate';
  readonly name: string;
  readonly test: (value: unknown) => unknown;
}

export interface OperatorKey {
  readonly kind: 'operator';
  readonly symbol: string;
  readonly reference: unknown;
}

export interface LiteralKey {
  readonly kind: 'literal';
  readonly value: unknown;
}

export type BranchKey = PredicateKey | OperatorKey | LiteralKey;

export function classifyBranchKey(raw: unknown): BranchKey {
  if (typeof raw === 'function') {
    const test = (value: unknown): unknown => raw(value);
    return { kind: 'predicate', name: raw.name || 'anonymous', test };
  }
  if (Array.isArray(raw) && raw.length === 2 && typeof raw[0] === 'string') {
    return { kind: 'operator', symbol: raw[0], reference: raw[1] };
  }
  return { kind: 'literal', value: raw };
}

export function describeBranchKey(key: BranchKey): string {
  switch (key.kind) {
    case 'predicate':
      return `predicate ${key.name}`;
    case 'operator':
      return `${key.symbol} ${renderValue(key.reference)}`;
    case 'literal':
      return `== ${renderValue(key.value)}`;
  }
}

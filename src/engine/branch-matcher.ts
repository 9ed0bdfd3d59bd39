import type { Branch } from './tree.js';
import type { BranchKey } from './branch-key.js';
import { valuesEqual, type OperatorLookup } from './operator-registry.js';
import { renderValue } from './render-value.js';

export type BranchMatch =
  | { readonly kind: 'matched'; readonly branch: Branch; readonly trace: readonly string[] }
  | { readonly kind: 'no_match'; readonly trace: readonly string[] };

interface Check {
  readonly accepted: boolean;
  readonly description: string;
}

function check(key: BranchKey, value: unknown, operators: OperatorLookup): Check {
  switch (key.kind) {
    case 'predicate':
      return {
        accepted: Boolean(key.test(value)),
        description: `predicate ${key.name}(${renderValue(value)})`,
      };
    case 'operator':
      return {
        accepted: Boolean(operators.lookup(key.symbol)(value, key.reference)),
        description: `${renderValue(value)} ${key.symbol} ${renderValue(key.reference)}`,
      };
    case 'literal':
      return {
        accepted: valuesEqual(value, key.value),
        description: `${renderValue(value)} == ${renderValue(key.value)}`,
      };
  }
}

/**
 * Picks the first branch, in authored order, whose key accepts `value`.
 *
 * Emits one trace entry per key tested, up to and including the match.
 * No match is a normal outcome; predicate and operator exceptions
 * (including unknown operator symbols) propagate.
 */
export function matchBranch(
  branches: readonly Branch[],
  value: unknown,
  subject: string,
  operators: OperatorLookup
): BranchMatch {
  const trace: string[] = [];
  for (const branch of branches) {
    const { accepted, description } = check(branch.key, value, operators);
    trace.push(`Checked ${subject}: ${description} → ${accepted ? 'matched' : 'no match'}`);
    if (accepted) {
      return { kind: 'matched', branch, trace };
    }
  }
  return { kind: 'no_match', trace };
}

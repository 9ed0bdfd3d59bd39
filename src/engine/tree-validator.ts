import type { UnknownOperatorError } from '../core/errors/app-error.js';
import { Err } from '../core/errors/factories.js';
import type { CompiledNode, DecisionTree } from './tree.js';

export interface OperatorCatalog {
  has(symbol: string): boolean;
  symbols(): string[];
}

export interface UnknownOperatorUse {
  /** Location of the question whose branch uses the operator */
  readonly location: string;
  readonly error: UnknownOperatorError;
}

/**
 * Lists operator symbols a compiled tree uses that the registry does not know.
 *
 * Evaluation would throw on reaching such a branch; this finds them all up
 * front without evaluating anything.
 */
export function findUnknownOperators(tree: DecisionTree, operators: OperatorCatalog): UnknownOperatorUse[] {
  const found: UnknownOperatorUse[] = [];
  walk(tree.root, '$', (node, location) => {
    if (node.kind !== 'question') return;
    node.branches.forEach((branch, i) => {
      if (branch.key.kind === 'operator' && !operators.has(branch.key.symbol)) {
        found.push({
          location: `${location}.branches[${i}]`,
          error: Err.unknownOperator(branch.key.symbol, operators.symbols()),
        });
      }
    });
  });
  return found;
}

export interface TreeStats {
  readonly questions: number;
  readonly leaves: number;
  readonly depth: number;
  readonly variables: readonly string[];
  readonly decisions: readonly string[];
}

export function collectTreeStats(tree: DecisionTree): TreeStats {
  let questions = 0;
  let leaves = 0;
  let depth = 0;
  const variables = new Set<string>();
  const decisions = new Set<string>();

  walk(tree.root, '$', (node, _location, level) => {
    depth = Math.max(depth, level);
    if (node.kind === 'leaf') {
      leaves++;
      decisions.add(node.decision);
      return;
    }
    questions++;
    if (node.variable !== undefined) variables.add(node.variable);
  });

  return { questions, leaves, depth, variables: [...variables], decisions: [...decisions] };
}

function walk(
  node: CompiledNode,
  location: string,
  visit: (node: CompiledNode, location: string, level: number) => void,
  level = 0
): void {
  visit(node, location, level);
  if (node.kind === 'question') {
    node.branches.forEach((branch, i) => walk(branch.target, `${location}.branches[${i}]`, visit, level + 1));
  }
}

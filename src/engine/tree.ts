/**
 * Decision tree model.
 *
 * Two layers:
 * - *Input* types describe trees as authors write them (nested data,
 *   branch keys in any of the three shapes).
 * - Compiled types are what the evaluator walks: nodes tagged by kind,
 *   branch keys classified, leaves split into decision and reason.
 */

import type { BranchKey } from './branch-key.js';

// =============================================================================
// Authoring format
// =============================================================================

/** Single-argument test; a truthy return selects the branch. */
export type Predicate = (value: unknown) => unknown;

/** `[operatorSymbol, reference]`, e.g. `['>=', 640]` or `['in', ['US', 'Canada']]` */
export type OperatorTuple = readonly [symbol: string, reference: unknown];

/** Any value compared by equality: enum members, scalars, objects. */
export type LiteralKey = string | number | boolean | bigint | symbol | null | object;

export type BranchKeyInput = Predicate | OperatorTuple | LiteralKey;

export type LeafInput = string | number | boolean;

/**
 * Ordered branches. Arrays of pairs and Maps both keep authoring order,
 * which decides which branch wins when several would match.
 */
export type BranchesInput =
  | ReadonlyArray<readonly [BranchKeyInput, TreeNodeInput]>
  | ReadonlyMap<BranchKeyInput, TreeNodeInput>;

export interface QuestionNodeInput {
  readonly question: string;
  /** Name of the input that answers this question */
  readonly variable?: string;
  readonly branches: BranchesInput;
}

export type TreeNodeInput = LeafInput | QuestionNodeInput;

// =============================================================================
// Compiled form
// =============================================================================

export interface LeafNode {
  readonly kind: 'leaf';
  readonly decision: string;
  readonly reason: string;
  /** Leaf text as authored */
  readonly text: string;
}

export interface Branch {
  readonly key: BranchKey;
  readonly target: CompiledNode;
}

export interface QuestionNode {
  readonly kind: 'question';
  readonly question: string;
  readonly variable?: string;
  readonly branches: readonly Branch[];
}

export type CompiledNode = LeafNode | QuestionNode;

export interface DecisionTree {
  readonly id: string;
  readonly root: CompiledNode;
}

// =============================================================================
// Evaluation
// =============================================================================

/** Named input values for one evaluation. Read-only for the duration of the call. */
export type EvaluationInputs = Readonly<Record<string, unknown>>;

export interface EvaluationResult {
  readonly decision: string;
  readonly reason: string;
  readonly path_taken: readonly string[];
}

export const ERROR_DECISION = 'Error';

export type {
  Predicate,
  OperatorTuple,
  LiteralKey,
  BranchKeyInput,
  LeafInput,
  BranchesInput,
  QuestionNodeInput,
  TreeNodeInput,
  LeafNode,
  Branch,
  QuestionNode,
  CompiledNode,
  DecisionTree,
  EvaluationInputs,
  EvaluationResult,
} from './tree.js';
export { ERROR_DECISION } from './tree.js';
export { classifyBranchKey, describeBranchKey } from './branch-key.js';
export type { BranchKey, PredicateKey, OperatorKey, LiteralKey as LiteralBranchKey } from './branch-key.js';
export { OperatorRegistry, DEFAULT_OPERATORS, valuesEqual } from './operator-registry.js';
export type { OperatorPredicate, OperatorLookup, OperatorRegistryOptions } from './operator-registry.js';
export { IntegerRange, range } from './range.js';
export { compileTree, compileUntrustedTree, parseLeaf, DEFAULT_REASON, LEAF_SEPARATOR } from './compile-tree.js';
export { findUnknownOperators, collectTreeStats } from './tree-validator.js';
export type { TreeStats, UnknownOperatorUse } from './tree-validator.js';
export { resolveInput, normalizeInputName } from './input-resolver.js';
export type { InputBindingMode, ResolvedInput } from './input-resolver.js';
export { matchBranch } from './branch-matcher.js';
export type { BranchMatch } from './branch-matcher.js';
export { DecisionTreeEvaluator, DEFAULT_EVALUATOR_OPTIONS } from './evaluator.js';
export type { EvaluatorOptions, EvaluationOutcome } from './evaluator.js';
export {
  evaluate,
  registerOperator,
  getDefaultOperatorRegistry,
  isCompiledTree,
  DEFAULT_ENGINE_OPTIONS,
} from './default-engine.js';
export { renderValue } from './render-value.js';

/**
 * Process-default engine behind the module-level `evaluate` and
 * `registerOperator` functions. The DI container shares the same registry,
 * so operators registered here are visible to container-built evaluators.
 *
 * Unlike the container, which reads BRANCHWISE_INPUT_BINDING, the module-level
 * engine falls back to question-text binding unless told otherwise: trees
 * authored without `variable` are its main audience.
 */

import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { compileTree } from './compile-tree.js';
import { DecisionTreeEvaluator, type EvaluatorOptions } from './evaluator.js';
import type { InputBindingMode } from './input-resolver.js';
import { OperatorRegistry, type OperatorPredicate } from './operator-registry.js';
import type { DecisionTree, EvaluationInputs, EvaluationResult, TreeNodeInput } from './tree.js';

export const DEFAULT_ENGINE_OPTIONS: EvaluatorOptions = {
  inputBinding: 'declared_or_substring',
};

const defaultOperators = new OperatorRegistry();
const evaluators = new Map<InputBindingMode, DecisionTreeEvaluator>();
let loggerFactory: PinoLoggerFactory | null = null;

export function getDefaultOperatorRegistry(): OperatorRegistry {
  return defaultOperators;
}

function getDefaultEvaluator(options: EvaluatorOptions): DecisionTreeEvaluator {
  let evaluator = evaluators.get(options.inputBinding);
  if (!evaluator) {
    loggerFactory ??= new PinoLoggerFactory();
    evaluator = new DecisionTreeEvaluator(defaultOperators, loggerFactory, options);
    evaluators.set(options.inputBinding, evaluator);
  }
  return evaluator;
}

/**
 * Extend the default registry. Must complete before any evaluation that
 * relies on `symbol` starts.
 */
export function registerOperator(symbol: string, predicate: OperatorPredicate): void {
  defaultOperators.register(symbol, predicate);
}

export function isCompiledTree(value: unknown): value is DecisionTree {
  return typeof value === 'object'
    && value !== null
    && 'root' in value
    && 'id' in value
    && !('question' in value);
}

/**
 * Evaluate a compiled tree, or an authored one (compiled on the fly).
 *
 * Pass `{ inputBinding: 'declared_only' }` to require a declared `variable`
 * on every question.
 */
export function evaluate(
  tree: DecisionTree | TreeNodeInput,
  inputs: EvaluationInputs,
  options: Partial<EvaluatorOptions> = {}
): EvaluationResult {
  const compiled = isCompiledTree(tree) ? tree : compileTree(tree);
  return getDefaultEvaluator({
    inputBinding: options.inputBinding ?? DEFAULT_ENGINE_OPTIONS.inputBinding,
  }).evaluate(compiled, inputs);
}

/**
 * Decision Tree Evaluator
 *
 * Walks a compiled tree from the root: resolve the input for the current
 * question, pick the first accepting branch, descend; stop at a leaf.
 *
 * Outcomes:
 * - leaf reached        → { decision, reason, path_taken }
 * - unanswered question → { decision: 'Error', ... } (input problem, returned)
 * - no branch accepts   → { decision: 'Error', ... } (input problem, returned)
 * - unknown operator / malformed tree / throwing predicate → thrown
 *
 * No state survives a call; the trace is local to it. The only shared
 * resource is the operator registry, which must be fully populated before
 * concurrent evaluations start.
 */

import { inject, injectable } from 'tsyringe';
import type { InputError } from '../core/errors/app-error.js';
import { Err } from '../core/errors/factories.js';
import type { ILoggerFactory, Logger } from '../core/logging/types.js';
import { DI } from '../di/tokens.js';
import { compileTree } from './compile-tree.js';
import { matchBranch } from './branch-matcher.js';
import { resolveInput, type InputBindingMode } from './input-resolver.js';
import type { OperatorLookup } from './operator-registry.js';
import { renderValue } from './render-value.js';
import {
  ERROR_DECISION,
  type DecisionTree,
  type EvaluationInputs,
  type EvaluationResult,
  type LeafNode,
  type TreeNodeInput,
} from './tree.js';

export interface EvaluatorOptions {
  readonly inputBinding: InputBindingMode;
}

export const DEFAULT_EVALUATOR_OPTIONS: EvaluatorOptions = {
  inputBinding: 'declared_only',
};

export type EvaluationOutcome =
  | { readonly kind: 'decided'; readonly leaf: LeafNode; readonly result: EvaluationResult }
  | { readonly kind: 'rejected'; readonly error: InputError; readonly result: EvaluationResult };

@injectable()
export class DecisionTreeEvaluator {
  private readonly logger: Logger;

  constructor(
    @inject(DI.Engine.Operators) private readonly operators: OperatorLookup,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory,
    @inject(DI.Engine.Options) private readonly options: EvaluatorOptions = DEFAULT_EVALUATOR_OPTIONS
  ) {
    this.logger = loggerFactory.create('DecisionTreeEvaluator');
  }

  evaluate(tree: DecisionTree, inputs: EvaluationInputs): EvaluationResult {
    return this.evaluateDetailed(tree, inputs).result;
  }

  /**
   * Compiles an authored tree and evaluates it. Prefer compiling once and
   * calling evaluate() when the same tree is evaluated repeatedly.
   */
  evaluateInput(input: TreeNodeInput, inputs: EvaluationInputs): EvaluationResult {
    return this.evaluate(compileTree(input), inputs);
  }

  evaluateDetailed(tree: DecisionTree, inputs: EvaluationInputs): EvaluationOutcome {
    const log = this.logger.child({ treeId: tree.id });
    log.debug({ inputNames: Object.keys(inputs), binding: this.options.inputBinding }, 'Evaluating tree');

    const trace: string[] = [];
    let node = tree.root;

    while (node.kind === 'question') {
      const resolved = resolveInput(node, inputs, this.options.inputBinding);
      if (resolved.isErr()) {
        return this.reject(log, resolved.error, trace);
      }

      const input = resolved.value;
      if (input.ambiguousWith.length > 0) {
        log.warn(
          { question: node.question, chosen: input.name, alsoMatched: input.ambiguousWith },
          'Several inputs match question text; using the first'
        );
      }

      const match = matchBranch(node.branches, input.value, input.subject, this.operators);
      trace.push(...match.trace);

      if (match.kind === 'no_match') {
        return this.reject(log, Err.noMatchingBranch(input.subject, renderValue(input.value)), trace);
      }
      node = match.branch.target;
    }

    log.debug({ decision: node.decision, steps: trace.length }, 'Reached decision');
    return {
      kind: 'decided',
      leaf: node,
      result: { decision: node.decision, reason: node.reason, path_taken: trace },
    };
  }

  private reject(log: Logger, error: InputError, trace: string[]): EvaluationOutcome {
    log.debug({ errorTag: error._tag }, error.message);
    return {
      kind: 'rejected',
      error,
      result: { decision: ERROR_DECISION, reason: error.message, path_taken: trace },
    };
  }
}

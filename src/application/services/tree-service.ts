import { inject, injectable } from 'tsyringe';
import { ok, err, type Result } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { InputError, TreeNotFoundError, ValidationFailedError } from '../../core/errors/app-error.js';
import { Err } from '../../core/errors/factories.js';
import { validateInputs } from '../../core/errors/boundary-validation.js';
import type { ILoggerFactory, Logger } from '../../core/logging/types.js';
import type { DecisionTreeEvaluator } from '../../engine/evaluator.js';
import type { EvaluationResult } from '../../engine/tree.js';
import { collectTreeStats, type TreeStats } from '../../engine/tree-validator.js';
import {
  toTreeSummary,
  type ITreeCatalog,
  type TreeDefinition,
  type TreeInputSpec,
  type TreeSummary,
} from '../../infrastructure/trees/types.js';
import { findClosestMatches } from '../../utils/string-similarity.js';

export interface TreeDescription {
  readonly summary: TreeSummary;
  readonly inputs: readonly TreeInputSpec[];
  readonly stats: TreeStats;
}

export type TreeEvaluation =
  | { readonly kind: 'decided'; readonly treeId: string; readonly result: EvaluationResult }
  | { readonly kind: 'rejected'; readonly treeId: string; readonly result: EvaluationResult; readonly error: InputError };

export type TreeServiceError = TreeNotFoundError | ValidationFailedError;

export interface TreeService {
  listTrees(): Promise<readonly TreeSummary[]>;
  describeTree(treeId: string): Promise<Result<TreeDescription, TreeNotFoundError>>;
  /**
   * Validates `rawInputs` against the tree's input schema, derives computed
   * inputs, then evaluates. A rejected evaluation (unanswered question, no
   * matching branch) is a successful call carrying an "Error" decision.
   */
  evaluateTree(treeId: string, rawInputs: unknown): Promise<Result<TreeEvaluation, TreeServiceError>>;
}

@injectable()
export class DefaultTreeService implements TreeService {
  private readonly logger: Logger;

  constructor(
    @inject(DI.Trees.Catalog) private readonly catalog: ITreeCatalog,
    @inject(DI.Engine.Evaluator) private readonly evaluator: DecisionTreeEvaluator,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('TreeService');
  }

  async listTrees(): Promise<readonly TreeSummary[]> {
    const definitions = await this.catalog.list();
    return definitions.map(toTreeSummary);
  }

  async describeTree(treeId: string): Promise<Result<TreeDescription, TreeNotFoundError>> {
    const found = await this.find(treeId);
    return found.map((definition) => ({
      summary: toTreeSummary(definition),
      inputs: definition.inputs,
      stats: collectTreeStats(definition.tree),
    }));
  }

  async evaluateTree(treeId: string, rawInputs: unknown): Promise<Result<TreeEvaluation, TreeServiceError>> {
    const found = await this.find(treeId);
    if (found.isErr()) return err(found.error);
    const definition = found.value;

    const validated = validateInputs(definition.inputSchema, rawInputs);
    if (validated.isErr()) {
      this.logger.debug({ treeId, issues: validated.error.issues }, 'Rejected tree inputs');
      return err(validated.error);
    }

    const inputs = definition.prepareInputs ? definition.prepareInputs(validated.value) : validated.value;
    const outcome = this.evaluator.evaluateDetailed(definition.tree, inputs);

    this.logger.info({ treeId, decision: outcome.result.decision, steps: outcome.result.path_taken.length }, 'Evaluated tree');

    const evaluation: TreeEvaluation =
      outcome.kind === 'decided'
        ? { kind: 'decided', treeId, result: outcome.result }
        : { kind: 'rejected', treeId, result: outcome.result, error: outcome.error };
    return ok(evaluation);
  }

  private async find(treeId: string): Promise<Result<TreeDefinition, TreeNotFoundError>> {
    const definition = await this.catalog.get(treeId);
    if (definition) return ok(definition);

    const ids = (await this.catalog.list()).map((d) => d.id);
    return err(Err.treeNotFound(treeId, findClosestMatches(treeId, ids), ids.length));
  }
}

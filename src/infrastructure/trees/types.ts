import type { z } from 'zod';
import type { DecisionTree, EvaluationInputs } from '../../engine/tree.js';

export type TreeInputType = 'integer' | 'number' | 'string' | 'boolean';

/**
 * One named input a tree expects, as shown by `describe` and validated
 * before evaluation.
 */
export interface TreeInputSpec {
  readonly name: string;
  readonly type: TreeInputType;
  readonly description: string;
  /** Allowed values (string inputs only) */
  readonly enum?: readonly [string, ...string[]];
  /** Defaults to true */
  readonly required?: boolean;
}

export type TreeInputSchema = z.ZodType<EvaluationInputs, z.ZodTypeDef, unknown>;

/**
 * Derives evaluation inputs from validated caller inputs, for trees whose
 * questions are answered by computed values (e.g. hemodynamic stability).
 */
export type PrepareInputs = (inputs: EvaluationInputs) => EvaluationInputs;

export type TreeOrigin =
  | { readonly kind: 'bundled' }
  | { readonly kind: 'file'; readonly path: string };

export interface TreeDefinition {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly tree: DecisionTree;
  readonly inputs: readonly TreeInputSpec[];
  readonly inputSchema: TreeInputSchema;
  readonly prepareInputs?: PrepareInputs;
  readonly origin: TreeOrigin;
}

export interface TreeSummary {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly origin: TreeOrigin;
}

/**
 * Read-only source of tree definitions.
 *
 * `list()` returns definitions sorted by id.
 */
export interface ITreeCatalog {
  list(): Promise<readonly TreeDefinition[]>;
  get(id: string): Promise<TreeDefinition | null>;
}

export function toTreeSummary(definition: TreeDefinition): TreeSummary {
  return {
    id: definition.id,
    title: definition.title,
    description: definition.description,
    origin: definition.origin,
  };
}

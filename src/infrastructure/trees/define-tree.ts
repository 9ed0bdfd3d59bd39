import { z } from 'zod';
import { compileTree } from '../../engine/compile-tree.js';
import type { TreeNodeInput } from '../../engine/tree.js';
import { assertNever } from '../../core/errors/type-guards.js';
import type {
  PrepareInputs,
  TreeDefinition,
  TreeInputSchema,
  TreeInputSpec,
  TreeOrigin,
} from './types.js';

export interface TreeDefinitionInput {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly tree: TreeNodeInput;
  readonly inputs: readonly TreeInputSpec[];
  readonly prepareInputs?: PrepareInputs;
  readonly origin?: TreeOrigin;
}

function inputFieldSchema(spec: TreeInputSpec): z.ZodTypeAny {
  const field = ((): z.ZodTypeAny => {
    switch (spec.type) {
      case 'integer':
        return z.number().int();
      case 'number':
        return z.number();
      case 'boolean':
        return z.boolean();
      case 'string':
        return spec.enum ? z.enum(spec.enum) : z.string();
      default:
        return assertNever(spec.type);
    }
  })().describe(spec.description);

  return spec.required === false ? field.optional() : field;
}

/**
 * Strict object schema: unknown input names are rejected so a typo does not
 * silently fall through to an unanswered question.
 */
export function buildInputSchema(inputs: readonly TreeInputSpec[]): TreeInputSchema {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const spec of inputs) {
    shape[spec.name] = inputFieldSchema(spec);
  }
  return z.object(shape).strict();
}

/**
 * Compile an authored tree and attach its metadata. Throws
 * DecisionTreeAuthoringError for malformed trees.
 */
export function defineTree(input: TreeDefinitionInput): TreeDefinition {
  return {
    id: input.id,
    title: input.title,
    description: input.description,
    tree: compileTree(input.tree, { id: input.id }),
    inputs: input.inputs,
    inputSchema: buildInputSchema(input.inputs),
    prepareInputs: input.prepareInputs,
    origin: input.origin ?? { kind: 'bundled' },
  };
}

/**
 * JSON tree documents.
 *
 * {
 *   "id": "bp-screen",
 *   "title": "...",
 *   "inputs": { "systolic": { "type": "integer", "description": "..." } },
 *   "tree": {
 *     "question": "What is the systolic pressure?",
 *     "variable": "systolic",
 *     "branches": [
 *       { "when": [">=", 140], "then": "High - Refer" },
 *       { "when": ["in", { "range": [120, 140] }], "then": "Elevated" },
 *       { "when": true, "then": "..." }
 *     ]
 *   }
 * }
 *
 * `when` is an operator tuple (`[symbol, reference]`) or any other JSON
 * value, compared literally. A `{ "range": [start, stop] }` reference
 * becomes a half-open IntegerRange.
 */

import { z } from 'zod';
import { Result, ok, err } from 'neverthrow';
import type { ParseFailedError } from '../../core/errors/app-error.js';
import { Err } from '../../core/errors/factories.js';
import { isDecisionTreeAuthoringError } from '../../core/errors/authoring-error.js';
import { validateJSONLoad } from '../../core/errors/boundary-validation.js';
import { range } from '../../engine/range.js';
import { collectTreeStats } from '../../engine/tree-validator.js';
import type { BranchKeyInput, OperatorTuple, TreeNodeInput } from '../../engine/tree.js';
import { defineTree } from './define-tree.js';
import type { TreeDefinition, TreeInputSpec, TreeOrigin } from './types.js';

// =============================================================================
// Schema
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export interface JsonBranch {
  readonly when: JsonValue;
  readonly then: JsonTreeNode;
}

export type JsonTreeNode =
  | string
  | {
      readonly question: string;
      readonly variable?: string;
      readonly branches: readonly JsonBranch[];
    };

const JsonTreeNodeSchema: z.ZodType<JsonTreeNode> = z.lazy(() =>
  z.union([
    z.string(),
    z
      .object({
        question: z.string().min(1),
        variable: z.string().min(1).optional(),
        branches: z.array(z.object({ when: JsonValueSchema, then: JsonTreeNodeSchema }).strict()).min(1),
      })
      .strict(),
  ])
);

const InputSpecSchema = z
  .object({
    type: z.enum(['integer', 'number', 'string', 'boolean']),
    description: z.string().default(''),
    enum: z.array(z.string()).nonempty().optional(),
    required: z.boolean().optional(),
  })
  .strict();

export const TREE_ID_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

const TreeDocumentSchema = z
  .object({
    id: z.string().regex(TREE_ID_PATTERN, 'id must be lowercase letters, digits and dashes'),
    title: z.string().min(1),
    description: z.string().default(''),
    inputs: z.record(InputSpecSchema).default({}),
    tree: JsonTreeNodeSchema,
  })
  .strict();

export type TreeDocument = z.infer<typeof TreeDocumentSchema>;

const RangeReferenceSchema = z
  .object({ range: z.tuple([z.number().int(), z.number().int()]) })
  .strict();

// =============================================================================
// Conversion
// =============================================================================

function toReference(reference: JsonValue): unknown {
  const asRange = RangeReferenceSchema.safeParse(reference);
  return asRange.success ? range(asRange.data.range[0], asRange.data.range[1]) : reference;
}

function toBranchKey(when: JsonValue): BranchKeyInput {
  if (Array.isArray(when) && when.length === 2) {
    const [symbol, reference] = when;
    if (typeof symbol === 'string') {
      const tuple: OperatorTuple = [symbol, toReference(reference)];
      return tuple;
    }
  }
  return when;
}

export function toTreeNodeInput(node: JsonTreeNode): TreeNodeInput {
  if (typeof node === 'string') return node;
  return {
    question: node.question,
    variable: node.variable,
    branches: node.branches.map((branch): readonly [BranchKeyInput, TreeNodeInput] => [
      toBranchKey(branch.when),
      toTreeNodeInput(branch.then),
    ]),
  };
}

function toInputSpecs(inputs: TreeDocument['inputs']): TreeInputSpec[] {
  return Object.entries(inputs).map(([name, spec]) => ({
    name,
    type: spec.type,
    description: spec.description,
    enum: spec.enum,
    required: spec.required,
  }));
}

/**
 * Turn parsed JSON into a tree definition. Authoring problems (empty
 * branches, undeclared variables) come back as ParseFailed.
 */
export function parseTreeDocument(
  data: unknown,
  source: string,
  origin: TreeOrigin = { kind: 'file', path: source }
): Result<TreeDefinition, ParseFailedError> {
  return validateJSONLoad(TreeDocumentSchema, data, source).andThen((doc): Result<TreeDefinition, ParseFailedError> => {
    let definition: TreeDefinition;
    try {
      definition = defineTree({
        id: doc.id,
        title: doc.title,
        description: doc.description,
        tree: toTreeNodeInput(doc.tree),
        inputs: toInputSpecs(doc.inputs),
        origin,
      });
    } catch (e) {
      if (isDecisionTreeAuthoringError(e)) {
        return err(Err.parseFailed(source, e.issue.message));
      }
      throw e;
    }

    const undeclared = collectTreeStats(definition.tree).variables.filter((v) => !(v in doc.inputs));
    if (undeclared.length > 0) {
      return err(Err.parseFailed(source, `variables not declared in inputs: ${undeclared.join(', ')}`));
    }

    return ok(definition);
  });
}

/**
 * Tree compiler: authoring format → immutable compiled tree.
 *
 * Runs once per tree, at load time. Does the work the evaluator should not
 * repeat per call: leaf recognition, leaf parsing, branch key
 * classification, shape checks and cycle detection.
 */

import { DecisionTreeAuthoringError } from '../core/errors/authoring-error.js';
import { Err } from '../core/errors/factories.js';
import { classifyBranchKey } from './branch-key.js';
import type { Branch, CompiledNode, DecisionTree, LeafNode, QuestionNode, TreeNodeInput } from './tree.js';

export const LEAF_SEPARATOR = ' - ';
export const DEFAULT_REASON = 'No specific reason provided.';

export interface CompileOptions {
  readonly id?: string;
}

/**
 * Split leaf text on the first `" - "`: decision before, reason after.
 */
export function parseLeaf(text: string): LeafNode {
  const at = text.indexOf(LEAF_SEPARATOR);
  const decision = at === -1 ? text : text.slice(0, at);
  const reason = at === -1 ? DEFAULT_REASON : text.slice(at + LEAF_SEPARATOR.length);
  return Object.freeze({ kind: 'leaf', decision, reason, text });
}

export function compileTree(input: TreeNodeInput, options: CompileOptions = {}): DecisionTree {
  return compileUntrustedTree(input, options);
}

/**
 * Same as compileTree, for values whose shape is not known statically
 * (parsed files, values built at run time).
 *
 * @throws DecisionTreeAuthoringError on malformed or cyclic trees
 */
export function compileUntrustedTree(input: unknown, options: CompileOptions = {}): DecisionTree {
  const root = compileNode(input, '$', new Set<object>());
  return Object.freeze({ id: options.id ?? 'anonymous', root });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isQuestionShaped(value: unknown): value is Record<string, unknown> {
  return isRecord(value) && ('question' in value || 'branches' in value);
}

function compileNode(value: unknown, location: string, ancestors: Set<object>): CompiledNode {
  if (isQuestionShaped(value)) {
    if (ancestors.has(value)) {
      throw new DecisionTreeAuthoringError(Err.cyclicTree(location));
    }
    ancestors.add(value);
    try {
      return compileQuestion(value, location, ancestors);
    } finally {
      ancestors.delete(value);
    }
  }
  return compileLeaf(value, location);
}

function compileQuestion(
  node: Record<string, unknown>,
  location: string,
  ancestors: Set<object>
): QuestionNode {
  const { question, variable, branches } = node;
  if (typeof question !== 'string') {
    throw new DecisionTreeAuthoringError(Err.malformedNode(location, '"question" must be text'));
  }
  if (variable !== undefined && typeof variable !== 'string') {
    throw new DecisionTreeAuthoringError(Err.malformedNode(location, '"variable" must be text when present'));
  }

  const entries = branchEntries(branches, location);
  if (entries.length === 0) {
    throw new DecisionTreeAuthoringError(Err.malformedNode(location, `question "${question}" has no branches`));
  }

  const compiled: Branch[] = entries.map(([key, child], i) =>
    Object.freeze({
      key: Object.freeze(classifyBranchKey(key)),
      target: compileNode(child, `${location}.branches[${i}]`, ancestors),
    })
  );

  return Object.freeze({
    kind: 'question',
    question,
    ...(variable !== undefined ? { variable } : {}),
    branches: Object.freeze(compiled),
  });
}

function branchEntries(branches: unknown, location: string): Array<readonly [unknown, unknown]> {
  if (branches instanceof Map) {
    return [...branches.entries()];
  }
  if (Array.isArray(branches)) {
    return branches.map((entry: unknown, i) => {
      if (!Array.isArray(entry) || entry.length !== 2) {
        throw new DecisionTreeAuthoringError(
          Err.malformedNode(`${location}.branches[${i}]`, 'each branch must be a [key, node] pair')
        );
      }
      return [entry[0], entry[1]] as const;
    });
  }
  throw new DecisionTreeAuthoringError(
    Err.malformedNode(location, '"branches" must be an array of [key, node] pairs or a Map')
  );
}

function compileLeaf(value: unknown, location: string): LeafNode {
  switch (typeof value) {
    case 'string':
      return parseLeaf(value);
    case 'number':
    case 'boolean':
    case 'bigint':
      return parseLeaf(String(value));
    case 'object':
      if (value !== null) {
        return parseLeaf(JSON.stringify(value) ?? String(value));
      }
      break;
  }
  throw new DecisionTreeAuthoringError(Err.malformedNode(location, `${String(value)} is neither a question nor a leaf`));
}

/**
 * Input Resolver - binds a question node to one of the supplied inputs.
 *
 * Declared binding (`variable` on the node) is authoritative. The substring
 * heuristic exists for trees authored before `variable` was introduced and
 * only runs in `declared_or_substring` mode. It is looser than a plain
 * `name.replace('_', ' ') in question` check: runs of `_`, `-` and whitespace
 * all fold to one space, and the comparison ignores case, so `Heart-Rate`
 * binds to "What is the heart rate?".
 * When several inputs match, the first in the inputs' own key order wins,
 * and that order is not something callers usually control, so ambiguous
 * matches are reported back for logging.
 */

import { Result, ok, err } from 'neverthrow';
import type { UnansweredQuestionError } from '../core/errors/app-error.js';
import { Err } from '../core/errors/factories.js';
import type { EvaluationInputs, QuestionNode } from './tree.js';

export type InputBindingMode =
  | 'declared_only'
  | 'declared_or_substring';

export interface ResolvedInput {
  readonly name: string;
  /** Human-readable name used in trace entries */
  readonly subject: string;
  readonly value: unknown;
  readonly via: 'declared' | 'substring';
  /** Other inputs the substring heuristic would also have accepted */
  readonly ambiguousWith: readonly string[];
}

export function normalizeInputName(name: string): string {
  return name.replace(/[\s_-]+/g, ' ').trim();
}

function lookupOwn(inputs: EvaluationInputs, name: string): { found: true; value: unknown } | { found: false } {
  if (!Object.prototype.hasOwnProperty.call(inputs, name)) return { found: false };
  const value = inputs[name];
  return value === undefined ? { found: false } : { found: true, value };
}

export function resolveInput(
  node: QuestionNode,
  inputs: EvaluationInputs,
  mode: InputBindingMode
): Result<ResolvedInput, UnansweredQuestionError> {
  if (node.variable !== undefined) {
    const hit = lookupOwn(inputs, node.variable);
    if (!hit.found) {
      return err(Err.unansweredQuestion(node.question, node.variable));
    }
    return ok({
      name: node.variable,
      subject: normalizeInputName(node.variable),
      value: hit.value,
      via: 'declared',
      ambiguousWith: [],
    });
  }

  if (mode === 'declared_only') {
    return err(Err.unansweredQuestion(node.question));
  }

  const question = node.question.toLowerCase();
  const candidates = Object.keys(inputs).filter((name) => {
    const normalized = normalizeInputName(name).toLowerCase();
    return normalized.length > 0 && inputs[name] !== undefined && question.includes(normalized);
  });

  const [first, ...rest] = candidates;
  if (first === undefined) {
    return err(Err.unansweredQuestion(node.question));
  }
  return ok({
    name: first,
    subject: normalizeInputName(first),
    value: inputs[first],
    via: 'substring',
    ambiguousWith: rest,
  });
}

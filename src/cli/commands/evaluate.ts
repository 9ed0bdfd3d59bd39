/**
 * Evaluate Command
 *
 * Runs a catalog tree against inputs given as `--input key=value` pairs
 * and/or a `--json` object. Values are read as JSON when they parse
 * (numbers, booleans, null, quoted strings) and as plain text otherwise.
 */

import { Result, ok, err } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import type { ValidationFailedError } from '../../core/errors/app-error.js';
import { Err } from '../../core/errors/factories.js';
import { formatAppError } from '../../core/errors/formatter.js';
import { isDecisionTreeAuthoringError } from '../../core/errors/authoring-error.js';
import type { TreeEvaluation, TreeServiceError } from '../../application/services/tree-service.js';

export type OutputFormat = 'text' | 'json';

export interface EvaluateCommandDeps {
  readonly evaluateTree: (treeId: string, inputs: unknown) => Promise<Result<TreeEvaluation, TreeServiceError>>;
}

export interface EvaluateCommandOptions {
  readonly input?: readonly string[];
  readonly json?: string;
  readonly format?: OutputFormat;
}

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (e) => (e instanceof Error ? e.message : String(e))
);

export function parseCliValue(raw: string): unknown {
  return parseJson(raw).unwrapOr(raw);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `--json` and `--input` values; `--input` wins on conflicts.
 */
export function collectInputs(options: EvaluateCommandOptions): Result<Record<string, unknown>, ValidationFailedError> {
  const inputs: Record<string, unknown> = {};

  if (options.json !== undefined) {
    const parsed = parseJson(options.json);
    if (parsed.isErr()) {
      return err(Err.validationFailed('--json', [parsed.error]));
    }
    if (!isPlainObject(parsed.value)) {
      return err(Err.validationFailed('--json', ['expected a JSON object']));
    }
    Object.assign(inputs, parsed.value);
  }

  const issues: string[] = [];
  for (const assignment of options.input ?? []) {
    const eq = assignment.indexOf('=');
    if (eq <= 0) {
      issues.push(`"${assignment}" is not of the form key=value`);
      continue;
    }
    inputs[assignment.slice(0, eq).trim()] = parseCliValue(assignment.slice(eq + 1));
  }

  return issues.length > 0 ? err(Err.validationFailed('--input', issues)) : ok(inputs);
}

function fromServiceError(error: TreeServiceError): CliResult {
  const formatted = formatAppError(error);
  return misuse(formatted.message, { details: formatted.details, suggestions: formatted.suggestions });
}

function toCliResult(evaluation: TreeEvaluation, format: OutputFormat): CliResult {
  const { result } = evaluation;

  if (format === 'json') {
    const raw = JSON.stringify(result, null, 2);
    return evaluation.kind === 'decided' ? success({ message: result.decision, raw }) : failure(result.decision, { raw });
  }

  const details = [
    `Reason: ${result.reason}`,
    ...(result.path_taken.length > 0 ? ['', 'Path:', ...result.path_taken.map((step) => `  ${step}`)] : []),
  ];

  return evaluation.kind === 'decided'
    ? success({ message: `Decision: ${result.decision}`, details })
    : failure(`Decision: ${result.decision}`, { details, suggestions: formatAppError(evaluation.error).suggestions });
}

export async function executeEvaluateCommand(
  treeId: string,
  options: EvaluateCommandOptions,
  deps: EvaluateCommandDeps
): Promise<CliResult> {
  const inputs = collectInputs(options);
  if (inputs.isErr()) {
    return fromServiceError(inputs.error);
  }

  let evaluated: Result<TreeEvaluation, TreeServiceError>;
  try {
    evaluated = await deps.evaluateTree(treeId, inputs.value);
  } catch (e) {
    // A tree file can name an operator nobody registered
    if (!isDecisionTreeAuthoringError(e)) throw e;
    const formatted = formatAppError(e.issue);
    return failure(formatted.message, { details: formatted.details, suggestions: formatted.suggestions });
  }
  if (evaluated.isErr()) {
    return fromServiceError(evaluated.error);
  }

  return toCliResult(evaluated.value, options.format ?? 'text');
}

/**
 * Validate Command
 *
 * Loads a JSON tree file and reports schema problems and operators that
 * are not registered.
 */

import type { Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { ParseFailedError } from '../../core/errors/app-error.js';
import { formatAppError } from '../../core/errors/formatter.js';
import { collectTreeStats, findUnknownOperators, type OperatorCatalog } from '../../engine/tree-validator.js';
import type { TreeDefinition } from '../../infrastructure/trees/types.js';

export interface ValidateCommandDeps {
  readonly loadTreeFile: (filePath: string) => PromiseLike<Result<TreeDefinition, ParseFailedError>>;
  readonly operators: OperatorCatalog;
}

export async function executeValidateCommand(filePath: string, deps: ValidateCommandDeps): Promise<CliResult> {
  const loaded = await deps.loadTreeFile(filePath);

  if (loaded.isErr()) {
    const formatted = formatAppError(loaded.error);
    return failure(`Tree validation failed: ${filePath}`, {
      details: formatted.details,
      suggestions: formatted.suggestions,
    });
  }

  const definition = loaded.value;
  const unknown = findUnknownOperators(definition.tree, deps.operators);
  if (unknown.length > 0) {
    return failure(`Tree validation failed: ${filePath}`, {
      details: unknown.map((use) => `${use.location}: ${use.error.message}`),
      suggestions: [`Use one of: ${deps.operators.symbols().join(', ')}`],
    });
  }

  const stats = collectTreeStats(definition.tree);
  return success({
    message: `Tree "${definition.id}" is valid: ${filePath}`,
    details: [
      `Questions: ${stats.questions}, outcomes: ${stats.leaves}, depth: ${stats.depth}`,
      `Inputs: ${definition.inputs.map((input) => input.name).join(', ') || '(none)'}`,
    ],
  });
}

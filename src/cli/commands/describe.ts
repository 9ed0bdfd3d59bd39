/**
 * Describe Command
 *
 * Shows a tree's metadata, inputs and shape.
 */

import type { Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, misuse } from '../types/cli-result.js';
import type { TreeNotFoundError } from '../../core/errors/app-error.js';
import { formatAppError } from '../../core/errors/formatter.js';
import type { TreeDescription } from '../../application/services/tree-service.js';
import type { TreeInputSpec } from '../../infrastructure/trees/types.js';
import { describeOrigin } from './list.js';

export interface DescribeCommandDeps {
  readonly describeTree: (treeId: string) => Promise<Result<TreeDescription, TreeNotFoundError>>;
}

export function describeInput(input: TreeInputSpec): string {
  const type = input.enum ? `${input.type}: ${input.enum.join(' | ')}` : input.type;
  const optional = input.required === false ? ', optional' : '';
  return `${input.name} (${type}${optional}) ${input.description}`.trimEnd();
}

export async function executeDescribeCommand(treeId: string, deps: DescribeCommandDeps): Promise<CliResult> {
  const described = await deps.describeTree(treeId);

  if (described.isErr()) {
    const formatted = formatAppError(described.error);
    return misuse(formatted.message, { suggestions: formatted.suggestions });
  }

  const { summary, inputs, stats } = described.value;
  return success({
    message: summary.title,
    details: [
      summary.description,
      `Source: ${describeOrigin(summary)}`,
      '',
      'Inputs:',
      ...inputs.map((input) => `  ${describeInput(input)}`),
      '',
      `Questions: ${stats.questions}, outcomes: ${stats.leaves}, depth: ${stats.depth}`,
    ],
  });
}

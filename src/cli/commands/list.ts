/**
 * List Command
 *
 * Lists every tree in the catalog.
 */

import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import type { TreeSummary } from '../../infrastructure/trees/types.js';

export interface ListCommandDeps {
  readonly listTrees: () => Promise<readonly TreeSummary[]>;
}

export interface ListCommandOptions {
  readonly verbose?: boolean;
}

export function describeOrigin(summary: TreeSummary): string {
  return summary.origin.kind === 'file' ? summary.origin.path : 'bundled';
}

export async function executeListCommand(
  deps: ListCommandDeps,
  options: ListCommandOptions = {}
): Promise<CliResult> {
  const trees = await deps.listTrees();

  if (trees.length === 0) {
    return success({
      message: 'No decision trees found',
      suggestions: ['Point BRANCHWISE_TREES_DIR at a directory of JSON trees'],
    });
  }

  const details = trees.flatMap((tree) => {
    const lines = [`${tree.id}  ${tree.title}`];
    if (options.verbose) {
      lines.push(`    ${tree.description}`, `    Source: ${describeOrigin(tree)}`);
    }
    return lines;
  });

  return success({
    message: `${trees.length} decision tree${trees.length === 1 ? '' : 's'} available`,
    details,
  });
}

#!/usr/bin/env node
/**
 * branchwise CLI - Composition Root
 *
 * Wires dependencies for each command and turns CliResult into process
 * termination. Command logic lives in src/cli/commands/*.ts.
 */

import 'dotenv/config';
import 'reflect-metadata';
import { Command, Option } from 'commander';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { TreeService } from './application/services/tree-service.js';
import type { FileTreeLoader } from './infrastructure/trees/file-tree-loader.js';
import type { OperatorRegistry } from './engine/operator-registry.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from './runtime/adapters/node-process-terminator.js';

import { interpretCliResult } from './cli/interpret-result.js';
import { printResult } from './cli/output-formatter.js';
import { failure } from './cli/types/cli-result.js';
import {
  executeListCommand,
  executeDescribeCommand,
  executeEvaluateCommand,
  executeValidateCommand,
  type OutputFormat,
} from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// COMPOSITION
// ═══════════════════════════════════════════════════════════════════════════

interface CliServices {
  readonly terminator: ProcessTerminator;
  readonly trees: TreeService;
}

function resolveServices(): CliServices {
  try {
    initializeContainer({ runtimeMode: { kind: 'cli' } });
  } catch (error) {
    // Container is unusable; terminate without it.
    printResult(failure(error instanceof Error ? error.message : String(error), { exitCode: { kind: 'misuse' } }));
    return new NodeProcessTerminator().terminate({ kind: 'usage_error' });
  }

  return {
    terminator: container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator),
    trees: container.resolve<TreeService>(DI.Services.Trees),
  };
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('branchwise')
  .description('Evaluate deterministic decision trees against named inputs')
  .version('0.1.0');

program
  .command('list')
  .description('List available decision trees')
  .option('-v, --verbose', 'Show descriptions and sources')
  .action(async (options: { verbose?: boolean }) => {
    const { terminator, trees } = resolveServices();
    const result = await executeListCommand({ listTrees: () => trees.listTrees() }, { verbose: options.verbose });
    interpretCliResult(result, terminator);
  });

program
  .command('describe <treeId>')
  .description('Show a tree and the inputs it expects')
  .action(async (treeId: string) => {
    const { terminator, trees } = resolveServices();
    const result = await executeDescribeCommand(treeId, { describeTree: (id) => trees.describeTree(id) });
    interpretCliResult(result, terminator);
  });

program
  .command('evaluate <treeId>')
  .description('Evaluate a tree and print the decision, reason and path')
  .option('-i, --input <key=value>', 'Input value (repeatable)', collect, [])
  .option('-j, --json <object>', 'Inputs as a JSON object')
  .addOption(new Option('-f, --format <format>', 'Output format').choices(['text', 'json']).default('text'))
  .action(async (treeId: string, options: { input: string[]; json?: string; format: OutputFormat }) => {
    const { terminator, trees } = resolveServices();
    const result = await executeEvaluateCommand(
      treeId,
      { input: options.input, json: options.json, format: options.format },
      { evaluateTree: (id, inputs) => trees.evaluateTree(id, inputs) }
    );
    interpretCliResult(result, terminator);
  });

program
  .command('validate <file>')
  .description('Check a JSON tree file for schema errors and unknown operators')
  .action(async (filePath: string) => {
    const { terminator } = resolveServices();
    const loader = container.resolve<FileTreeLoader>(DI.Trees.FileLoader);
    const operators = container.resolve<OperatorRegistry>(DI.Engine.Operators);

    const result = await executeValidateCommand(filePath, {
      loadTreeFile: (p) => loader.loadFile(p),
      operators,
    });
    interpretCliResult(result, terminator);
  });

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

await program.parseAsync();

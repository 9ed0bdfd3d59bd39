import { describe, it, expect } from 'vitest';
import { ok, err } from 'neverthrow';
import {
  collectInputs,
  executeEvaluateCommand,
  parseCliValue,
  type EvaluateCommandDeps,
} from '../../../src/cli/commands/evaluate.js';
import { Err } from '../../../src/core/errors/factories.js';
import { DefaultTreeService, type TreeEvaluation } from '../../../src/application/services/tree-service.js';
import { DecisionTreeEvaluator } from '../../../src/engine/evaluator.js';
import { OperatorRegistry } from '../../../src/engine/operator-registry.js';
import { InMemoryTreeCatalog } from '../../../src/infrastructure/trees/in-memory-tree-catalog.js';
import { parseTreeDocument } from '../../../src/infrastructure/trees/tree-document.js';
import { FakeLoggerFactory } from '../../helpers/FakeLoggerFactory.js';

function fakeDeps(evaluation: TreeEvaluation, calls: unknown[] = []): EvaluateCommandDeps {
  return {
    evaluateTree: async (_treeId, inputs) => {
      calls.push(inputs);
      return ok(evaluation);
    },
  };
}

const declined: TreeEvaluation = {
  kind: 'decided',
  treeId: 'loan-decision',
  result: {
    decision: 'Declined',
    reason: 'Credit score too low',
    path_taken: ['Checked credit score: 600 < 640 → matched'],
  },
};

const unanswered: TreeEvaluation = {
  kind: 'rejected',
  treeId: 'loan-purpose',
  result: { decision: 'Error', reason: 'Question "Q?" could not be answered with supplied arguments.', path_taken: [] },
  error: Err.unansweredQuestion('Q?', 'credit_score'),
};

describe('parseCliValue', () => {
  it('reads JSON scalars and falls back to text', () => {
    expect(parseCliValue('640')).toBe(640);
    expect(parseCliValue('true')).toBe(true);
    expect(parseCliValue('"640"')).toBe('640');
    expect(parseCliValue('car')).toBe('car');
    expect(parseCliValue('')).toBe('');
  });
});

describe('collectInputs', () => {
  it('merges --json with --input, letting --input win', () => {
    expect(
      collectInputs({ json: '{"credit_score": 600, "income": 1}', input: ['income=50000', 'purpose=car'] })._unsafeUnwrap()
    ).toEqual({ credit_score: 600, income: 50000, purpose: 'car' });
  });

  it('keeps everything after the first = as the value', () => {
    expect(collectInputs({ input: ['pattern=a=b'] })._unsafeUnwrap()).toEqual({ pattern: 'a=b' });
  });

  it('rejects assignments without a key', () => {
    const error = collectInputs({ input: ['=5', 'income'] })._unsafeUnwrapErr();
    expect(error.field).toBe('--input');
    expect(error.issues).toEqual(['"=5" is not of the form key=value', '"income" is not of the form key=value']);
  });

  it('rejects --json that is not an object', () => {
    expect(collectInputs({ json: '[1, 2]' })._unsafeUnwrapErr().issues).toEqual(['expected a JSON object']);
    expect(collectInputs({ json: '{' })._unsafeUnwrapErr().field).toBe('--json');
  });
});

describe('executeEvaluateCommand', () => {
  it('prints the decision, reason and path', async () => {
    const calls: unknown[] = [];
    const result = await executeEvaluateCommand('loan-decision', { input: ['credit_score=600'] }, fakeDeps(declined, calls));

    expect(calls).toEqual([{ credit_score: 600 }]);
    expect(result).toEqual({
      kind: 'success',
      output: {
        message: 'Decision: Declined',
        details: ['Reason: Credit score too low', '', 'Path:', '  Checked credit score: 600 < 640 → matched'],
      },
    });
  });

  it('emits the raw result as JSON', async () => {
    const result = await executeEvaluateCommand('loan-decision', { format: 'json' }, fakeDeps(declined));
    expect(result.kind === 'success' && result.output?.raw).toBe(JSON.stringify(declined.result, null, 2));
  });

  it('fails with exit code 1 on an Error decision', async () => {
    const result = await executeEvaluateCommand('loan-purpose', {}, fakeDeps(unanswered));

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'general_error' },
      output: {
        message: 'Decision: Error',
        details: ['Reason: Question "Q?" could not be answered with supplied arguments.'],
        suggestions: ['Provide "credit_score"'],
        raw: undefined,
      },
    });
  });

  it('treats unknown trees as misuse', async () => {
    const result = await executeEvaluateCommand('loan', {}, {
      evaluateTree: async () => err(Err.treeNotFound('loan', ['loan-decision'], 4)),
    });

    expect(result.kind).toBe('failure');
    expect(result.kind === 'failure' && result.exitCode).toEqual({ kind: 'misuse' });
    expect(result.output?.suggestions).toEqual(['Try "loan-decision"']);
  });

  it('does not call the service when inputs cannot be parsed', async () => {
    const calls: unknown[] = [];
    const result = await executeEvaluateCommand('loan-decision', { input: ['oops'] }, fakeDeps(declined, calls));

    expect(calls).toEqual([]);
    expect(result.kind === 'failure' && result.exitCode).toEqual({ kind: 'misuse' });
  });

  it('reports trees that use an unregistered operator as a general error', async () => {
    const definition = parseTreeDocument(
      {
        id: 'approx',
        title: 'Approximate match',
        inputs: { score: { type: 'integer', description: 'Score' } },
        tree: {
          question: 'What is the score?',
          variable: 'score',
          branches: [{ when: ['~', 1], then: 'Close' }],
        },
      },
      'approx.json'
    )._unsafeUnwrap();
    const loggerFactory = new FakeLoggerFactory();
    const operators = new OperatorRegistry();
    const trees = new DefaultTreeService(
      new InMemoryTreeCatalog([definition]),
      new DecisionTreeEvaluator(operators, loggerFactory),
      loggerFactory
    );

    const result = await executeEvaluateCommand('approx', { input: ['score=1'] }, {
      evaluateTree: (id, inputs) => trees.evaluateTree(id, inputs),
    });

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'general_error' },
      output: {
        message: `Unsupported operator "~". Register it first (registered: ${operators.symbols().join(', ')}).`,
        details: [`Registered operators: ${operators.symbols().join(', ')}`],
        suggestions: ['Register "~" before evaluating trees that use it'],
        raw: undefined,
      },
    });
  });

  it('lets other exceptions through', async () => {
    await expect(
      executeEvaluateCommand('loan-decision', {}, {
        evaluateTree: async () => {
          throw new TypeError('boom');
        },
      })
    ).rejects.toThrow('boom');
  });
});

import { describe, it, expect } from 'vitest';
import { ok, err } from 'neverthrow';
import { executeListCommand } from '../../../src/cli/commands/list.js';
import { describeInput, executeDescribeCommand } from '../../../src/cli/commands/describe.js';
import { Err } from '../../../src/core/errors/factories.js';
import type { TreeSummary } from '../../../src/infrastructure/trees/types.js';

const summaries: TreeSummary[] = [
  { id: 'blood-pressure', title: 'Blood pressure category', description: 'Classifies readings.', origin: { kind: 'bundled' } },
  { id: 'triage', title: 'Triage', description: 'Local tree.', origin: { kind: 'file', path: '/srv/trees/triage.json' } },
];

describe('executeListCommand', () => {
  it('lists ids and titles', async () => {
    expect(await executeListCommand({ listTrees: async () => summaries })).toEqual({
      kind: 'success',
      output: {
        message: '2 decision trees available',
        details: ['blood-pressure  Blood pressure category', 'triage  Triage'],
      },
    });
  });

  it('adds descriptions and sources when verbose', async () => {
    const result = await executeListCommand({ listTrees: async () => summaries.slice(1) }, { verbose: true });
    expect(result.output?.message).toBe('1 decision tree available');
    expect(result.output?.details).toEqual(['triage  Triage', '    Local tree.', '    Source: /srv/trees/triage.json']);
  });

  it('suggests configuring a directory when the catalog is empty', async () => {
    const result = await executeListCommand({ listTrees: async () => [] });
    expect(result.output?.message).toBe('No decision trees found');
  });
});

describe('describeInput', () => {
  it('shows type, allowed values and optionality', () => {
    expect(
      describeInput({ name: 'purpose', type: 'string', description: 'Loan purpose', enum: ['home', 'car'], required: false })
    ).toBe('purpose (string: home | car, optional) Loan purpose');
    expect(describeInput({ name: 'age', type: 'integer', description: '' })).toBe('age (integer)');
  });
});

describe('executeDescribeCommand', () => {
  it('shows metadata, inputs and shape', async () => {
    const result = await executeDescribeCommand('blood-pressure', {
      describeTree: async () =>
        ok({
          summary: summaries[0],
          inputs: [{ name: 'systolic_blood_pressure', type: 'integer', description: 'Systolic' }],
          stats: { questions: 2, leaves: 6, depth: 2, variables: [], decisions: [] },
        }),
    });

    expect(result).toEqual({
      kind: 'success',
      output: {
        message: 'Blood pressure category',
        details: [
          'Classifies readings.',
          'Source: bundled',
          '',
          'Inputs:',
          '  systolic_blood_pressure (integer) Systolic',
          '',
          'Questions: 2, outcomes: 6, depth: 2',
        ],
      },
    });
  });

  it('reports unknown trees as misuse with suggestions', async () => {
    const result = await executeDescribeCommand('blood', {
      describeTree: async () => err(Err.treeNotFound('blood', ['blood-pressure'], 2)),
    });
    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'misuse' },
      output: {
        message: 'Tree "blood" not found. Did you mean: blood-pressure?',
        details: undefined,
        suggestions: ['Try "blood-pressure"'],
        raw: undefined,
      },
    });
  });
});

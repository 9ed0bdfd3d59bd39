import { describe, it, expect } from 'vitest';
import { buildInputSchema, defineTree } from '../../../src/infrastructure/trees/define-tree.js';
import { isDecisionTreeAuthoringError } from '../../../src/core/errors/authoring-error.js';

describe('buildInputSchema', () => {
  const schema = buildInputSchema([
    { name: 'age', type: 'integer', description: 'Age in years' },
    { name: 'weight', type: 'number', description: 'Weight in kg' },
    { name: 'member', type: 'boolean', description: 'Member?', required: false },
    { name: 'plan', type: 'string', description: 'Plan', enum: ['basic', 'plus'], required: false },
  ]);

  it('accepts values of the declared types', () => {
    expect(schema.parse({ age: 30, weight: 72.5, plan: 'plus' })).toEqual({ age: 30, weight: 72.5, plan: 'plus' });
  });

  it('rejects fractional integers', () => {
    expect(schema.safeParse({ age: 30.5, weight: 70 }).success).toBe(false);
  });

  it('rejects missing required inputs and allows missing optional ones', () => {
    expect(schema.safeParse({ age: 30 }).success).toBe(false);
    expect(schema.safeParse({ age: 30, weight: 70 }).success).toBe(true);
  });

  it('rejects values outside an enum', () => {
    expect(schema.safeParse({ age: 30, weight: 70, plan: 'gold' }).success).toBe(false);
  });

  it('rejects unknown input names', () => {
    expect(schema.safeParse({ age: 30, weight: 70, agee: 31 }).success).toBe(false);
  });
});

describe('defineTree', () => {
  it('compiles the tree under the definition id', () => {
    const definition = defineTree({
      id: 'adult',
      title: 'Adult',
      description: 'Age check',
      tree: { question: 'Age?', variable: 'age', branches: [[['>=', 18], 'Adult']] },
      inputs: [{ name: 'age', type: 'integer', description: 'Age' }],
    });

    expect(definition.tree.id).toBe('adult');
    expect(definition.origin).toEqual({ kind: 'bundled' });
    expect(definition.tree.root.kind).toBe('question');
  });

  it('throws for malformed trees', () => {
    let caught: unknown;
    try {
      defineTree({
        id: 'broken',
        title: 'Broken',
        description: '',
        tree: { question: 'Age?', branches: [] },
        inputs: [],
      });
    } catch (e) {
      caught = e;
    }
    expect(isDecisionTreeAuthoringError(caught)).toBe(true);
  });
});

import { describe, it, expect } from 'vitest';
import { compileTree } from '../../../src/engine/compile-tree.js';
import { OperatorRegistry } from '../../../src/engine/operator-registry.js';
import { collectTreeStats, findUnknownOperators } from '../../../src/engine/tree-validator.js';
import { LOAN_DECISION_TREE } from '../../../src/trees/loan.js';

describe('findUnknownOperators', () => {
  it('finds nothing in a tree that only uses default operators', () => {
    expect(findUnknownOperators(compileTree(LOAN_DECISION_TREE), new OperatorRegistry())).toEqual([]);
  });

  it('reports every unregistered symbol with its location', () => {
    const tree = compileTree({
      question: 'Score?',
      variable: 'score',
      branches: [
        [['~', 5], 'Close'],
        [
          ['>', 5],
          {
            question: 'Tier?',
            variable: 'tier',
            branches: [
              ['gold', 'Gold'],
              [['starts with', 'plat'], 'Platinum'],
            ],
          },
        ],
      ],
    });

    const found = findUnknownOperators(tree, new OperatorRegistry({ empty: true }).register('>', (a, b) => a === b));

    expect(found.map(f => f.location)).toEqual(['$.branches[0]', '$.branches[1].branches[1]']);
    expect(found.map(f => f.error.symbol)).toEqual(['~', 'starts with']);
    expect(found[0]?.error.registered).toEqual(['>']);
  });

  it('ignores predicates and literals', () => {
    const tree = compileTree({
      question: 'Flag?',
      variable: 'flag',
      branches: [
        [(v: unknown) => v === true, 'Yes'],
        [false, 'No'],
      ],
    });
    expect(findUnknownOperators(tree, new OperatorRegistry({ empty: true }))).toEqual([]);
  });
});

describe('collectTreeStats', () => {
  it('counts questions, leaves, depth, variables and decisions', () => {
    expect(collectTreeStats(compileTree(LOAN_DECISION_TREE))).toEqual({
      questions: 3,
      leaves: 4,
      depth: 3,
      variables: ['credit_score', 'income', 'requested_amount'],
      decisions: ['Declined', 'Approved'],
    });
  });

  it('treats a bare leaf as a depth-zero tree', () => {
    expect(collectTreeStats(compileTree('Approved - Always'))).toEqual({
      questions: 0,
      leaves: 1,
      depth: 0,
      variables: [],
      decisions: ['Approved'],
    });
  });
});

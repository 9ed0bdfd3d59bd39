import type { QuestionNodeInput } from '../engine/tree.js';
import { defineTree } from '../infrastructure/trees/define-tree.js';

/**
 * Loan eligibility from credit score, annual income and requested amount.
 */
export const LOAN_DECISION_TREE: QuestionNodeInput = {
  question: 'What is your credit score?',
  variable: 'credit_score',
  branches: [
    [['<', 640], 'Declined - Credit score too low'],
    [
      ['>=', 640],
      {
        question: 'What is your annual income?',
        variable: 'income',
        branches: [
          [
            ['<', 50000],
            {
              question: 'What is the requested loan amount?',
              variable: 'requested_amount',
              branches: [
                [['<=', 10000], 'Approved - Small loan with moderate income'],
                [['>', 10000], 'Declined - Loan amount too high for income'],
              ],
            },
          ],
          [['>=', 50000], 'Approved - Strong income and credit score'],
        ],
      },
    ],
  ],
};

export const loanDecisionDefinition = defineTree({
  id: 'loan-decision',
  title: 'Loan decision',
  description: 'Determines loan eligibility by checking credit score, income and requested amount against fixed rules.',
  tree: LOAN_DECISION_TREE,
  inputs: [
    { name: 'credit_score', type: 'integer', description: "The applicant's credit score, e.g. 720" },
    { name: 'income', type: 'integer', description: "The applicant's total annual income, e.g. 65000" },
    { name: 'requested_amount', type: 'integer', description: 'The total loan amount requested' },
  ],
});

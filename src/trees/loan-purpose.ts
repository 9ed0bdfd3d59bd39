import type { QuestionNodeInput } from '../engine/tree.js';
import { defineTree } from '../infrastructure/trees/define-tree.js';

export enum LoanPurpose {
  Home = 'home',
  Car = 'car',
  Education = 'education',
}

export const DOMESTIC_STUDY_COUNTRIES: ReadonlySet<string> = new Set(['US', 'Canada']);

/**
 * Purpose-specific loan rules. Purpose branches are enum literals; the
 * education branch tests country membership.
 */
export const LOAN_PURPOSE_TREE: QuestionNodeInput = {
  question: 'What is the loan purpose?',
  variable: 'purpose',
  branches: [
    [LoanPurpose.Home, 'Declined - Mortgages not offered'],
    [
      LoanPurpose.Car,
      {
        question: 'What is your credit score?',
        variable: 'credit_score',
        branches: [
          [['<', 600], 'Declined - Credit too low for auto loan'],
          [['>=', 600], 'Approved - Auto loan'],
        ],
      },
    ],
    [
      LoanPurpose.Education,
      {
        question: 'Which country is your university located in?',
        variable: 'country',
        branches: [
          [['in', DOMESTIC_STUDY_COUNTRIES], 'Approved - Domestic study'],
          [['not in', DOMESTIC_STUDY_COUNTRIES], 'Declined - Foreign study'],
        ],
      },
    ],
  ],
};

export const loanPurposeDefinition = defineTree({
  id: 'loan-purpose',
  title: 'Loan by purpose',
  description: 'Determines loan eligibility by purpose, with credit and country checks where they apply.',
  tree: LOAN_PURPOSE_TREE,
  inputs: [
    {
      name: 'purpose',
      type: 'string',
      description: "The purpose of the loan, e.g. 'home', 'car', 'education'",
      enum: [LoanPurpose.Home, LoanPurpose.Car, LoanPurpose.Education],
    },
    { name: 'credit_score', type: 'integer', description: "The applicant's credit score", required: false },
    { name: 'country', type: 'string', description: "The university's country, e.g. 'US'", required: false },
  ],
});

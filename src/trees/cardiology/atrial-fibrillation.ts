import type { QuestionNodeInput } from '../../engine/tree.js';
import { defineTree } from '../../infrastructure/trees/define-tree.js';
import { withHemodynamicStability } from './hemodynamics.js';

// Rate control pathway adapted from the 2023 AHA/ACC/ACCP/HRS guideline
export const ATRIAL_FIBRILLATION_TREE: QuestionNodeInput = {
  question: 'Hemodynamically stable?',
  variable: 'hemodynamically_stable',
  branches: [
    [['==', false], 'Direct current cardioversion (1)'],
    [
      ['==', true],
      {
        question: 'Decompensated HF?',
        variable: 'decompensated_heart_failure',
        branches: [
          [
            ['==', false],
            {
              question: 'Are beta blockers, verapamil, or diltiazem (1) contraindicated?',
              variable: 'beta_blockers_contraindicated',
              branches: [
                [['==', false], 'Continue current medications.'],
                [
                  ['==', true],
                  {
                    question: 'Is Digoxin (2a) contraindicated?',
                    variable: 'digoxin_contraindicated',
                    branches: [
                      [['==', false], 'Digoxin'],
                      [
                        ['==', true],
                        {
                          question: 'Is Amiodarone (2b) contraindicated?',
                          variable: 'amiodarone_contraindicated',
                          branches: [
                            [['==', false], 'Amiodarone'],
                            [['==', true], 'Consider alternative therapies.'],
                          ],
                        },
                      ],
                    ],
                  },
                ],
              ],
            },
          ],
          [
            ['==', true],
            {
              question: 'Is IV Amiodarone (2b) contraindicated?',
              variable: 'amiodarone_contraindicated',
              branches: [
                [['==', false], 'IV Amiodarone'],
                [['==', true], 'That leaves Verapamil, diltiazem (3: Harm)'],
              ],
            },
          ],
        ],
      },
    ],
  ],
};

export const atrialFibrillationDefinition = defineTree({
  id: 'atrial-fibrillation',
  title: 'Atrial fibrillation management',
  description: 'Recommends a treatment for atrial fibrillation from vitals, heart failure status and contraindications.',
  tree: ATRIAL_FIBRILLATION_TREE,
  inputs: [
    { name: 'systolic_blood_pressure', type: 'integer', description: "The patient's systolic blood pressure, e.g. 128" },
    { name: 'diastolic_blood_pressure', type: 'integer', description: "The patient's diastolic blood pressure, e.g. 78" },
    { name: 'heart_rate', type: 'integer', description: "The patient's heart rate, e.g. 75" },
    { name: 'decompensated_heart_failure', type: 'boolean', description: 'Is the patient in decompensated heart failure?' },
    {
      name: 'beta_blockers_contraindicated',
      type: 'boolean',
      description: 'Are beta blockers, verapamil, or diltiazem contraindicated?',
    },
    { name: 'digoxin_contraindicated', type: 'boolean', description: 'Is Digoxin contraindicated?' },
    { name: 'amiodarone_contraindicated', type: 'boolean', description: 'Is Amiodarone (oral or IV) contraindicated?' },
  ],
  prepareInputs: withHemodynamicStability,
});

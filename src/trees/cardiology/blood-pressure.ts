import type { QuestionNodeInput } from '../../engine/tree.js';
import { range } from '../../engine/range.js';
import { defineTree } from '../../infrastructure/trees/define-tree.js';

const CRISIS = 'Hypertensive crisis - Seek emergency care immediately';

// Categories adapted from the ACC/AHA 2017 guideline
export const BLOOD_PRESSURE_TREE: QuestionNodeInput = {
  question: 'What is your diastolic blood pressure?',
  variable: 'diastolic_blood_pressure',
  branches: [
    [['>=', 120], CRISIS],
    [
      ['<', 120],
      {
        question: 'What is your systolic blood pressure?',
        variable: 'systolic_blood_pressure',
        branches: [
          [['>=', 180], CRISIS],
          [['>=', 140], 'Hypertension Stage 2 - Discuss medication and lifestyle changes with a clinician'],
          [['in', range(130, 140)], 'Hypertension Stage 1 - Lifestyle changes and possible medication (clinician-guided)'],
          [['in', range(120, 130)], 'Elevated blood pressure - Adopt heart-healthy lifestyle'],
          [['<', 120], 'Normal blood pressure - Maintain current healthy habits'],
        ],
      },
    ],
  ],
};

export const bloodPressureDefinition = defineTree({
  id: 'blood-pressure',
  title: 'Blood pressure category',
  description: 'Classifies blood pressure from systolic and diastolic readings and gives a recommendation.',
  tree: BLOOD_PRESSURE_TREE,
  inputs: [
    { name: 'systolic_blood_pressure', type: 'integer', description: "The patient's systolic blood pressure, e.g. 128" },
    { name: 'diastolic_blood_pressure', type: 'integer', description: "The patient's diastolic blood pressure, e.g. 78" },
  ],
});

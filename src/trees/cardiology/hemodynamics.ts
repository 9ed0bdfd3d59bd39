import type { EvaluationInputs } from '../../engine/tree.js';

export const HYPOTENSION_SYSTOLIC_MMHG = 90;
export const HYPOTENSION_MAP_MMHG = 65;
export const TACHYCARDIA_BPM = 100;
export const SHOCK_INDEX_LIMIT = 0.7;

/** MAP = (2 × diastolic + systolic) / 3 */
export function meanArterialPressure(systolic: number, diastolic: number): number {
  return (2 * diastolic + systolic) / 3;
}

/**
 * Stable when neither hypotensive nor tachycardic and the shock index
 * (heart rate / systolic) is below 0.7.
 */
export function hemodynamicStability(systolic: number, diastolic: number, heartRate: number): boolean {
  const hypotension =
    systolic < HYPOTENSION_SYSTOLIC_MMHG || meanArterialPressure(systolic, diastolic) < HYPOTENSION_MAP_MMHG;
  const tachycardia = heartRate > TACHYCARDIA_BPM;
  const shockIndex = heartRate / systolic;

  return !hypotension && !tachycardia && shockIndex < SHOCK_INDEX_LIMIT;
}

/**
 * Adds `hemodynamically_stable` derived from the vitals. Inputs without
 * numeric vitals pass through unchanged.
 */
export function withHemodynamicStability(inputs: EvaluationInputs): EvaluationInputs {
  const {
    systolic_blood_pressure: systolic,
    diastolic_blood_pressure: diastolic,
    heart_rate: heartRate,
  } = inputs;
  if (typeof systolic !== 'number' || typeof diastolic !== 'number' || typeof heartRate !== 'number') {
    return inputs;
  }
  return { ...inputs, hemodynamically_stable: hemodynamicStability(systolic, diastolic, heartRate) };
}

import { PARAMETER_NAMES } from '../../contracts/parameters.ids';
import type { ParameterSet, WeightTable } from '../../contracts/PerformanceModelV1';
import { DEFAULT_WEIGHTS } from '../schema/PerformanceModelConfig';
import { clampParameter } from '../utils/parameters';

export const SCORE_MIN = 0;
export const SCORE_MAX = 100;

/**
 * Weighted pass probability for a confirmed parameter set.
 *
 *   score = clamp( Σ params[p] * weights[p], 0, 100 )
 *
 * Terms are summed in parameter order so repeated runs produce
 * bit-identical results.
 */
export function computePassProbability(
  params: Readonly<ParameterSet>,
  weights: Readonly<WeightTable> = DEFAULT_WEIGHTS,
): number {
  const raw = PARAMETER_NAMES.reduce((acc, name) => acc + params[name] * weights[name], 0);
  return clampParameter(raw, SCORE_MIN, SCORE_MAX);
}

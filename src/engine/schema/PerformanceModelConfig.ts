import { z } from 'zod';
import type { WeightTable } from '../../contracts/PerformanceModelV1';
import { getEnvVar } from '../../lib/env';
import { clampParameter, toFiniteNumber } from '../utils/parameters';

/**
 * Default contribution of each parameter to the pass probability.
 * Difficulty is negative: a harder subject lowers the pass chance.
 */
export const DEFAULT_WEIGHTS: WeightTable = {
  preparedness: 0.3,
  teaching: 0.3,
  materials: 0.2,
  participation: 0.15,
  difficulty: -0.05,
};

export const DEFAULT_PARAMETER_VALUE = 50;
export const DEFAULT_STORAGE_PATH = 'subject_parameters.json';
export const DEFAULT_TREND_WINDOW = 5;

const WeightTableSchema = z.object({
  preparedness: z.number().finite(),
  teaching: z.number().finite(),
  materials: z.number().finite(),
  participation: z.number().finite(),
  difficulty: z.number().finite(),
});

export const PerformanceModelConfigSchema = z.object({
  /** Where confirmed parameters are persisted. */
  storagePath: z.string().min(1),
  /** Value used for any parameter that is missing or unreadable. */
  defaultValue: z.number().min(0).max(100),
  weights: WeightTableSchema,
  /** Number of most recent points the trend line is fitted over. */
  trendWindow: z.number().int().min(2),
});

export type PerformanceModelConfig = z.infer<typeof PerformanceModelConfigSchema>;

export const DEFAULT_MODEL_CONFIG: PerformanceModelConfig = {
  storagePath: DEFAULT_STORAGE_PATH,
  defaultValue: DEFAULT_PARAMETER_VALUE,
  weights: DEFAULT_WEIGHTS,
  trendWindow: DEFAULT_TREND_WINDOW,
};

function readEnvOverrides(): Partial<PerformanceModelConfig> {
  const overrides: Partial<PerformanceModelConfig> = {};

  const storagePath = getEnvVar('SUBJECT_PARAMETERS_PATH')?.trim();
  if (storagePath) {
    overrides.storagePath = storagePath;
  }

  const defaultValue = toFiniteNumber(getEnvVar('SUBJECT_DEFAULT_VALUE'));
  if (defaultValue !== null) {
    overrides.defaultValue = clampParameter(defaultValue);
  }

  return overrides;
}

/**
 * Merge built-in defaults, environment variables and explicit overrides
 * (later wins), then validate the result.
 *
 * @throws {z.ZodError} when an override is out of range.
 */
export function resolveModelConfig(
  overrides: Partial<PerformanceModelConfig> = {},
): PerformanceModelConfig {
  return PerformanceModelConfigSchema.parse({
    ...DEFAULT_MODEL_CONFIG,
    ...readEnvOverrides(),
    ...overrides,
  });
}

import type { ParameterName } from './parameters.ids';

/** One value per parameter, each in [0, 100]. */
export type ParameterSet = Record<ParameterName, number>;

/** Per-parameter contribution to the pass-probability score. */
export type WeightTable = Record<ParameterName, number>;

export interface ScorePoint {
  /** Monotonically increasing step, starting at 0 after a reset. */
  timeStep: number;
  /** Clamped pass probability in [0, 100]. */
  score: number;
}

export type PassFailLabel =
  | 'No data'
  | 'High pass chance'
  | 'Likely to pass'
  | 'Borderline'
  | 'Risk of failing'
  | 'High fail chance';

export interface PassFailPrediction {
  label: PassFailLabel;
  /** Colour tokens passed straight through to presentation. */
  foreground: string;
  background: string;
}

export type TrendLabel =
  | 'Not enough data'
  | 'Rapid improvement'
  | 'Improving'
  | 'Stable'
  | 'Declining'
  | 'Rapid decline';

export interface TrendPrediction {
  label: TrendLabel;
  /** Arrow or chart glyph; empty when there is not enough data. */
  symbol: string;
  color: string;
  /** Least-squares slope over the trend window, or null with fewer than 2 points. */
  slope: number | null;
}

export type ImportResult =
  | { success: true; message: string; importedCount: number }
  | { success: false; message: string };

/**
 * Contract the presentation layer drives the model through.
 * Every method is synchronous.
 */
export interface PerformanceModelPort {
  getPending(param: ParameterName): number;
  setPending(param: ParameterName, value: number): void;
  /** Change log, or null when nothing differs. */
  confirm(): string | null;
  currentScore(): number | null;
  classification(): PassFailPrediction;
  trend(): TrendPrediction;
  series(): readonly ScorePoint[];
  importFile(filePath: string): ImportResult;
  shutdown(): void;
}

import type { PassFailLabel, PassFailPrediction } from '../../contracts/PerformanceModelV1';

// ─── Band definitions ─────────────────────────────────────────────────────────

export interface PassFailBand {
  label: Exclude<PassFailLabel, 'No data'>;
  /** Inclusive lower bound (the lowest band uses -Infinity). */
  minScore: number;
  foreground: string;
  background: string;
}

/** Ordered highest first; the first band whose minScore the score reaches wins. */
export const PASS_FAIL_BANDS: readonly PassFailBand[] = [
  { label: 'High pass chance', minScore: 70, foreground: 'green', background: '#ddffdd' },
  { label: 'Likely to pass', minScore: 60, foreground: 'darkgreen', background: '#eeffee' },
  { label: 'Borderline', minScore: 50, foreground: 'blue', background: '#ffffdd' },
  { label: 'Risk of failing', minScore: 40, foreground: 'orange', background: '#ffeeee' },
  { label: 'High fail chance', minScore: -Infinity, foreground: 'red', background: '#ffdddd' },
];

export const NO_DATA_PREDICTION: PassFailPrediction = {
  label: 'No data',
  foreground: 'black',
  background: 'gray',
};

/** Finite band fences, highest first (70, 60, 50, 40). Used for chart threshold lines. */
export const PASS_FAIL_THRESHOLDS: readonly number[] = PASS_FAIL_BANDS
  .map(b => b.minScore)
  .filter(Number.isFinite);

// ─── Classification ───────────────────────────────────────────────────────────

export function classifyPassProbability(score: number): PassFailPrediction {
  const band = PASS_FAIL_BANDS.find(b => score >= b.minScore) ?? PASS_FAIL_BANDS[PASS_FAIL_BANDS.length - 1];
  return { label: band.label, foreground: band.foreground, background: band.background };
}

/**
 * Classify the most recent score of a series.
 * Returns the neutral "No data" prediction for an empty series.
 */
export function runPassFailModule(scores: readonly number[]): PassFailPrediction {
  if (scores.length === 0) {
    return NO_DATA_PREDICTION;
  }
  return classifyPassProbability(scores[scores.length - 1]);
}

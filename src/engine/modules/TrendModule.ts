import type { ScorePoint, TrendLabel, TrendPrediction } from '../../contracts/PerformanceModelV1';
import { DEFAULT_TREND_WINDOW } from '../schema/PerformanceModelConfig';

// ─── Constants ────────────────────────────────────────────────────────────────

interface TrendBucket {
  label: Exclude<TrendLabel, 'Not enough data'>;
  /** Slope must be strictly greater than this; the last bucket catches the rest. */
  slopeAbove: number;
  symbol: string;
  color: string;
}

/**
 * Every test is a strict `>`, so a slope sitting exactly on a fence
 * (1.5, 0.5, −0.5, −1.5) lands in the less extreme bucket below it.
 */
const TREND_BUCKETS: readonly TrendBucket[] = [
  { label: 'Rapid improvement', slopeAbove: 1.5, symbol: '📈', color: 'green' },
  { label: 'Improving', slopeAbove: 0.5, symbol: '↗', color: 'darkgreen' },
  { label: 'Stable', slopeAbove: -0.5, symbol: '↔', color: 'blue' },
  { label: 'Declining', slopeAbove: -1.5, symbol: '↘', color: 'orange' },
  { label: 'Rapid decline', slopeAbove: -Infinity, symbol: '📉', color: 'red' },
];

export const NOT_ENOUGH_DATA: TrendPrediction = {
  label: 'Not enough data',
  symbol: '',
  color: 'black',
  slope: null,
};

// ─── Helpers ──────────────────────────────────────────────────────────────────

/**
 * Ordinary least-squares slope of a degree-1 fit through `points`.
 * Returns null when fewer than two points are given or every x is equal.
 */
export function leastSquaresSlope(points: readonly ScorePoint[]): number | null {
  const n = points.length;
  if (n < 2) return null;

  const meanX = points.reduce((acc, p) => acc + p.timeStep, 0) / n;
  const meanY = points.reduce((acc, p) => acc + p.score, 0) / n;

  let sxy = 0;
  let sxx = 0;
  for (const p of points) {
    const dx = p.timeStep - meanX;
    sxy += dx * (p.score - meanY);
    sxx += dx * dx;
  }

  return sxx === 0 ? null : sxy / sxx;
}

export function classifySlope(slope: number): TrendPrediction {
  const bucket = TREND_BUCKETS.find(b => slope > b.slopeAbove) ?? TREND_BUCKETS[TREND_BUCKETS.length - 1];
  return { label: bucket.label, symbol: bucket.symbol, color: bucket.color, slope };
}

// ─── Main Module ──────────────────────────────────────────────────────────────

/**
 * Estimate the short-window trend of a score series.
 *
 * Fits a least-squares line through the last `window` points (or all of them
 * when the series is shorter) and buckets its slope.
 */
export function runTrendModule(
  series: readonly ScorePoint[],
  window: number = DEFAULT_TREND_WINDOW,
): TrendPrediction {
  if (series.length < 2) {
    return NOT_ENOUGH_DATA;
  }

  const slope = leastSquaresSlope(series.slice(-window));
  return slope === null ? NOT_ENOUGH_DATA : classifySlope(slope);
}

/**
 * Tests for the presentation components' helpers and static rendering.
 */
import { describe, it, expect } from 'vitest';
import { renderToStaticMarkup } from 'react-dom/server';
import PredictionPanel from '../../components/PredictionPanel';
import { buildChartDomain } from '../../components/PassProbabilityChart';
import { classifyPassProbability, NO_DATA_PREDICTION } from '../modules/PassFailModule';
import { classifySlope, NOT_ENOUGH_DATA } from '../modules/TrendModule';

// ─── buildChartDomain ─────────────────────────────────────────────────────────

describe('buildChartDomain', () => {
  it('uses [0, 2] for an empty or single-point series', () => {
    expect(buildChartDomain([])).toEqual([0, 2]);
    expect(buildChartDomain([{ timeStep: 0, score: 45 }])).toEqual([0, 2]);
  });

  it('leaves one step of headroom past the last point', () => {
    const series = [0, 1, 2, 3].map(timeStep => ({ timeStep, score: 50 }));
    expect(buildChartDomain(series)).toEqual([0, 4]);
  });
});

// ─── PredictionPanel ──────────────────────────────────────────────────────────

describe('PredictionPanel', () => {
  it('renders score, band, trend and pending changes', () => {
    const html = renderToStaticMarkup(
      <PredictionPanel
        score={72.5}
        prediction={classifyPassProbability(72.5)}
        trend={classifySlope(2)}
        lastUpdatedAt={null}
        pendingChanges={['teaching']}
      />,
    );
    expect(html).toContain('Pass Probability: 72.5%');
    expect(html).toContain('Prediction: High pass chance');
    expect(html).toContain('Trend: Rapid improvement 📈');
    expect(html).toContain('Pending changes: teaching');
    expect(html).toContain('background:#ddffdd');
  });

  it('renders placeholders without a score', () => {
    const html = renderToStaticMarkup(
      <PredictionPanel score={null} prediction={NO_DATA_PREDICTION} trend={NOT_ENOUGH_DATA} lastUpdatedAt={null} />,
    );
    expect(html).toContain('Pass Probability: -');
    expect(html).toContain('Prediction: -');
    expect(html).toContain('Trend: -');
    expect(html).toContain('Last update: Never');
    expect(html).toContain('No pending changes');
  });
});

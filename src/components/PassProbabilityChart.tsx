import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
  ReferenceLine,
} from 'recharts';
import type { ScorePoint } from '../contracts/PerformanceModelV1';
import { PASS_FAIL_BANDS, PASS_FAIL_THRESHOLDS } from '../engine/modules/PassFailModule';

export interface PassProbabilityChartProps {
  series: readonly ScorePoint[];
  height?: number;
}

/**
 * X-axis domain for the series: one step of headroom past the last point,
 * or [0, 2] while there is at most one point.
 */
// eslint-disable-next-line react-refresh/only-export-components
export function buildChartDomain(series: readonly ScorePoint[]): [number, number] {
  if (series.length <= 1) return [0, 2];
  const maxStep = series.reduce((max, p) => Math.max(max, p.timeStep), 0);
  return [0, maxStep + 1];
}

function thresholdColor(threshold: number): string {
  return PASS_FAIL_BANDS.find(b => b.minScore === threshold)?.foreground ?? '#a0aec0';
}

export default function PassProbabilityChart({ series, height = 320 }: PassProbabilityChartProps) {
  const data = series.map(p => ({ timeStep: p.timeStep, score: Number(p.score.toFixed(2)) }));

  return (
    <ResponsiveContainer width="100%" height={height}>
      <LineChart data={data} margin={{ top: 10, right: 20, left: 0, bottom: 10 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" />
        <XAxis
          dataKey="timeStep"
          type="number"
          domain={buildChartDomain(series)}
          allowDecimals={false}
          tick={{ fontSize: 10 }}
          label={{ value: 'Time Steps', position: 'insideBottom', offset: -4, fontSize: 11 }}
        />
        <YAxis
          domain={[0, 100]}
          tick={{ fontSize: 10 }}
          label={{ value: 'Pass Probability (%)', angle: -90, position: 'insideLeft', fontSize: 11 }}
        />
        <Tooltip
          contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }}
          formatter={value => [`${String(value)}%`, 'Pass probability']}
        />
        {PASS_FAIL_THRESHOLDS.map(t => (
          <ReferenceLine key={t} y={t} stroke={thresholdColor(t)} strokeDasharray="4 4" strokeOpacity={0.4} />
        ))}
        <Line
          type="linear"
          dataKey="score"
          stroke="#3182ce"
          strokeWidth={2}
          dot={{ r: 3 }}
          isAnimationActive={false}
        />
      </LineChart>
    </ResponsiveContainer>
  );
}

/**
 * PredictionPanel
 *
 * Read-only summary of the model: latest pass probability, pass/fail band
 * (coloured with the band's tokens), short-window trend and last update time.
 */
import type { PassFailPrediction, TrendPrediction } from '../contracts/PerformanceModelV1';
import { formatLastUpdate, formatPassProbability, formatPendingChanges } from '../engine/utils/format';

export interface PredictionPanelProps {
  score: number | null;
  prediction: PassFailPrediction;
  trend: TrendPrediction;
  lastUpdatedAt: Date | null;
  /** Names of parameters edited but not yet confirmed. */
  pendingChanges?: readonly string[];
}

export default function PredictionPanel({
  score,
  prediction,
  trend,
  lastUpdatedAt,
  pendingChanges = [],
}: PredictionPanelProps) {
  const hasScore = score !== null;

  return (
    <section style={{ border: '1px solid #e2e8f0', borderRadius: 8, padding: '10px 14px' }}>
      <p style={{ margin: '0 0 8px', fontSize: '0.8rem', color: pendingChanges.length > 0 ? 'blue' : 'gray' }}>
        {formatPendingChanges(pendingChanges)}
      </p>
      <h3 style={{ margin: '0 0 8px', fontSize: '0.95rem' }}>Pass/Fail Prediction</h3>
      <p style={{ margin: '4px 0', color: hasScore ? prediction.foreground : undefined }}>
        {formatPassProbability(score)}
      </p>
      <p style={{
        margin: '4px 0',
        padding: 5,
        fontWeight: 700,
        color: hasScore ? prediction.foreground : undefined,
        background: hasScore ? prediction.background : 'white',
      }}>
        Prediction: {hasScore ? prediction.label : '-'}
      </p>
      <p style={{ margin: '4px 0', color: hasScore ? trend.color : undefined }}>
        Trend: {hasScore ? `${trend.label}${trend.symbol ? ` ${trend.symbol}` : ''}` : '-'}
      </p>
      <p style={{ margin: '4px 0', fontSize: '0.8rem', color: '#718096' }}>
        {formatLastUpdate(lastUpdatedAt)}
      </p>
    </section>
  );
}

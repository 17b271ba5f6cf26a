export { SubjectPerformanceModel } from './engine/SubjectPerformanceModel';
export type { SubjectPerformanceModelOptions } from './engine/SubjectPerformanceModel';
export {
  DEFAULT_MODEL_CONFIG,
  DEFAULT_WEIGHTS,
  resolveModelConfig,
} from './engine/schema/PerformanceModelConfig';
export type { PerformanceModelConfig } from './engine/schema/PerformanceModelConfig';
export { FileParameterStore } from './engine/storage/ParameterStore';
export type { ParameterStore } from './engine/storage/ParameterStore';
export { computePassProbability } from './engine/modules/ScoringModule';
export { classifyPassProbability, PASS_FAIL_BANDS, PASS_FAIL_THRESHOLDS } from './engine/modules/PassFailModule';
export { classifySlope, leastSquaresSlope, runTrendModule } from './engine/modules/TrendModule';
export { resolveImportFormat, validateImportPath } from './engine/import/ImportFormat';
export type { ImportFormat } from './engine/import/ImportFormat';
export { BulkImportError } from './engine/import/BulkImportError';
export { formatLastUpdate, formatPassProbability, formatPendingChanges } from './engine/utils/format';
export { PARAMETER_LABELS, PARAMETER_NAMES } from './contracts/parameters.ids';
export type { ParameterName } from './contracts/parameters.ids';
export type * from './contracts/PerformanceModelV1';
export { default as PassProbabilityChart, buildChartDomain } from './components/PassProbabilityChart';
export { default as PredictionPanel } from './components/PredictionPanel';
export { createLogger, getLogger } from './lib/logger';

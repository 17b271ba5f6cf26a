import { PARAMETER_NAMES, isParameterName } from '../contracts/parameters.ids';
import type { ParameterName } from '../contracts/parameters.ids';
import type {
  ImportResult,
  ParameterSet,
  PassFailPrediction,
  PerformanceModelPort,
  ScorePoint,
  TrendPrediction,
} from '../contracts/PerformanceModelV1';
import { describeError } from '../lib/errors';
import { getLogger } from '../lib/logger';
import { BulkImportError } from './import/BulkImportError';
import { resolveImportFormat, validateImportPath } from './import/ImportFormat';
import { readImportRows } from './import/readImportRows';
import { computePassProbability } from './modules/ScoringModule';
import { runPassFailModule } from './modules/PassFailModule';
import { runTrendModule } from './modules/TrendModule';
import { resolveModelConfig } from './schema/PerformanceModelConfig';
import type { PerformanceModelConfig } from './schema/PerformanceModelConfig';
import { FileParameterStore } from './storage/ParameterStore';
import type { ParameterStore } from './storage/ParameterStore';
import {
  coerceParameterValue,
  copyParameterSet,
  parameterSetFromRecord,
  toFiniteNumber,
  uniformParameterSet,
} from './utils/parameters';

const logger = getLogger('performance-model');

export interface SubjectPerformanceModelOptions {
  /** Merged over defaults and environment; see `resolveModelConfig`. */
  config?: Partial<PerformanceModelConfig>;
  /** Defaults to a FileParameterStore at `config.storagePath`. */
  store?: ParameterStore;
  /** Clock used to stamp score points. */
  now?: () => Date;
}

/**
 * Subject Performance Model
 *
 * Holds two parameter sets: `confirmed` (scored and persisted) and `pending`
 * (the user's unconfirmed slider edits). Each confirmation that changes at
 * least one parameter appends exactly one point to the score series; a bulk
 * import replaces the series with one point per imported row.
 *
 * All operations are synchronous, so no caller can observe an import half-way
 * through.
 */
export class SubjectPerformanceModel implements PerformanceModelPort {
  readonly config: PerformanceModelConfig;

  private readonly store: ParameterStore;
  private readonly now: () => Date;

  private confirmed: ParameterSet;
  private pending: ParameterSet;
  private history: ScorePoint[] = [];
  private nextTimeStep = 0;
  private lastScoredAt: Date | null = null;

  constructor(options: SubjectPerformanceModelOptions = {}) {
    this.config = resolveModelConfig(options.config);
    this.store = options.store ?? new FileParameterStore(this.config.storagePath);
    this.now = options.now ?? (() => new Date());

    this.confirmed = uniformParameterSet(this.config.defaultValue);
    this.loadParameters();
    this.pending = copyParameterSet(this.confirmed);
  }

  // ── Persistence ───────────────────────────────────────────────────────────

  private loadParameters(): void {
    const stored = this.store.load();
    if (!stored) return;

    for (const name of PARAMETER_NAMES) {
      if (Object.prototype.hasOwnProperty.call(stored, name)) {
        this.confirmed[name] = coerceParameterValue(stored[name], this.confirmed[name]);
      }
    }
    logger.debug('Loaded confirmed parameters', { parameters: { ...this.confirmed } });
  }

  private saveParameters(): boolean {
    return this.store.save(copyParameterSet(this.confirmed));
  }

  // ── Parameter state ───────────────────────────────────────────────────────

  /**
   * Overwrite pending values for every recognised key. Unknown keys are
   * ignored, unreadable values leave their key unchanged, and readable
   * values are clamped to [0, 100].
   */
  updatePendingParameters(params: Readonly<Record<string, unknown>>): void {
    for (const [key, value] of Object.entries(params)) {
      if (!isParameterName(key)) continue;
      if (toFiniteNumber(value) === null) continue;
      this.pending[key] = coerceParameterValue(value, this.pending[key]);
    }
  }

  getPending(param: ParameterName): number {
    return this.pending[param];
  }

  setPending(param: ParameterName, value: number): void {
    this.updatePendingParameters({ [param]: value });
  }

  getPendingParameters(): ParameterSet {
    return copyParameterSet(this.pending);
  }

  getConfirmed(): ParameterSet {
    return copyParameterSet(this.confirmed);
  }

  /** Parameters whose pending value differs from the confirmed one, in parameter order. */
  pendingChanges(): ParameterName[] {
    return PARAMETER_NAMES.filter(name => this.pending[name] !== this.confirmed[name]);
  }

  /**
   * Commit pending edits.
   *
   * Returns null when nothing differs. Otherwise copies every changed value
   * into the confirmed set, persists it, scores once, and returns one
   * "param: old → new" line per change.
   */
  confirmParameters(): string | null {
    const changeLog: string[] = [];

    for (const name of PARAMETER_NAMES) {
      const oldValue = this.confirmed[name];
      const newValue = this.pending[name];
      if (oldValue !== newValue) {
        changeLog.push(`${name}: ${oldValue} → ${newValue}`);
        this.confirmed[name] = newValue;
      }
    }

    if (changeLog.length === 0) {
      return null;
    }

    this.saveParameters();
    const score = this.calculatePerformance();
    logger.info('Parameters confirmed', { changes: changeLog.length, score });
    return changeLog.join('\n');
  }

  // ── Scoring ───────────────────────────────────────────────────────────────

  /** Score the confirmed set and append it to the series. */
  calculatePerformance(): number {
    const score = computePassProbability(this.confirmed, this.config.weights);
    this.history.push({ timeStep: this.nextTimeStep, score });
    this.nextTimeStep += 1;
    this.lastScoredAt = this.now();
    return score;
  }

  predictPassFail(): PassFailPrediction {
    return runPassFailModule(this.history.map(p => p.score));
  }

  predictTrend(): TrendPrediction {
    return runTrendModule(this.history, this.config.trendWindow);
  }

  // ── Bulk import ───────────────────────────────────────────────────────────

  private resetSeries(): void {
    this.history = [];
    this.nextTimeStep = 0;
    this.lastScoredAt = null;
  }

  /**
   * Replace the series with one point per row of a CSV or JSON file.
   *
   * The existing series is discarded first. Each row becomes the whole
   * confirmed set (missing or unreadable fields take the default value) and
   * is scored once. On success the last row's parameters are persisted.
   *
   * Never throws. On failure the series keeps whatever was applied before
   * the failing row, and nothing is persisted.
   */
  importBulkData(filePath: string): ImportResult {
    this.resetSeries();

    try {
      const format = resolveImportFormat(filePath);
      if (format === null) {
        throw new BulkImportError(`Unsupported file type: ${filePath}`, filePath);
      }

      for (const row of readImportRows(filePath, format)) {
        this.confirmed = parameterSetFromRecord(row, this.config.defaultValue);
        this.calculatePerformance();
      }

      this.saveParameters();
      const importedCount = this.history.length;
      logger.info('Bulk import complete', { path: filePath, format, importedCount });
      return {
        success: true,
        message: `Successfully imported ${importedCount} records`,
        importedCount,
      };
    } catch (err) {
      logger.warn('Bulk import failed', {
        path: filePath,
        appliedRows: this.history.length,
        error: describeError(err),
      });
      return { success: false, message: `Import failed: ${describeError(err)}` };
    }
  }

  // ── Presentation contract ─────────────────────────────────────────────────

  confirm(): string | null {
    return this.confirmParameters();
  }

  currentScore(): number | null {
    return this.history.length > 0 ? this.history[this.history.length - 1].score : null;
  }

  classification(): PassFailPrediction {
    return this.predictPassFail();
  }

  trend(): TrendPrediction {
    return this.predictTrend();
  }

  series(): readonly ScorePoint[] {
    return this.history.map(p => ({ ...p }));
  }

  lastUpdatedAt(): Date | null {
    return this.lastScoredAt;
  }

  /**
   * Validate the path, then run the bulk import. A path that does not exist
   * or has the wrong suffix is rejected before any state changes.
   */
  importFile(filePath: string): ImportResult {
    try {
      validateImportPath(filePath);
    } catch (err) {
      logger.warn('Import rejected', { path: filePath, error: describeError(err) });
      return { success: false, message: describeError(err) };
    }
    return this.importBulkData(filePath);
  }

  /** Flush the confirmed set to the store. */
  shutdown(): void {
    this.saveParameters();
  }
}

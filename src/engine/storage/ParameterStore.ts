import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import type { ParameterSet } from '../../contracts/PerformanceModelV1';
import { getLogger } from '../../lib/logger';
import { describeError } from '../../lib/errors';

const logger = getLogger('parameter-store');

const StoredParametersSchema = z.record(z.string(), z.unknown());

/**
 * Durable home of the confirmed parameter set.
 * Neither method throws: failures are logged and reported through the return value.
 */
export interface ParameterStore {
  /** Raw stored record, or null when nothing usable is stored. */
  load(): Readonly<Record<string, unknown>> | null;
  /** Overwrite the stored set. Returns false when the write failed. */
  save(params: Readonly<ParameterSet>): boolean;
}

/** Flat JSON object on disk, rewritten in full on every save. */
export class FileParameterStore implements ParameterStore {
  constructor(public readonly filePath: string) {}

  load(): Readonly<Record<string, unknown>> | null {
    if (!existsSync(this.filePath)) {
      return null;
    }

    try {
      const data: unknown = JSON.parse(readFileSync(this.filePath, 'utf8'));
      const parsed = StoredParametersSchema.safeParse(data);
      if (!parsed.success) {
        logger.warn('Stored parameters are not a JSON object; using defaults', { path: this.filePath });
        return null;
      }
      return parsed.data;
    } catch (err) {
      logger.warn('Error loading parameters; using defaults', {
        path: this.filePath,
        error: describeError(err),
      });
      return null;
    }
  }

  save(params: Readonly<ParameterSet>): boolean {
    try {
      writeFileSync(this.filePath, `${JSON.stringify(params, null, 4)}\n`, 'utf8');
      return true;
    } catch (err) {
      logger.error('Error saving parameters', { path: this.filePath, error: describeError(err) });
      return false;
    }
  }
}

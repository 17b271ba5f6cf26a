/**
 * Shared parameter helpers.
 *
 * Every read of a parameter value from outside the model (slider, parameter
 * store, import row) goes through `coerceParameterValue` so that missing and
 * unreadable data are handled in one place.
 */
import { PARAMETER_NAMES } from '../../contracts/parameters.ids';
import type { ParameterSet } from '../../contracts/PerformanceModelV1';

export const PARAMETER_MIN = 0;
export const PARAMETER_MAX = 100;

const DECIMAL_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Clamp `n` to the closed interval [min, max]. */
export function clampParameter(n: number, min = PARAMETER_MIN, max = PARAMETER_MAX): number {
  return Math.min(max, Math.max(min, n));
}

/**
 * Read a raw value as a number.
 *
 * Accepts finite numbers and decimal strings (surrounding whitespace allowed).
 * Everything else, including empty strings, booleans and null, is unreadable.
 */
export function toFiniteNumber(raw: unknown): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }
  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    if (!DECIMAL_NUMBER.test(trimmed)) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Coerce-with-default: unreadable values become `fallback`, readable ones are
 * clamped to [0, 100]. The fallback itself is clamped too.
 */
export function coerceParameterValue(raw: unknown, fallback: number): number {
  return clampParameter(toFiniteNumber(raw) ?? fallback);
}

/** A parameter set with every key at `value`. */
export function uniformParameterSet(value: number): ParameterSet {
  const v = clampParameter(value);
  return {
    preparedness: v,
    teaching: v,
    materials: v,
    participation: v,
    difficulty: v,
  };
}

/**
 * Build a complete parameter set from a loosely-typed record.
 * Unrecognised keys are ignored; each recognised key is coerced with `defaultValue`.
 */
export function parameterSetFromRecord(
  record: Readonly<Record<string, unknown>>,
  defaultValue: number,
): ParameterSet {
  const set = uniformParameterSet(defaultValue);
  for (const name of PARAMETER_NAMES) {
    set[name] = coerceParameterValue(record[name], defaultValue);
  }
  return set;
}

export function copyParameterSet(set: Readonly<ParameterSet>): ParameterSet {
  return { ...set };
}

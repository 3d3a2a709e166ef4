/**
 * Error taxonomy
 *
 * - `ShapeMismatchError`: raised by the tracker when baseline and edited tables were not
 *   fetched or filtered consistently, or when a submitted row no longer names the row it
 *   was read from (`stale-row`).
 * - `NotFoundError` / `StoreUnavailableError`: raised by record stores and surfaced verbatim.
 * - `CsvValidationError`: an uploaded CSV lacks required columns.
 * - `ConfigurationError`: invalid tracker or application configuration.
 */

/** Why two tables could not be compared */
export type ShapeMismatchReason = 'columns' | 'missing-row' | 'extra-row' | 'duplicate-row' | 'stale-row';

export class ShapeMismatchError extends Error {
  constructor(
    public readonly reason: ShapeMismatchReason,
    detail: string,
  ) {
    super(`[ShapeMismatch] ${detail}`);
    this.name = 'ShapeMismatchError';
  }
}

export class NotFoundError extends Error {
  constructor(
    public readonly resource: string,
    public readonly resourceName: string,
  ) {
    super(`${resource} '${resourceName}' not found`);
    this.name = 'NotFoundError';
  }
}

export class StoreUnavailableError extends Error {
  constructor(
    public readonly operation: string,
    cause: unknown,
  ) {
    super(`Record store unavailable during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'StoreUnavailableError';
  }
}

export class CsvValidationError extends Error {
  constructor(
    public readonly missingColumns: readonly string[],
    public readonly requiredColumns: readonly string[],
  ) {
    super(
      `The uploaded CSV is missing required columns: ${missingColumns.join(', ')}. Required: ${requiredColumns.join(', ')}`,
    );
    this.name = 'CsvValidationError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * Normalizes any thrown value to an Error instance
 *
 * @remarks
 * Handles cases where non-Error values are thrown (strings, objects, etc.)
 */
export const normalizeError = (thrownValue: unknown): Error => {
  if (thrownValue instanceof Error) {
    return thrownValue;
  }
  return new Error(String(thrownValue));
};

/**
 * What happens when an audit row cannot be written
 *
 * @module error-handler
 *
 * @remarks
 * - `throw`: the save fails. Audit rows are written before the master table, so a failure
 *   leaves the master table as it was.
 * - `log`: the master table is written first; each failed append is reported on stderr
 *   and counted, and the save still succeeds.
 * - `ignore`: as `log`, without the report.
 */

import { normalizeError } from '../errors.js';
import { coreLog } from './debug.js';

export type ErrorStrategy = 'throw' | 'log' | 'ignore';

export const ERROR_STRATEGIES = ['throw', 'log', 'ignore'] as const satisfies readonly ErrorStrategy[];

/** One audit row that could not be written */
export interface AuditFailure {
  /** Which row the entry was for, e.g. `row 3` */
  target: string;
  error: Error;
}

export interface ErrorHandler {
  readonly strategy: ErrorStrategy;
  /** Whether audit rows have to be in place before the data they describe is written */
  readonly auditFirst: boolean;
  handle(failure: AuditFailure): void;
}

/**
 * @example
 * ```typescript
 * const handler = createErrorHandler(config.auditErrorStrategy);
 * await saveEdits({ store, tracker, actor, rows, errorHandler: handler });
 * ```
 */
export const createErrorHandler = (strategy: ErrorStrategy = 'log'): ErrorHandler => ({
  strategy,
  auditFirst: strategy === 'throw',
  handle: ({ target, error }: AuditFailure): void => {
    coreLog('Audit append for %s failed (%s): %O', target, strategy, error);
    if (strategy === 'throw') {
      throw error;
    }
    if (strategy === 'log') {
      console.error(`[@jwp-tracker] Could not write to audit log for ${target}:`, error.message);
    }
  },
});

/**
 * Runs one audit write and hands a failure to the handler
 *
 * @returns `true` once the write went through, `false` when the handler let a failure pass
 */
export const attemptAuditWrite = async (
  write: () => Promise<void>,
  handler: ErrorHandler,
  target: string,
): Promise<boolean> => {
  try {
    await write();
    return true;
  } catch (thrown) {
    handler.handle({ target, error: normalizeError(thrown) });
    return false;
  }
};

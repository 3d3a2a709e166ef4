/**
 * Debug logging utilities using the `debug` package
 *
 * Enable logging by setting the DEBUG environment variable.
 *
 * @example Environment variable configuration
 * ```bash
 * # Enable all tracker logs
 * DEBUG=jwp-tracker:* npm start
 *
 * # Enable specific namespaces
 * DEBUG=jwp-tracker:core npm test
 * DEBUG=jwp-tracker:store npm start
 * ```
 */

import type { Debugger } from 'debug';
import debug from 'debug';

/**
 * Debug logger for change tracking and the save workflow
 */
export const coreLog: Debugger = debug('jwp-tracker:core');

/**
 * Debug logger for CSV import and export
 */
export const csvLog: Debugger = debug('jwp-tracker:csv');

/**
 * Debug logger for record store implementations
 */
export const storeLog: Debugger = debug('jwp-tracker:store');

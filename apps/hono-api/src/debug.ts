import type { Debugger } from 'debug';
import debug from 'debug';

/**
 * Debug logger for requests, logins and saves
 */
export const httpLog: Debugger = debug('jwp-tracker:http');

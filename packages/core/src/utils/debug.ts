/**
 * Debug logging utilities using the `debug` package
 *
 * Enable logging by setting the DEBUG environment variable.
 *
 * @example Environment variable configuration
 * ```bash
 * # Enable all audit logs
 * DEBUG=casefile-audit:* node app.js
 *
 * # Enable specific namespaces
 * DEBUG=casefile-audit:conversion npm test
 * ```
 *
 * @example Using debug loggers
 * ```typescript
 * import { conversionLog } from './debug.js';
 *
 * conversionLog('Skipped %s: %d violation(s)', modelName, violations.length);
 * ```
 */

import type { Debugger } from 'debug';
import debug from 'debug';

/**
 * Debug logger for validation runs
 */
export const validationLog: Debugger = debug('casefile-audit:validation');

/**
 * Debug logger for persistence-shape conversion
 */
export const conversionLog: Debugger = debug('casefile-audit:conversion');

/**
 * Debug logger for transfer reconciliation
 */
export const transferLog: Debugger = debug('casefile-audit:transfer');

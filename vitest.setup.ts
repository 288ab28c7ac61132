/**
 * Centralized Vitest setup
 *
 * Pipeline stages log excluded chunks and absorbed provider failures; unit
 * tests run with logging silenced unless DOCQA_TEST_LOG_LEVEL asks otherwise.
 */

import { isLogLevel, setLogLevel } from './src/telemetry/logger.js';

const requested = process.env.DOCQA_TEST_LOG_LEVEL ?? 'silent';
setLogLevel(isLogLevel(requested) ? requested : 'silent');

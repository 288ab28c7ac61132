/**
 * @fileoverview Core pipeline infrastructure
 *
 * Result types and the typed error hierarchy shared by every stage.
 */

// Result types and helpers
export {
  type Result,
  type OkResult,
  type ErrResult,
  Ok,
  Err,
  toError,
  safeAsync,
  withTimeout,
  TimeoutError,
  isTimeoutError,
} from './result.js';

// Error types
export {
  type ErrorJSON,
  DocQaError,
  RetrievalError,
  type RetrievalFailureReason,
  DimensionMismatchError,
  InvalidArgumentError,
  CompletionError,
  type CompletionFailureReason,
  UtilityError,
  ConfigurationError,
  isDocQaError,
  isRetrievalError,
  isRetryableError,
} from './errors.js';

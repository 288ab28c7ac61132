/**
 * @fileoverview Pipeline error hierarchy
 *
 * Typed errors for the query pipeline. Stage boundaries catch the recoverable
 * ones (`retryable` or provider-caused) and turn them into a degraded state;
 * anything that is not a `DocQaError` is treated as a programmer error and
 * propagates.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class DocQaError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// RETRIEVAL ERRORS
// ============================================================================

export type RetrievalFailureReason = 'embedding_failed' | 'timeout' | 'dimension_mismatch' | 'source_failed';

export class RetrievalError extends DocQaError {
  readonly code: string = 'RETRIEVAL_ERROR';

  constructor(
    readonly reason: RetrievalFailureReason,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Retrieval failed (${reason}): ${message}`);
    this.name = 'RetrievalError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        reason: this.reason,
        cause: this.cause?.message,
      },
    };
  }
}

export class DimensionMismatchError extends RetrievalError {
  readonly code = 'DIMENSION_MISMATCH';

  constructor(
    readonly expected: number,
    readonly received: number,
    readonly chunkId?: string,
  ) {
    super(
      'dimension_mismatch',
      false,
      `expected embedding of length ${expected}, got ${received}${chunkId ? ` for chunk ${chunkId}` : ''}`,
    );
    this.name = 'DimensionMismatchError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        expected: this.expected,
        received: this.received,
        chunkId: this.chunkId,
      },
    };
  }
}

// ============================================================================
// ARGUMENT ERRORS
// ============================================================================

export class InvalidArgumentError extends DocQaError {
  readonly code = 'INVALID_ARGUMENT';
  readonly retryable = false;

  constructor(
    readonly argument: string,
    message: string,
  ) {
    super(`Invalid argument ${argument}: ${message}`);
    this.name = 'InvalidArgumentError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        argument: this.argument,
      },
    };
  }
}

// ============================================================================
// COMPLETION ERRORS
// ============================================================================

export type CompletionFailureReason = 'provider_error' | 'timeout' | 'empty_response';

export class CompletionError extends DocQaError {
  readonly code = 'COMPLETION_ERROR';

  constructor(
    readonly reason: CompletionFailureReason,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Completion failed (${reason}): ${message}`);
    this.name = 'CompletionError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        reason: this.reason,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// UTILITY ERRORS
// ============================================================================

export class UtilityError extends DocQaError {
  readonly code = 'UTILITY_ERROR';

  constructor(
    readonly action: string,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Utility ${action} failed: ${message}`);
    this.name = 'UtilityError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        action: this.action,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends DocQaError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isDocQaError(error: unknown): error is DocQaError {
  return error instanceof DocQaError;
}

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof DocQaError) {
    return error.retryable;
  }

  // Network errors are generally retryable
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('timeout') ||
      message.includes('timed out') ||
      message.includes('econnreset') ||
      message.includes('econnrefused') ||
      message.includes('rate limit') ||
      message.includes('429') ||
      message.includes('503')
    );
  }

  return false;
}

/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { ConfigurationError, InvalidArgumentError, isDocQaError, isRetryableError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'UNKNOWN_COMMAND'
  | 'DATABASE_NOT_FOUND'
  | 'CONFIG_INVALID'
  | 'PIPELINE_FAILED';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `docqa help <command>` for usage information.',
  UNKNOWN_COMMAND: 'Run `docqa help` to list the available commands.',
  DATABASE_NOT_FOUND: 'Pass the chunk store with --db <path> or set DOCQA_DB.',
  CONFIG_INVALID: 'Check the YAML file named by --config or DOCQA_CONFIG and the DOCQA_* variables.',
  PIPELINE_FAILED: 'Re-run with --verbose to see the pipeline log.',
};

/** Process exit codes; usage errors are distinguished from runtime failures */
export const EXIT_CODES: Record<CliErrorCode, number> = {
  INVALID_ARGUMENT: 2,
  UNKNOWN_COMMAND: 2,
  DATABASE_NOT_FOUND: 3,
  CONFIG_INVALID: 3,
  PIPELINE_FAILED: 1,
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

function isParseArgsError(error: unknown): error is TypeError & { code: string } {
  return (
    error instanceof TypeError &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('ERR_PARSE_ARGS')
  );
}

/**
 * Map any thrown value onto a CliError.
 */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (isParseArgsError(error)) {
    return createError('INVALID_ARGUMENT', error.message);
  }
  if (error instanceof ConfigurationError) {
    return createError('CONFIG_INVALID', error.message, { key: error.configKey });
  }
  if (error instanceof InvalidArgumentError) {
    return createError('INVALID_ARGUMENT', error.message, { argument: error.argument });
  }
  if (isDocQaError(error)) {
    return createError('PIPELINE_FAILED', error.message, { code: error.code });
  }
  return createError('PIPELINE_FAILED', getErrorMessage(error));
}

export function formatError(error: unknown): string {
  const cliError = toCliError(error);
  const head = `Error [${cliError.code}]: ${cliError.message}`;
  return cliError.suggestion ? `${head}\n\nSuggestion: ${cliError.suggestion}` : head;
}

export function formatErrorJson(error: unknown): string {
  const cliError = toCliError(error);
  return JSON.stringify({
    error: {
      code: cliError.code,
      message: cliError.message,
      suggestion: cliError.suggestion,
      retryable: isRetryableError(error),
      details: cliError.details,
    },
  });
}

export function getExitCode(error: unknown): number {
  return EXIT_CODES[toCliError(error).code];
}

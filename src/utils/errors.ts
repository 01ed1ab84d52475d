import { SetupError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the fatal conditions of a setup run.
 * Anything that reaches withErrorHandling aborts the run with exit code 1.
 */

export class UnsupportedPlatformError extends SetupError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.UNSUPPORTED_PLATFORM, details);
    this.name = 'UnsupportedPlatformError';
  }
}

export class NetworkUnavailableError extends SetupError {
  constructor(domains: readonly string[]) {
    super('No internet connection detected. Please check your network.', ErrorCodes.NETWORK_UNAVAILABLE, { domains });
    this.name = 'NetworkUnavailableError';
  }
}

export class MissingCommandError extends SetupError {
  public readonly missing: string[];

  constructor(message: string, missing: string[]) {
    super(message, ErrorCodes.MISSING_COMMAND, { missing });
    this.name = 'MissingCommandError';
    this.missing = missing;
  }
}

export class CriticalTaskError extends SetupError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CRITICAL_TASK_FAILED, details);
    this.name = 'CriticalTaskError';
  }
}

export class ResolutionExhaustedError extends SetupError {
  constructor(attempts: number, message?: string) {
    super(
      message ?? `Could not locate the riverSpider directory after ${attempts} attempts. See Canvas for download instructions.`,
      ErrorCodes.RESOLUTION_EXHAUSTED,
      { attempts }
    );
    this.name = 'ResolutionExhaustedError';
  }
}

export class FileSystemError extends SetupError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends SetupError {
  constructor(message: string, details?: unknown) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends SetupError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class UserCancellationError extends SetupError {
  constructor(message: string = 'Operation cancelled by user') {
    super(message, ErrorCodes.USER_CANCELLED);
    this.name = 'UserCancellationError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof SetupError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Render the stderr text for a fatal error. Every fatal message names the log
 * file so the user has somewhere to look.
 */
export function formatFatalMessage(message: string, logFile: string | null): string {
  const lines = [`Error: ${message}`];
  if (logFile) {
    lines.push(`Script aborted at ${new Date().toString()}. Check the log file: ${logFile}`);
  }
  return lines.join('\n');
}

/**
 * Wraps an async function with error handling for Commander.js actions.
 * Every failure is fatal: it is logged, reported on stderr and exits with 1.
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      const message = result.error ?? 'An unknown error occurred';
      logger.error(message);
      logger.error(`Script aborted at ${new Date().toString()}`);
      console.error(formatFatalMessage(message, logger.getFile()));
      process.exit(1);
    }
  };
}

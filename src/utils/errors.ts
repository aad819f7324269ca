import { PkgdeckError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failure modes of package operations
 */

export class PackageNotFoundError extends PkgdeckError {
  constructor(packageName: string) {
    super(`Package '${packageName}' not found`, ErrorCodes.PACKAGE_NOT_FOUND, { packageName });
    this.name = 'PackageNotFoundError';
  }
}

/**
 * A command was invoked in a state that does not allow it
 * (catalog data not loaded, invalid channel, another change in flight).
 */
export class PreconditionError extends PkgdeckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.PRECONDITION_FAILED, details);
    this.name = 'PreconditionError';
  }
}

export class DaemonError extends PkgdeckError {
  public readonly kind?: string;
  public readonly statusCode?: number;

  constructor(message: string, kind?: string, statusCode?: number) {
    super(message, ErrorCodes.DAEMON_ERROR, { kind, statusCode });
    this.name = 'DaemonError';
    this.kind = kind;
    this.statusCode = statusCode;
  }
}

export class ChangeFailedError extends PkgdeckError {
  public readonly changeId: string;
  public readonly kind?: string;

  constructor(changeId: string, message: string, kind?: string) {
    super(message, ErrorCodes.CHANGE_FAILED, { changeId, kind });
    this.name = 'ChangeFailedError';
    this.changeId = changeId;
    this.kind = kind;
  }
}

export class ChangeWatchAbortedError extends PkgdeckError {
  constructor(changeId: string) {
    super(`Stopped watching change ${changeId}`, ErrorCodes.WATCH_ABORTED, { changeId });
    this.name = 'ChangeWatchAbortedError';
  }
}

export class FileSystemError extends PkgdeckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends PkgdeckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends PkgdeckError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof PkgdeckError) {
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
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      if (error instanceof UserCancellationError) {
        process.exit(0);
        return;
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}

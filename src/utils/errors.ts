import {
  DepweaveError,
  ErrorCodes,
  CommandResult,
  type FileError,
  type ModuleId,
  type ResolutionError
} from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for different types of errors in depweave
 */

/**
 * Raised when a module descriptor is of a shape the resolver cannot use.
 * This is a caller bug, never part of the result channel.
 */
export class UnsupportedDescriptorError extends DepweaveError {
  constructor(description: string) {
    super(`Unrecognized module descriptor: ${description}`, ErrorCodes.UNSUPPORTED_DESCRIPTOR, { description });
    this.name = 'UnsupportedDescriptorError';
  }
}

/**
 * Modules whose metadata could not be downloaded. Carried inside an
 * UnresolvedWarning rather than thrown.
 */
export class ResolveException extends DepweaveError {
  readonly messages: ReadonlyArray<string>;
  readonly failed: ReadonlyArray<ModuleId>;

  constructor(messages: ReadonlyArray<string>, failed: ReadonlyArray<ModuleId>) {
    super(messages.join('\n'), ErrorCodes.UNRESOLVED_DEPENDENCIES, { failed });
    this.name = 'ResolveException';
    this.messages = messages;
    this.failed = failed;
  }
}

/**
 * Terminal resolution failure, surfaced to the caller as-is.
 */
export class ResolutionFailedError extends DepweaveError {
  readonly error: ResolutionError;

  constructor(error: ResolutionError) {
    super(describeResolutionError(error), ErrorCodes.RESOLUTION_FAILED, { type: error.type });
    this.name = 'ResolutionFailedError';
    this.error = error;
    if (error.type === 'unknown-exception' || error.type === 'unknown-download-exception') {
      this.cause = error.cause;
    }
  }
}

export class InvalidModuleFileError extends DepweaveError {
  constructor(reason: string, details?: unknown) {
    super(`Invalid module file: ${reason}`, ErrorCodes.INVALID_MODULE_FILE, details);
  }
}

export class FileSystemError extends DepweaveError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends DepweaveError {
  constructor(message: string, details?: unknown) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends DepweaveError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function describeResolutionError(error: ResolutionError): string {
  switch (error.type) {
    case 'maximum-iterations-reached':
      return `Maximum number of resolution iterations reached (${error.iterations})`;
    case 'conflicts':
      return `Conflicting dependencies: ${error.description}`;
    case 'unknown-exception':
      return `Unexpected resolution error: ${causeMessage(error.cause)}`;
    case 'unknown-download-exception':
      return `Unexpected error while downloading metadata: ${causeMessage(error.cause)}`;
    case 'metadata-download-errors':
      return error.errors
        .map(e => `${e.module.organization}:${e.module.name}:${e.version}: ${e.messages.join(', ')}`)
        .join('\n');
    case 'download-errors':
      return error.errors.map(describeFileError).join('\n');
  }
}

export function describeFileError(error: FileError): string {
  switch (error.type) {
    case 'not-found':
      return `not found: ${error.file}`;
    case 'unauthorized':
      return error.realm ? `unauthorized: ${error.file} (${error.realm})` : `unauthorized: ${error.file}`;
    case 'download-error':
      return `download error: ${error.reason}`;
    case 'locked':
      return `locked: ${error.file}`;
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof DepweaveError) {
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
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}

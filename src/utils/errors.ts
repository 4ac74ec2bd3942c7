import { LayerToolError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for the otel-layer CLI
 */

/**
 * Base for every failure raised while loading or resolving distributions.
 * Nested resolution failures are wrapped level by level; the kind (code) of
 * the innermost failure is kept and the inner error is attached as `cause`.
 */
export class DistributionError extends LayerToolError {
  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, code, details, options);
    this.name = 'DistributionError';
  }

  /**
   * Re-raise `inner` with the name of the distribution whose base failed.
   */
  static wrapBase(inner: DistributionError, distribution: string, base: string): DistributionError {
    return new DistributionError(
      `Error resolving base '${base}' for distribution '${distribution}': ${inner.message}`,
      inner.code,
      { distribution, base },
      { cause: inner }
    );
  }
}

export class DistributionNotFoundError extends DistributionError {
  constructor(distribution: string) {
    super(
      `Distribution '${distribution}' not found in configuration.`,
      ErrorCodes.DISTRIBUTION_NOT_FOUND,
      { distribution }
    );
    this.name = 'DistributionNotFoundError';
  }
}

export class CircularDistributionError extends DistributionError {
  constructor(distribution: string) {
    super(
      `Circular dependency detected involving distribution: ${distribution}`,
      ErrorCodes.CIRCULAR_DEPENDENCY,
      { distribution }
    );
    this.name = 'CircularDistributionError';
  }
}

/**
 * Malformed distribution configuration: bad YAML, wrong root shape, wrong field types.
 */
export class DistributionConfigError extends DistributionError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, ErrorCodes.CONFIG_ERROR, details, options);
    this.name = 'DistributionConfigError';
  }
}

/**
 * The distributions file itself could not be located.
 */
export class DistributionConfigNotFoundError extends DistributionError {
  constructor(path: string) {
    super(`Distribution YAML file not found at ${path}`, ErrorCodes.CONFIG_NOT_FOUND, { path });
    this.name = 'DistributionConfigNotFoundError';
  }
}

export class FileSystemError extends LayerToolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends LayerToolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

/**
 * A child process exited non-zero.
 */
export class CommandError extends LayerToolError {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string) {
    const reason = stderr.trim() || `exit code ${exitCode ?? 'unknown'}`;
    super(`Command failed: ${command}: ${reason}`, ErrorCodes.COMMAND_FAILED, { command, exitCode });
    this.name = 'CommandError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * Extract a printable message from anything thrown.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof LayerToolError) {
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

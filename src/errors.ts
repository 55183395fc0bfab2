export class AppError extends Error {
  public readonly code: string;

  constructor(message: string, code: string = 'INTERNAL_ERROR') {
    super(message);
    this.name = new.target.name;
    this.code = code;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Bad or missing configuration. A fatal error stops start-up; a non-fatal one
 * makes the caller fall back to a default or skip the affected item.
 */
export class ConfigurationError extends AppError {
  public readonly fatal: boolean;

  constructor(message: string, options: { fatal?: boolean } = {}) {
    super(message, 'CONFIGURATION_ERROR');
    this.fatal = options.fatal ?? false;
  }
}

export class StorageError extends AppError {
  constructor(message: string = 'Failed to save data') {
    super(message, 'STORAGE_ERROR');
  }
}

/** A configuration problem the process cannot start with. */
export function isFatalConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError && error.fatal;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNotFoundError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Base class for errors that map onto an HTTP status in the error handler. */
export class AppError extends Error {
  constructor(message: string, readonly status: number) {
    super(message);
    this.name = 'AppError';
  }
}

/** The text-generation backend failed or returned nothing usable. */
export class BackendError extends AppError {
  constructor(message: string) {
    super(message, 502);
    this.name = 'BackendError';
  }
}

/** The CMS rejected a post or could not be reached. */
export class PublishError extends AppError {
  constructor(message: string, readonly remoteStatus?: number) {
    super(message, 502);
    this.name = 'PublishError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 500);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends AppError {
  constructor(readonly details: ValidationIssue[]) {
    super('Validation failed', 400);
    this.name = 'ValidationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

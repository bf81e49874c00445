import type { Request, Response, NextFunction } from 'express';
import { AppError, ValidationError, errorMessage } from '../errors.js';

// Errors raised by express and body-parser carry their HTTP status instead of
// being AppErrors.
function httpStatusOf(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) return null;

  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status === 'number' && status >= 400 && status < 600) {
    return status;
  }
  return null;
}

function isMalformedBody(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ValidationError) {
    return res.status(err.status).json({
      error: err.message,
      details: err.details,
    });
  }

  // Unparseable JSON is the operator's input error, reported like any other
  if (isMalformedBody(err)) {
    const invalid = new ValidationError([{ path: 'body', message: 'Request body is not valid JSON' }]);
    return res.status(invalid.status).json({
      error: invalid.message,
      details: invalid.details,
    });
  }

  console.error('Error:', err);

  if (err instanceof AppError) {
    return res.status(err.status).json({
      error: err.message || 'An error occurred'
    });
  }

  const status = httpStatusOf(err);
  if (status !== null) {
    return res.status(status).json({
      error: errorMessage(err) || 'An error occurred'
    });
  }

  // Default to 500 internal server error
  res.status(500).json({
    error: errorMessage(err) || 'Internal server error'
  });
}

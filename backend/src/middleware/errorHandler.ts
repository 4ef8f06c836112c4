import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { createLogger } from '../utils/logger';
import { SessionError } from '../utils/errors';
import type { APIError, APIResponse } from '../../../shared/types/api';

const logger = createLogger('http');

interface ResolvedError extends APIError {
  expected: boolean;
}

const resolveError = (err: unknown): ResolvedError => {
  if (err instanceof SessionError) {
    return { code: err.code, message: err.message, statusCode: err.statusCode, details: err.details, expected: true };
  }

  if (err instanceof ZodError) {
    return {
      code: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      statusCode: 400,
      details: err.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
      expected: true,
    };
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    return { code: 'INVALID_JSON', message: 'Request body is not valid JSON', statusCode: 400, expected: true };
  }

  return {
    code: 'INTERNAL_ERROR',
    message: err instanceof Error ? err.message : 'Internal Server Error',
    statusCode: 500,
    expected: false,
  };
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  next: NextFunction
) => {
  const { expected, ...error } = resolveError(err);

  const context = { code: error.code, url: req.url, method: req.method, ip: req.ip };
  if (expected) {
    logger.warn(`⚠️ ${error.message}`, context);
  } else {
    logger.error('API Error:', { ...context, stack: err instanceof Error ? err.stack : String(err) });
  }

  const body: APIResponse<never> = {
    success: false,
    error: {
      code: error.code,
      message: error.message,
      ...(error.details !== undefined && { details: error.details }),
    },
    timestamp: new Date().toISOString(),
  };

  res.status(error.statusCode).json(body);
};

// Async error wrapper
export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };

import { Request, Response, NextFunction } from 'express';
import { ValidationError, UniqueConstraintError, ForeignKeyConstraintError } from 'sequelize';
import { ZodError } from 'zod';
import { AppError } from '../utils/AppError';
import { logger } from '../utils/logger';
import { sanitizeBody } from './requestLogger';

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({ status: 'error', code: 404, message: 'Not Found' });
};

// Express recognises error middleware by arity, so `next` stays in the signature.
export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof AppError) {
    logger.warn('Request failed', {
      message: err.message,
      code: err.code,
      statusCode: err.statusCode,
      url: req.originalUrl,
      method: req.method,
    });
    return res.status(err.statusCode).json({
      status: 'error',
      code: err.code,
      message: err.message,
      details: err.details,
    });
  }

  if (err instanceof ZodError) {
    return res.status(400).json({
      status: 'error',
      message: 'Validation error',
      errors: err.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
    });
  }

  // Syntax Errors (JSON parse)
  if (err instanceof SyntaxError && 'body' in err) {
    return res.status(400).json({
      status: 'error',
      message: 'Invalid JSON payload',
    });
  }

  // Sequelize Errors (UniqueConstraintError extends ValidationError)
  if (err instanceof UniqueConstraintError) {
    return res.status(409).json({
      status: 'error',
      message: 'Duplicate entry',
      errors: err.errors.map((e) => e.message),
    });
  }

  if (err instanceof ValidationError) {
    return res.status(400).json({
      status: 'error',
      message: 'Validation error',
      errors: err.errors.map((e) => e.message),
    });
  }

  if (err instanceof ForeignKeyConstraintError) {
    return res.status(409).json({
      status: 'error',
      message: 'Referenced record does not exist',
    });
  }

  logger.error('Unhandled Error', {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
    url: req.originalUrl,
    method: req.method,
    body: sanitizeBody(req.body),
  });

  res.status(500).json({
    status: 'error',
    message: 'Internal Server Error',
  });
};

import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { DataSourceError, HttpError } from '../errors.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function errorBody(err: HttpError): Record<string, unknown> {
  if (err.details === undefined) {
    return { error: err.message };
  }
  if (isPlainObject(err.details)) {
    return { error: err.message, ...err.details };
  }
  return { error: err.message, details: err.details };
}

export const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof ZodError) {
    return res.status(400).json({
      error: 'validation_failed',
      issues: err.issues,
    });
  }

  if (err instanceof DataSourceError) {
    console.error(`[warehouse] ${err.source ?? 'query'} failed: ${err.message}`);
    return res.status(err.statusCode).json({
      error: 'failed to query warehouse',
      details: err.message,
    });
  }

  if (err instanceof HttpError) {
    return res.status(err.statusCode).json(errorBody(err));
  }

  if (err instanceof Error) {
    console.error('[api] unhandled error', err);
    return res.status(500).json({
      error: err.message,
    });
  }

  return res.status(500).json({
    error: 'internal_error',
  });
};

import { Request, Response, NextFunction } from 'express';
import {
  InvalidTransitionError,
  SessionNotFoundError,
  ValidationError,
} from '../utils/errors';

export class ApiError extends Error {
  constructor(public readonly statusCode: number, message: string) {
    super(message);
    this.name = 'ApiError';
  }
}

function resolveStatus(error: Error): number {
  if (error instanceof ApiError) return error.statusCode;
  if (error instanceof ValidationError) return 400;
  if (error instanceof SessionNotFoundError) return 404;
  if (error instanceof InvalidTransitionError) return 409;
  return 500;
}

export const errorHandler = (
  error: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const statusCode = resolveStatus(error);

  if (statusCode >= 500) {
    console.error('❌ Unhandled error:', error);
  }

  res.status(statusCode).json({
    success: false,
    error: {
      message: statusCode >= 500 ? 'Internal server error' : error.message,
      ...(error instanceof ValidationError && error.fields.length > 0 ? { fields: error.fields } : {}),
    },
  });
};

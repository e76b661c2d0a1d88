import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { logger } from '@/services/logger';
import { createErrorResponse } from '@/utils/errorResponse';
import { RetrievalError, StoreQueryError, VoucherServiceError, errorMessage } from '@/utils/errors';

export function statusFor(err: unknown): number {
  if (err instanceof ZodError) return 400;
  if (err instanceof RetrievalError || err instanceof StoreQueryError) return 503;
  return 500;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const status = statusFor(err);
  if (err instanceof ZodError) {
    const issues = err.errors.map((e) => ({ path: e.path.join('.') || 'root', message: e.message }));
    res.status(status).json(createErrorResponse('Invalid request', issues, 'VALIDATION_ERROR'));
    return;
  }

  logger.error('request failed', { status, error: errorMessage(err) });
  if (err instanceof VoucherServiceError && status === 503) {
    res.status(status).json(createErrorResponse(err.message, undefined, err.code));
    return;
  }
  res.status(status).json(createErrorResponse('Internal Server Error', undefined, 'INTERNAL_ERROR'));
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(createErrorResponse(`Route ${req.method} ${req.originalUrl} not found`, undefined, 'NOT_FOUND'));
}

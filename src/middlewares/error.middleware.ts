import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';
import { AppError } from '../utils/errors';

interface ErrorLike {
  name?: string;
  message?: string;
  stack?: string;
  code?: unknown;
  status?: unknown;
  statusCode?: unknown;
}

const asErrorLike = (err: unknown): ErrorLike =>
  typeof err === 'object' && err !== null ? err : { message: String(err) };

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const error = asErrorLike(err);

  logger.error('[Error Handler]', {
    message: error.message,
    stack: error.stack,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
    userAgent: req.get('user-agent'),
    params: req.params,
    query: req.query,
  });

  if (err instanceof ZodError) {
    return ResponseHandler.validationError(res, err.errors);
  }

  if (err instanceof AppError) {
    return ResponseHandler.error(res, err.message, err.statusCode, {
      code: err.code,
      details: err.details,
    });
  }

  // JWT errors
  if (error.name === 'JsonWebTokenError') {
    return ResponseHandler.unauthorized(res, 'Invalid token');
  }

  if (error.name === 'TokenExpiredError') {
    return ResponseHandler.unauthorized(res, 'Token expired');
  }

  // Multer errors (file quá lớn, field sai tên...)
  if (error.name === 'MulterError') {
    return ResponseHandler.badRequest(res, error.message || 'Invalid upload');
  }

  // Body JSON sai cú pháp
  if (err instanceof SyntaxError && typeof error.status === 'number' && error.status === 400) {
    return ResponseHandler.badRequest(res, 'Malformed JSON body');
  }

  // Database errors
  if (error.code === '23505') { // Unique violation
    return ResponseHandler.conflict(res, 'Resource already exists');
  }

  if (error.code === '23503') { // Foreign key violation
    return ResponseHandler.error(res, 'Referenced resource does not exist', 400, {
      code: 'FOREIGN_KEY_VIOLATION',
    });
  }

  if (error.code === '23514') { // Check violation
    return ResponseHandler.error(res, 'Invalid data', 400, {
      code: 'CHECK_VIOLATION',
    });
  }

  const rawStatus = error.status ?? error.statusCode;
  const statusCode = typeof rawStatus === 'number' ? rawStatus : 500;
  const message = error.message || 'Internal server error';

  return ResponseHandler.error(
    res,
    message,
    statusCode,
    {
      code: typeof error.code === 'string' ? error.code : 'INTERNAL_ERROR',
      details: appConfig.nodeEnv === 'development' ? error.stack : undefined,
    }
  );
};

export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};

import { Response } from 'express';
import { logger } from './logging';

/**
 * Chuẩn Response Interface cho toàn hệ thống
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: ApiErrorBody;
  pagination?: {
    page: number;
    limit: number;
    total: number;
    totalPages: number;
  };
  meta?: Record<string, unknown>;
}

export interface ApiErrorBody {
  code?: string;
  details?: unknown;
}

/**
 * Response Handler - Quản lý response chung cho toàn hệ thống
 */
export class ResponseHandler {
  static success<T>(
    res: Response,
    data?: T,
    message: string = 'Success',
    statusCode: number = 200,
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse<T> = {
      success: true,
      message,
      data,
      ...(meta && { meta }),
    };

    return res.status(statusCode).json(response);
  }

  /**
   * Created Response (201)
   */
  static created<T>(
    res: Response,
    data?: T,
    message: string = 'Created',
    meta?: Record<string, unknown>
  ): Response {
    return this.success(res, data, message, 201, meta);
  }

  static error(
    res: Response,
    message: string = 'Something went wrong',
    statusCode: number = 400,
    error?: ApiErrorBody,
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse = {
      success: false,
      message,
      error,
      ...(meta && { meta }),
    };

    logger.error(`[API Error] ${message}`, {
      statusCode,
      error,
      meta,
    });

    return res.status(statusCode).json(response);
  }

  static badRequest(
    res: Response,
    message: string = 'Bad request',
    details?: unknown
  ): Response {
    return this.error(res, message, 400, {
      code: 'BAD_REQUEST',
      details,
    });
  }

  static validationError(
    res: Response,
    errors: unknown[],
    message: string = 'Invalid data'
  ): Response {
    return this.error(res, message, 400, {
      code: 'VALIDATION_ERROR',
      details: errors,
    });
  }

  static unauthorized(
    res: Response,
    message: string = 'Unauthorized'
  ): Response {
    return this.error(res, message, 401, {
      code: 'UNAUTHORIZED',
    });
  }

  static forbidden(
    res: Response,
    message: string = 'Forbidden'
  ): Response {
    return this.error(res, message, 403, {
      code: 'FORBIDDEN',
    });
  }

  static notFound(
    res: Response,
    message: string = 'Not found'
  ): Response {
    return this.error(res, message, 404, {
      code: 'NOT_FOUND',
    });
  }

  /**
   * Conflict Response (409)
   */
  static conflict(
    res: Response,
    message: string = 'Resource already exists',
    details?: unknown
  ): Response {
    return this.error(res, message, 409, {
      code: 'CONFLICT',
      details,
    });
  }

  /**
   * Too Many Requests Response (429)
   */
  static tooManyRequests(
    res: Response,
    message: string = 'Too many requests',
    retryAfter?: number
  ): Response {
    return this.error(res, message, 429, {
      code: 'TOO_MANY_REQUESTS',
      details: retryAfter ? { retryAfter } : undefined,
    });
  }

  static internalError(
    res: Response,
    message: string = 'Internal server error',
    error?: unknown
  ): Response {
    logger.error('[Internal Server Error]', {
      message,
      error: error instanceof Error ? error.stack : error,
    });

    return this.error(res, message, 500, {
      code: 'INTERNAL_ERROR',
    });
  }

  /**
   * Paginated Response
   */
  static paginated<T>(
    res: Response,
    data: T[],
    pagination: {
      page: number;
      limit: number;
      total: number;
      totalPages?: number;
    },
    message: string = 'Success',
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse<T[]> = {
      success: true,
      message,
      data,
      pagination: {
        ...pagination,
        totalPages: pagination.totalPages ?? Math.ceil(pagination.total / pagination.limit),
      },
      ...(meta && { meta }),
    };

    return res.status(200).json(response);
  }
}

import { Response, NextFunction } from 'express';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';
import { AuthRequest } from '../types/request.types';

interface RateLimitEntry {
  count: number;
  resetTime: number;
}

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
  message?: string;
  /** Key của bucket; mặc định user id hoặc IP */
  keyGenerator?: (req: AuthRequest) => string;
}

const stores = new Set<Map<string, RateLimitEntry>>();

/**
 * Clear expired entries periodically
 */
setInterval(() => {
  const now = Date.now();
  for (const store of stores) {
    for (const [key, entry] of store) {
      if (entry.resetTime < now) {
        store.delete(key);
      }
    }
  }
}, 60000).unref();

const clientKey = (req: AuthRequest): string => req.user?.id || req.ip || 'unknown';

/**
 * Login/register: đếm theo IP + email, để một IP không khóa email khác
 * và đổi IP không né được giới hạn của một email
 */
export const authAttemptKey = (req: AuthRequest): string => {
  const body: unknown = req.body;
  const email =
    typeof body === 'object' && body !== null && 'email' in body && typeof body.email === 'string'
      ? body.email.trim().toLowerCase()
      : '';
  return `${req.ip || 'unknown'}:${email}`;
};

export const rateLimit = ({ windowMs, maxRequests, message, keyGenerator = clientKey }: RateLimitOptions) => {
  const store = new Map<string, RateLimitEntry>();
  stores.add(store);

  return (req: AuthRequest, res: Response, next: NextFunction) => {
    const now = Date.now();
    const key = `${req.path}:${keyGenerator(req)}`;

    let entry = store.get(key);
    if (!entry || entry.resetTime < now) {
      entry = { count: 0, resetTime: now + windowMs };
      store.set(key, entry);
    }

    entry.count++;

    res.setHeader('X-RateLimit-Limit', maxRequests.toString());
    res.setHeader('X-RateLimit-Remaining', Math.max(0, maxRequests - entry.count).toString());
    res.setHeader('X-RateLimit-Reset', new Date(entry.resetTime).toISOString());

    if (entry.count > maxRequests) {
      const retryAfter = Math.ceil((entry.resetTime - now) / 1000);

      logger.warn('[Rate Limit Exceeded]', { key, path: req.path, count: entry.count, limit: maxRequests });

      return ResponseHandler.tooManyRequests(
        res,
        message || `Too many requests. Please retry in ${retryAfter} seconds.`,
        retryAfter
      );
    }

    next();
  };
};

export const rateLimiters = {
  // 10 lần / 15 phút cho mỗi cặp IP + email
  auth: rateLimit({
    windowMs: 15 * 60 * 1000,
    maxRequests: 10,
    message: 'Too many sign-in attempts. Please retry in 15 minutes.',
    keyGenerator: authAttemptKey,
  }),

  // Upload ảnh sản phẩm: 20 lần / phút cho mỗi user
  upload: rateLimit({
    windowMs: 60 * 1000,
    maxRequests: 20,
    message: 'Too many uploads. Please retry later.',
  }),
};

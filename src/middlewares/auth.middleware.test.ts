import { describe, expect, it, vi } from 'vitest';
import type { Response } from 'express';
import { getAuthUser, requireRole } from './auth.middleware';
import type { AuthRequest } from '../types/request.types';
import { AppError } from '../utils/errors';

const mockResponse = () => {
  const res = { status: vi.fn(), json: vi.fn() };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
};

const requestAs = (role?: 'user' | 'admin') =>
  ({ user: role ? { id: 'user-1', email: 'owner@example.com', role } : undefined }) as unknown as AuthRequest;

describe('requireRole', () => {
  it('lets matching roles through', () => {
    const next = vi.fn();
    requireRole('admin')(requestAs('admin'), mockResponse() as unknown as Response, next);

    expect(next).toHaveBeenCalledTimes(1);
  });

  it('forbids other roles', () => {
    const next = vi.fn();
    const res = mockResponse();
    requireRole('admin')(requestAs('user'), res as unknown as Response, next);

    expect(next).not.toHaveBeenCalled();
    expect(res.status).toHaveBeenCalledWith(403);
  });

  it('requires authentication first', () => {
    const res = mockResponse();
    requireRole('admin')(requestAs(), res as unknown as Response, vi.fn());

    expect(res.status).toHaveBeenCalledWith(401);
  });
});

describe('getAuthUser', () => {
  it('returns the authenticated user', () => {
    expect(getAuthUser(requestAs('user'))).toEqual({ id: 'user-1', email: 'owner@example.com', role: 'user' });
  });

  it('throws 401 without a user', () => {
    expect(() => getAuthUser(requestAs())).toThrow(AppError);
  });
});

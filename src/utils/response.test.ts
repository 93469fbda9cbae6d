import { describe, expect, it, vi } from 'vitest';
import type { Response } from 'express';
import { ResponseHandler } from './response';

const mockResponse = () => {
  const res = { status: vi.fn(), json: vi.fn() };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
};

describe('ResponseHandler', () => {
  it('wraps data in the success envelope', () => {
    const res = mockResponse();
    ResponseHandler.success(res as unknown as Response, { id: 1 }, 'Product updated', 200, { today: '2026-10-18' });

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith({
      success: true,
      message: 'Product updated',
      data: { id: 1 },
      meta: { today: '2026-10-18' },
    });
  });

  it('uses 201 for created resources', () => {
    const res = mockResponse();
    ResponseHandler.created(res as unknown as Response, { id: 2 }, 'Product added');

    expect(res.status).toHaveBeenCalledWith(201);
  });

  it('keeps the page count it is given', () => {
    const res = mockResponse();
    ResponseHandler.paginated(res as unknown as Response, [], { page: 1, limit: 10, total: 0, totalPages: 1 });

    expect(res.json).toHaveBeenCalledWith({
      success: true,
      message: 'Success',
      data: [],
      pagination: { page: 1, limit: 10, total: 0, totalPages: 1 },
    });
  });

  it('derives the page count when missing', () => {
    const res = mockResponse();
    ResponseHandler.paginated(res as unknown as Response, ['a', 'b'], { page: 1, limit: 2, total: 5 }, 'Products retrieved', {
      counts: { total: 5 },
    });

    expect(res.json).toHaveBeenCalledWith({
      success: true,
      message: 'Products retrieved',
      data: ['a', 'b'],
      pagination: { page: 1, limit: 2, total: 5, totalPages: 3 },
      meta: { counts: { total: 5 } },
    });
  });

  it('reports retry time on rate limiting', () => {
    const res = mockResponse();
    ResponseHandler.tooManyRequests(res as unknown as Response, 'Slow down', 30);

    expect(res.status).toHaveBeenCalledWith(429);
    expect(res.json).toHaveBeenCalledWith({
      success: false,
      message: 'Slow down',
      error: { code: 'TOO_MANY_REQUESTS', details: { retryAfter: 30 } },
    });
  });
});

import { Response, NextFunction } from 'express';
import { pool } from '../../connections';
import type { UsageLog } from '../../connections/db/models/usage-log.model';
import { getAuthUser } from '../../middlewares/auth.middleware';
import { AuthRequest } from '../../types/request.types';
import { NotFoundError } from '../../utils/errors';
import { auditLog } from '../../utils/logging';
import { ResponseHandler } from '../../utils/response';
import { createUsageLogSchema, usageLogIdSchema } from './usage-logs.validation';

// Sản phẩm phải thuộc về user, nếu không coi như không tồn tại
const requireOwnedProduct = async (userId: string, rawId: string): Promise<number> => {
  const parsed = usageLogIdSchema.safeParse(rawId);
  if (!parsed.success) {
    throw new NotFoundError('Product not found');
  }

  const result = await pool.query<{ id: number }>(
    'SELECT id FROM cosmetic_products WHERE id = $1 AND user_id = $2',
    [parsed.data, userId]
  );
  if (result.rows.length === 0) {
    throw new NotFoundError('Product not found');
  }
  return parsed.data;
};

export const getUsageLogs = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const user = getAuthUser(req);
    const productId = await requireOwnedProduct(user.id, req.params.id);

    const result = await pool.query<UsageLog>(
      'SELECT * FROM usage_logs WHERE product_id = $1 ORDER BY used_at DESC, id DESC',
      [productId]
    );

    return ResponseHandler.success(res, result.rows);
  } catch (error: unknown) {
    next(error);
  }
};

export const createUsageLog = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const user = getAuthUser(req);
    const productId = await requireOwnedProduct(user.id, req.params.id);
    const { notes } = createUsageLogSchema.parse(req.body);

    const result = await pool.query<UsageLog>(
      'INSERT INTO usage_logs (product_id, notes) VALUES ($1, $2) RETURNING *',
      [productId, notes ?? '']
    );

    return ResponseHandler.created(res, result.rows[0], 'Usage recorded');
  } catch (error: unknown) {
    next(error);
  }
};

export const deleteUsageLog = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const user = getAuthUser(req);
    const parsed = usageLogIdSchema.safeParse(req.params.id);
    if (!parsed.success) {
      throw new NotFoundError('Usage log not found');
    }

    const result = await pool.query<{ id: number }>(
      `DELETE FROM usage_logs ul
       USING cosmetic_products p
       WHERE ul.id = $1 AND ul.product_id = p.id AND p.user_id = $2
       RETURNING ul.id`,
      [parsed.data, user.id]
    );
    if (result.rows.length === 0) {
      throw new NotFoundError('Usage log not found');
    }

    auditLog('USAGE_LOG_DELETED', { userId: user.id, usageLogId: parsed.data, ip: req.ip });

    return ResponseHandler.success(res, null, 'Usage log deleted');
  } catch (error: unknown) {
    next(error);
  }
};

import { Response, NextFunction } from 'express';
import { pool } from '../../connections';
import type { Brand } from '../../connections/db/models/brand.model';
import { getAuthUser } from '../../middlewares/auth.middleware';
import { AuthRequest } from '../../types/request.types';
import { ConflictError, NotFoundError } from '../../utils/errors';
import { auditLog, logger } from '../../utils/logging';
import { ResponseHandler } from '../../utils/response';
import { brandIdSchema, createBrandSchema, updateBrandSchema } from './brands.validation';

const parseBrandId = (raw: string): number => {
  const parsed = brandIdSchema.safeParse(raw);
  if (!parsed.success) {
    throw new NotFoundError('Brand not found');
  }
  return parsed.data;
};

const ensureNameAvailable = async (name: string, excludeId?: number) => {
  const existing = await pool.query<{ id: number }>(
    'SELECT id FROM brands WHERE LOWER(name) = LOWER($1) AND ($2::int IS NULL OR id <> $2)',
    [name, excludeId ?? null]
  );
  if (existing.rows.length > 0) {
    throw new ConflictError(`Brand "${name}" already exists`);
  }
};

export const getBrands = async (_req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const result = await pool.query<Brand>('SELECT * FROM brands ORDER BY name ASC');
    return ResponseHandler.success(res, result.rows);
  } catch (error: unknown) {
    next(error);
  }
};

export const getBrandById = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const result = await pool.query<Brand>('SELECT * FROM brands WHERE id = $1', [parseBrandId(req.params.id)]);
    if (result.rows.length === 0) {
      throw new NotFoundError('Brand not found');
    }
    return ResponseHandler.success(res, result.rows[0]);
  } catch (error: unknown) {
    next(error);
  }
};

export const createBrand = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const user = getAuthUser(req);
    const { name, description } = createBrandSchema.parse(req.body);
    await ensureNameAvailable(name);

    const result = await pool.query<Brand>(
      'INSERT INTO brands (name, description) VALUES ($1, $2) RETURNING *',
      [name, description ?? '']
    );

    auditLog('BRAND_CREATED', { userId: user.id, brandId: result.rows[0].id, name });
    return ResponseHandler.created(res, result.rows[0], 'Brand created');
  } catch (error: unknown) {
    next(error);
  }
};

export const updateBrand = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const user = getAuthUser(req);
    const id = parseBrandId(req.params.id);
    const input = updateBrandSchema.parse(req.body);

    if (input.name !== undefined) {
      await ensureNameAvailable(input.name, id);
    }

    const result = await pool.query<Brand>(
      `UPDATE brands SET
         name = COALESCE($1, name),
         description = COALESCE($2, description)
       WHERE id = $3
       RETURNING *`,
      [input.name ?? null, input.description ?? null, id]
    );
    if (result.rows.length === 0) {
      throw new NotFoundError('Brand not found');
    }

    auditLog('BRAND_UPDATED', { userId: user.id, brandId: id, fields: Object.keys(input) });
    return ResponseHandler.success(res, result.rows[0], 'Brand updated');
  } catch (error: unknown) {
    next(error);
  }
};

// Xóa brand sẽ xóa luôn các sản phẩm của brand đó (ON DELETE CASCADE)
export const deleteBrand = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const user = getAuthUser(req);
    const id = parseBrandId(req.params.id);

    const result = await pool.query<{ id: number }>('DELETE FROM brands WHERE id = $1 RETURNING id', [id]);
    if (result.rows.length === 0) {
      throw new NotFoundError('Brand not found');
    }

    logger.info('[Brands] Brand deleted', { brandId: id });
    auditLog('BRAND_DELETED', { userId: user.id, brandId: id });
    return ResponseHandler.success(res, null, 'Brand deleted');
  } catch (error: unknown) {
    next(error);
  }
};

import { Response, NextFunction } from 'express';
import { pool } from '../../connections';
import type { Category } from '../../connections/db/models/category.model';
import { CATEGORY_TYPE_LABELS, CATEGORY_TYPE_VALUES } from '../../constants/product.constants';
import type { CategoryType } from '../../constants/product.constants';
import { getAuthUser } from '../../middlewares/auth.middleware';
import { AuthRequest } from '../../types/request.types';
import { ConflictError, NotFoundError } from '../../utils/errors';
import { auditLog } from '../../utils/logging';
import { ResponseHandler } from '../../utils/response';
import { categoryIdSchema, createCategorySchema, updateCategorySchema } from './categories.validation';

const parseCategoryId = (raw: string): number => {
  const parsed = categoryIdSchema.safeParse(raw);
  if (!parsed.success) {
    throw new NotFoundError('Category not found');
  }
  return parsed.data;
};

const findCategory = async (id: number): Promise<Category> => {
  const result = await pool.query<Category>('SELECT * FROM categories WHERE id = $1', [id]);
  if (result.rows.length === 0) {
    throw new NotFoundError('Category not found');
  }
  return result.rows[0];
};

// Unique theo cặp (name, category_type)
const ensureUnique = async (name: string, categoryType: CategoryType, excludeId?: number) => {
  const existing = await pool.query<{ id: number }>(
    'SELECT id FROM categories WHERE name = $1 AND category_type = $2 AND ($3::int IS NULL OR id <> $3)',
    [name, categoryType, excludeId ?? null]
  );
  if (existing.rows.length > 0) {
    throw new ConflictError(`Category "${name}" already exists for ${CATEGORY_TYPE_LABELS[categoryType]}`);
  }
};

export const getCategoryTypes = async (_req: AuthRequest, res: Response) => {
  return ResponseHandler.success(
    res,
    CATEGORY_TYPE_VALUES.map(value => ({ value, label: CATEGORY_TYPE_LABELS[value] }))
  );
};

export const getCategories = async (_req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const result = await pool.query<Category>('SELECT * FROM categories ORDER BY category_type ASC, name ASC');
    return ResponseHandler.success(res, result.rows);
  } catch (error: unknown) {
    next(error);
  }
};

export const getCategoryById = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const category = await findCategory(parseCategoryId(req.params.id));
    return ResponseHandler.success(res, category);
  } catch (error: unknown) {
    next(error);
  }
};

export const createCategory = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const user = getAuthUser(req);
    const { name, category_type } = createCategorySchema.parse(req.body);
    await ensureUnique(name, category_type);

    const result = await pool.query<Category>(
      'INSERT INTO categories (name, category_type) VALUES ($1, $2) RETURNING *',
      [name, category_type]
    );

    auditLog('CATEGORY_CREATED', { userId: user.id, categoryId: result.rows[0].id, name, category_type });
    return ResponseHandler.created(res, result.rows[0], 'Category created');
  } catch (error: unknown) {
    next(error);
  }
};

export const updateCategory = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const user = getAuthUser(req);
    const id = parseCategoryId(req.params.id);
    const input = updateCategorySchema.parse(req.body);

    const current = await findCategory(id);
    const name = input.name ?? current.name;
    const categoryType = input.category_type ?? current.category_type;
    await ensureUnique(name, categoryType, id);

    const result = await pool.query<Category>(
      'UPDATE categories SET name = $1, category_type = $2 WHERE id = $3 RETURNING *',
      [name, categoryType, id]
    );

    auditLog('CATEGORY_UPDATED', { userId: user.id, categoryId: id, fields: Object.keys(input) });
    return ResponseHandler.success(res, result.rows[0], 'Category updated');
  } catch (error: unknown) {
    next(error);
  }
};

// Sản phẩm thuộc category bị xóa sẽ có category_id = NULL
export const deleteCategory = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const user = getAuthUser(req);
    const id = parseCategoryId(req.params.id);

    const result = await pool.query<{ id: number }>('DELETE FROM categories WHERE id = $1 RETURNING id', [id]);
    if (result.rows.length === 0) {
      throw new NotFoundError('Category not found');
    }

    auditLog('CATEGORY_DELETED', { userId: user.id, categoryId: id });
    return ResponseHandler.success(res, null, 'Category deleted');
  } catch (error: unknown) {
    next(error);
  }
};

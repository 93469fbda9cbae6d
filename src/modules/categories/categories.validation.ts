import { z } from 'zod';
import { CATEGORY_TYPE_VALUES, MAX_DB_ID } from '../../constants/product.constants';

export const createCategorySchema = z.object({
  name: z.string().trim().min(1, 'Category name is required').max(50),
  category_type: z.enum(CATEGORY_TYPE_VALUES),
});

export const updateCategorySchema = createCategorySchema.partial().refine(data => Object.keys(data).length > 0, {
  message: 'At least one field must be provided',
});

export const categoryIdSchema = z.coerce.number().int().positive().max(MAX_DB_ID);

import { z } from 'zod';
import { MAX_DB_ID } from '../../constants/product.constants';

// Validation schemas cho module Brands
export const createBrandSchema = z.object({
  name: z.string().trim().min(1, 'Brand name is required').max(100),
  description: z.string().max(2000).optional(),
});

export const updateBrandSchema = createBrandSchema.partial().refine(data => Object.keys(data).length > 0, {
  message: 'At least one field must be provided',
});

export const brandIdSchema = z.coerce.number().int().positive().max(MAX_DB_ID);

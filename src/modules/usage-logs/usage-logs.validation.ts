import { z } from 'zod';
import { MAX_DB_ID } from '../../constants/product.constants';

export const createUsageLogSchema = z.object({
  notes: z.string().max(1000).optional(),
});

export const usageLogIdSchema = z.coerce.number().int().positive().max(MAX_DB_ID);

import { z } from 'zod';
import {
  DEFAULT_PAGE_SIZE,
  DEFAULT_PAO_MONTHS,
  EXPIRATION_TIER_VALUES,
  MAX_DB_ID,
  MAX_PAGE_SIZE,
  MAX_PAO_MONTHS,
  OPEN_STATUS_VALUES,
} from '../../constants/product.constants';
import { isIsoDate } from '../../utils/date';

const isoDate = z.string().refine(isIsoDate, 'Must be a date in YYYY-MM-DD format');

const recordId = z.number().int().positive().max(MAX_DB_ID);

// Validation schemas cho module Products
const productFields = {
  brand_id: recordId,
  category_id: recordId.nullable(),
  name: z.string().trim().min(1, 'Product name is required').max(200),
  shade: z.string().max(100),
  capacity: z.string().max(50),
  purchase_date: isoDate,
  price: z.number().nonnegative().max(999999.99).nullable(),
  purchase_location: z.string().max(200),
  production_date: isoDate.nullable(),
  expiration_date: isoDate,
  status: z.enum(OPEN_STATUS_VALUES),
  opened_date: isoDate.nullable(),
  pao_after_opening: z
    .number()
    .int()
    .nonnegative('Period after opening cannot be negative')
    .max(MAX_PAO_MONTHS, `Period after opening cannot exceed ${MAX_PAO_MONTHS} months`)
    .nullable(),
  rating: z.number().int().min(1).max(5).nullable(),
  description: z.string(),
  ingredients: z.string(),
  notes: z.string(),
  // image_url chỉ được ghi qua endpoint upload
};

export const createProductSchema = z.object({
  ...productFields,
  category_id: productFields.category_id.optional(),
  shade: productFields.shade.optional(),
  capacity: productFields.capacity.optional(),
  purchase_date: productFields.purchase_date.optional(),
  price: productFields.price.optional(),
  purchase_location: productFields.purchase_location.optional(),
  production_date: productFields.production_date.optional(),
  status: productFields.status.optional(),
  opened_date: productFields.opened_date.optional(),
  // Bỏ trống thì mặc định 12 tháng; null = không giới hạn PAO
  pao_after_opening: productFields.pao_after_opening.default(DEFAULT_PAO_MONTHS),
  rating: productFields.rating.optional(),
  description: productFields.description.optional(),
  ingredients: productFields.ingredients.optional(),
  notes: productFields.notes.optional(),
});

export const updateProductSchema = z
  .object(productFields)
  .partial()
  .refine(data => Object.keys(data).length > 0, {
    message: 'At least one field must be provided',
  });

/**
 * List query - giá trị không hợp lệ coi như không lọc, không báo lỗi
 */
export const productListQuerySchema = z.object({
  status: z.enum(EXPIRATION_TIER_VALUES).optional().catch(undefined),
  // Số nguyên bất kỳ là một bộ lọc (0, âm, quá lớn -> không khớp category nào); còn lại bỏ qua
  category: z
    .string()
    .trim()
    .regex(/^-?\d+$/)
    .transform(Number)
    .optional()
    .catch(undefined),
  search: z.string().trim().min(1).max(200).optional().catch(undefined),
  page: z.coerce.number().int().min(1).optional().catch(undefined),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE).catch(DEFAULT_PAGE_SIZE),
});

export const productIdSchema = z.coerce.number().int().positive().max(MAX_DB_ID);

export type CreateProductBody = z.infer<typeof createProductSchema>;
export type UpdateProductBody = z.infer<typeof updateProductSchema>;
export type ProductListQuery = z.infer<typeof productListQuerySchema>;

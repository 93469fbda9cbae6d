import { Response, NextFunction } from 'express';
import { AuthRequest } from '../../types/request.types';
import { getAuthUser } from '../../middlewares/auth.middleware';
import {
  CATEGORY_TYPE_LABELS,
  CATEGORY_TYPE_VALUES,
  EXPIRATION_PRIORITY,
  EXPIRATION_TIER_LABELS,
  EXPIRATION_TIER_VALUES,
  OPEN_STATUS_LABELS,
  OPEN_STATUS_VALUES,
} from '../../constants/product.constants';
import { ResponseHandler } from '../../utils/response';
import { BadRequestError, NotFoundError, toError } from '../../utils/errors';
import { logger, auditLog } from '../../utils/logging';
import { deleteImageFromLocal, saveImageToLocal } from '../upload/localStorage.service';
import { ProductService } from './products.service';
import {
  createProductSchema,
  productIdSchema,
  productListQuerySchema,
  updateProductSchema,
} from './products.validation';

const productService = new ProductService();

const parseProductId = (raw: string): number => {
  const parsed = productIdSchema.safeParse(raw);
  if (!parsed.success) {
    throw new NotFoundError('Product not found');
  }
  return parsed.data;
};

const removeStoredImage = async (imageUrl: string | null, productId: number) => {
  if (!imageUrl) return;
  try {
    await deleteImageFromLocal(imageUrl);
  } catch (error: unknown) {
    // Ảnh mồ côi không ảnh hưởng dữ liệu, chỉ log lại
    logger.warn('[Products] Failed to delete stored image', {
      productId,
      imageUrl,
      error: toError(error).message,
    });
  }
};

// Danh sách sản phẩm: lọc theo tier / category / search, kèm thống kê theo tier
export const listProducts = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const user = getAuthUser(req);
    const query = productListQuerySchema.parse(req.query);
    const today = productService.today();

    const result = await productService.queryProductPage(
      user.id,
      {
        status_tier: query.status,
        category_id: query.category,
        search_text: query.search,
      },
      { page: query.page, limit: query.limit },
      today
    );

    return ResponseHandler.paginated(res, result.items, result.pagination, 'Products retrieved', {
      counts: result.counts,
      today,
      filters: {
        status: query.status ?? null,
        category: query.category ?? null,
        search: query.search ?? null,
      },
    });
  } catch (error: unknown) {
    next(error);
  }
};

// Trang "sắp hết hạn": expired / urgent / soon
export const getExpiringProducts = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const user = getAuthUser(req);
    const today = productService.today();
    const overview = await productService.getExpiringOverview(user.id, today);

    return ResponseHandler.success(res, overview, 'Expiring products retrieved', 200, { today });
  } catch (error: unknown) {
    next(error);
  }
};

// Read-only enumerations cho form và bộ lọc
export const getStatuses = async (_req: AuthRequest, res: Response) => {
  return ResponseHandler.success(res, {
    openStatuses: OPEN_STATUS_VALUES.map(value => ({ value, label: OPEN_STATUS_LABELS[value] })),
    expirationTiers: EXPIRATION_TIER_VALUES.map(value => ({
      value,
      label: EXPIRATION_TIER_LABELS[value],
      priority: EXPIRATION_PRIORITY[value],
    })),
    categoryTypes: CATEGORY_TYPE_VALUES.map(value => ({ value, label: CATEGORY_TYPE_LABELS[value] })),
  });
};

export const getProductById = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const user = getAuthUser(req);
    const product = await productService.getProduct(user.id, parseProductId(req.params.id));

    return ResponseHandler.success(res, product);
  } catch (error: unknown) {
    next(error);
  }
};

export const createProduct = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const user = getAuthUser(req);
    const input = createProductSchema.parse(req.body);
    const product = await productService.createProduct(user.id, input);

    auditLog('PRODUCT_CREATED', { userId: user.id, productId: product.id, ip: req.ip });

    return ResponseHandler.created(res, product, 'Product added');
  } catch (error: unknown) {
    next(error);
  }
};

export const updateProduct = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const user = getAuthUser(req);
    const id = parseProductId(req.params.id);
    const input = updateProductSchema.parse(req.body);
    const product = await productService.updateProduct(user.id, id, input);

    auditLog('PRODUCT_UPDATED', { userId: user.id, productId: id, fields: Object.keys(input), ip: req.ip });

    return ResponseHandler.success(res, product, 'Product updated');
  } catch (error: unknown) {
    next(error);
  }
};

export const deleteProduct = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const user = getAuthUser(req);
    const id = parseProductId(req.params.id);
    const deleted = await productService.deleteProduct(user.id, id);

    await removeStoredImage(deleted.image_url, id);
    auditLog('PRODUCT_DELETED', { userId: user.id, productId: id, ip: req.ip });

    return ResponseHandler.success(res, null, 'Product deleted');
  } catch (error: unknown) {
    next(error);
  }
};

// Upload ảnh sản phẩm (field "image"), thay thế ảnh cũ
export const uploadProductImage = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const user = getAuthUser(req);
    const id = parseProductId(req.params.id);

    if (!req.file) {
      throw new BadRequestError('Image file is required');
    }

    const existing = await productService.getProduct(user.id, id);
    const imageUrl = await saveImageToLocal(req.file.buffer, req.file.originalname);
    const product = await productService.updateProduct(user.id, id, { image_url: imageUrl });

    await removeStoredImage(existing.image_url, id);
    logger.info('[Products] Image uploaded', { userId: user.id, productId: id, imageUrl });

    return ResponseHandler.success(res, product, 'Image uploaded');
  } catch (error: unknown) {
    next(error);
  }
};

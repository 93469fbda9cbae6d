import express from 'express';
import * as productsController from './products.controller';
import * as usageLogsController from '../usage-logs/usage-logs.controller';
import { authenticate } from '../../middlewares/auth.middleware';
import { rateLimiters } from '../../middlewares/rateLimit.middleware';
import { productImageMiddleware } from './products.upload';

const router = express.Router();

// Mọi route sản phẩm đều theo user đăng nhập
router.use(authenticate);

router.get('/expiring', productsController.getExpiringProducts);
router.get('/statuses', productsController.getStatuses);
router.get('/', productsController.listProducts);
router.post('/', productsController.createProduct);
router.get('/:id', productsController.getProductById);
router.put('/:id', productsController.updateProduct);
router.delete('/:id', productsController.deleteProduct);

router.post('/:id/image', rateLimiters.upload, productImageMiddleware, productsController.uploadProductImage);

// Usage logs của một sản phẩm
router.get('/:id/usage-logs', usageLogsController.getUsageLogs);
router.post('/:id/usage-logs', usageLogsController.createUsageLog);

export default router;

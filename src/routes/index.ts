import express from 'express';
import authRoutes from '../modules/auth/auth.routes';
import brandsRoutes from '../modules/brands/brands.routes';
import categoriesRoutes from '../modules/categories/categories.routes';
import productsRoutes from '../modules/products/products.routes';
import usageLogsRoutes from '../modules/usage-logs/usage-logs.routes';

const router = express.Router();

// API Routes
router.use('/auth', authRoutes);
router.use('/brands', brandsRoutes);
router.use('/categories', categoriesRoutes);
router.use('/products', productsRoutes);
router.use('/usage-logs', usageLogsRoutes);

export default router;

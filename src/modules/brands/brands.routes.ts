import express from 'express';
import * as brandsController from './brands.controller';
import { authenticate, requireRole } from '../../middlewares/auth.middleware';
import { USER_ROLE } from '../../constants/user.constants';

const router = express.Router();

router.get('/', authenticate, brandsController.getBrands);
router.get('/:id', authenticate, brandsController.getBrandById);
router.post('/', authenticate, brandsController.createBrand);
router.put('/:id', authenticate, brandsController.updateBrand);
// Brand dùng chung cho mọi user, chỉ admin được xóa
router.delete('/:id', authenticate, requireRole(USER_ROLE.ADMIN), brandsController.deleteBrand);

export default router;

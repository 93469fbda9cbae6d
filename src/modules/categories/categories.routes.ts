import express from 'express';
import * as categoriesController from './categories.controller';
import { authenticate, requireRole } from '../../middlewares/auth.middleware';
import { USER_ROLE } from '../../constants/user.constants';

const router = express.Router();

router.get('/types', categoriesController.getCategoryTypes);
router.get('/', authenticate, categoriesController.getCategories);
router.get('/:id', authenticate, categoriesController.getCategoryById);
router.post('/', authenticate, categoriesController.createCategory);
router.put('/:id', authenticate, categoriesController.updateCategory);
router.delete('/:id', authenticate, requireRole(USER_ROLE.ADMIN), categoriesController.deleteCategory);

export default router;

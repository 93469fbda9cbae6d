import express from 'express';
import * as authController from './auth.controller';
import { authenticate } from '../../middlewares/auth.middleware';
import { rateLimiters } from '../../middlewares/rateLimit.middleware';

const router = express.Router();

// Đăng ký / đăng nhập (có rate limiting)
router.post('/register', rateLimiters.auth, authController.register);
router.post('/login', rateLimiters.auth, authController.login);

// Get current user
router.get('/me', authenticate, authController.getCurrentUser);

export default router;

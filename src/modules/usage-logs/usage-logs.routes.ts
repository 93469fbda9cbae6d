import express from 'express';
import * as usageLogsController from './usage-logs.controller';
import { authenticate } from '../../middlewares/auth.middleware';

const router = express.Router();

// GET/POST nằm dưới /products/:id/usage-logs
router.delete('/:id', authenticate, usageLogsController.deleteUsageLog);

export default router;

import express from 'express';
import cors from 'cors';
import type { CorsOptions } from 'cors';
import { pool } from './connections';
import { appConfig } from './connections/config/app.config';
import routes from './routes';
import { logger } from './utils/logging';
import { toError } from './utils/errors';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';

const app = express();

const DEV_ORIGINS = ['http://localhost:3000', 'http://localhost:5173'];

// Danh sách origin được phép: FRONTEND_URL + CORS_ORIGINS (+ localhost khi dev)
const allowedOrigins = new Set<string>([
  ...(appConfig.frontendUrl ? [appConfig.frontendUrl] : []),
  ...appConfig.corsOrigins,
  ...(appConfig.nodeEnv === 'development' ? DEV_ORIGINS : []),
]);

const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Request không có origin (curl, mobile app)
    if (!origin || allowedOrigins.has(origin)) {
      return callback(null, true);
    }

    if (appConfig.nodeEnv === 'development' && appConfig.corsOrigins.length === 0) {
      return callback(null, true);
    }

    callback(new Error('Not allowed by CORS'));
  },
  credentials: true,
  methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'Accept', 'Origin'],
  exposedHeaders: ['X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset'],
  maxAge: 86400,
};

// Middleware
app.use(cors(corsOptions));
app.use(express.json());
app.use(express.urlencoded({ extended: true }));

// Health check
app.get('/health', async (_req, res) => {
  try {
    await pool.query('SELECT 1');
    res.json({ status: 'ok', database: 'connected' });
  } catch (error: unknown) {
    logger.error('[Health] Database ping failed', { error: toError(error).message });
    res.status(500).json({ status: 'error', database: 'disconnected' });
  }
});

// Ảnh sản phẩm lưu local
app.use('/uploads', express.static(appConfig.uploadDir));

// API Routes
app.use('/api', routes);

// Error handling
app.use(notFoundHandler);
app.use(errorHandler);

export default app;


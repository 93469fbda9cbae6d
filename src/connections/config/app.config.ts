import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (): string[] => {
  const corsOrigins = process.env.CORS_ORIGINS || '';
  if (!corsOrigins) {
    return [];
  }

  // Split by comma or space, then trim and filter empty strings
  return corsOrigins
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

export const appConfig = {
  port: parseInt(process.env.APP_PORT || process.env.PORT || '3000'),
  nodeEnv: process.env.NODE_ENV || 'development',
  jwtSecret: process.env.JWT_SECRET || 'secret',
  jwtExpiresIn: parseInt(process.env.JWT_EXPIRES_IN || '604800'), // seconds, 7 ngày
  frontendUrl: process.env.FRONTEND_URL || 'http://localhost:5173',
  corsOrigins: parseCorsOrigins(),
  maxFileSize: parseInt(process.env.MAX_FILE_SIZE || '5242880'), // 5MB
  uploadDir: process.env.UPLOAD_DIR || path.join(process.cwd(), 'uploads'),
  baseUrl: process.env.BASE_URL || 'http://localhost:3000',
  logLevel: (process.env.LOG_LEVEL || 'info').toLowerCase(),
  logDir: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
  logRotation: process.env.LOG_ROTATION || '10MB',
  logRetention: process.env.LOG_RETENTION || '30 days',
};

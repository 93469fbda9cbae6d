/**
 * Multer configuration for product image uploads
 */

import multer from 'multer';
import { appConfig } from '../../connections/config/app.config';
import { BadRequestError } from '../../utils/errors';

export const VALID_IMAGE_TYPES = ['image/jpeg', 'image/jpg', 'image/png', 'image/gif', 'image/webp'];

// Configure multer for memory storage
const storage = multer.memoryStorage();
export const productImageUpload = multer({
  storage,
  limits: {
    fileSize: appConfig.maxFileSize,
  },
  fileFilter: (req, file, cb) => {
    if (VALID_IMAGE_TYPES.includes(file.mimetype)) {
      cb(null, true);
    } else {
      cb(new BadRequestError(`File type ${file.mimetype} is not supported`));
    }
  },
});

// Middleware for a single product image (field "image")
export const productImageMiddleware = productImageUpload.single('image');

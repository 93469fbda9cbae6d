/**
 * Local Storage Service - Lưu ảnh sản phẩm vào local storage
 */

import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { appConfig } from '../../connections/config/app.config';
import { logger } from '../../utils/logging';

const IMAGE_SUBDIR = 'cosmetics';

const getImageDir = (): string => {
  const imageDir = path.join(appConfig.uploadDir, IMAGE_SUBDIR);

  if (!fs.existsSync(imageDir)) {
    fs.mkdirSync(imageDir, { recursive: true });
  }

  return imageDir;
};

/**
 * Generate unique filename
 */
export const generateFileName = (originalName: string): string => {
  const ext = path.extname(originalName).toLowerCase();
  const baseName = path
    .basename(originalName, path.extname(originalName))
    .replace(/[^a-zA-Z0-9_-]+/g, '-')
    .replace(/^-+|-+$/g, '') || 'image';
  const timestamp = Date.now();
  const uuid = uuidv4().substring(0, 8);
  return `${baseName}-${timestamp}-${uuid}${ext}`;
};

/**
 * Save image to local storage
 * @returns public URL of the stored file
 */
export const saveImageToLocal = async (fileBuffer: Buffer, fileName: string): Promise<string> => {
  const uniqueFileName = generateFileName(fileName);
  const filePath = path.join(getImageDir(), uniqueFileName);

  await fs.promises.writeFile(filePath, fileBuffer);

  return `${appConfig.baseUrl}/uploads/${IMAGE_SUBDIR}/${uniqueFileName}`;
};

/**
 * Get file path from URL
 * URL format: http://localhost:3000/uploads/cosmetics/filename.jpg
 * @returns File path or null if the URL is not one of ours
 */
export const getFilePathFromUrl = (fileUrl: string): string | null => {
  const urlParts = fileUrl.split('/uploads/');
  if (urlParts.length < 2) {
    return null;
  }

  const filePath = path.resolve(appConfig.uploadDir, urlParts[1]);
  // Không cho phép thoát ra ngoài upload dir
  if (!filePath.startsWith(path.resolve(appConfig.uploadDir) + path.sep)) {
    return null;
  }
  return filePath;
};

/**
 * Delete image from local storage
 */
export const deleteImageFromLocal = async (fileUrl: string): Promise<void> => {
  const filePath = getFilePathFromUrl(fileUrl);

  if (!filePath) {
    logger.warn('[Upload] Not a local upload URL, skipping delete', { fileUrl });
    return;
  }

  if (fs.existsSync(filePath)) {
    await fs.promises.unlink(filePath);
  } else {
    logger.warn(`[Upload] File not found: ${filePath}`);
  }
};

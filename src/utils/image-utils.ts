/**
 * Shared Image Utilities
 */

import sharp from 'sharp';

import { createChildLogger } from './logger.js';

const logger = createChildLogger({ service: 'image-utils' });

/**
 * Supported image MIME types
 */
export type ImageMimeType = 'image/png' | 'image/jpeg' | 'image/webp';

export interface ImageDimensions {
  width: number;
  height: number;
}

/**
 * Known image file extensions mapped to MIME types
 */
const EXTENSION_TO_MIME: Record<string, ImageMimeType> = {
  png: 'image/png',
  webp: 'image/webp',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
};

/**
 * Get MIME type from file extension
 */
export function getImageMimeType(filePath: string): ImageMimeType {
  const ext = filePath.toLowerCase().split('.').pop() || '';
  const mimeType = EXTENSION_TO_MIME[ext];

  if (!mimeType) {
    logger.warn({ filePath, extension: ext }, 'Unknown image extension, defaulting to image/jpeg');
    return 'image/jpeg';
  }

  return mimeType;
}

/**
 * Read pixel dimensions of an encoded image
 *
 * @throws Error when the buffer cannot be decoded as an image
 */
export async function getImageDimensions(image: Buffer): Promise<ImageDimensions> {
  const { width, height } = await sharp(image).metadata();

  if (!width || !height) {
    throw new Error('Unable to read image dimensions');
  }

  return { width, height };
}

/**
 * Stability AI Background Removal Provider
 *
 * Uses Stability AI's v2beta remove-background API for background removal.
 *
 * API Reference: https://platform.stability.ai/docs/api-reference#tag/Edit/paths/~1v2beta~1stable-image~1edit~1remove-background/post
 */

import sharp from 'sharp';

import { createChildLogger } from '../../utils/logger.js';
import { ExternalApiError } from '../../utils/errors.js';
import { getImageMimeType } from '../../utils/image-utils.js';
import type { BackgroundRemovalProvider } from '../interfaces/background-removal.provider.js';

const logger = createChildLogger({ service: 'stability-bg-removal' });

/**
 * Stability AI API constants
 */
const STABILITY_CONSTANTS = {
  /** v2beta remove-background endpoint */
  REMOVE_BG_ENDPOINT: '/v2beta/stable-image/edit/remove-background',
  /** Maximum payload size (10MB API limit, minus room for multipart headers) */
  MAX_PAYLOAD_BYTES: 9 * 1024 * 1024,
  /** Target width for resizing large images */
  RESIZE_TARGET_WIDTH: 2048,
} as const;

export interface StabilityBackgroundRemovalOptions {
  apiKey?: string;
  apiBase: string;
}

/**
 * Stability AI Background Removal Provider
 */
export class StabilityBackgroundRemovalProvider implements BackgroundRemovalProvider {
  readonly providerId = 'stability';

  constructor(private readonly options: StabilityBackgroundRemovalOptions) {}

  async removeBackground(image: Buffer, filename: string): Promise<Buffer> {
    const { apiKey, apiBase } = this.options;

    if (!apiKey) {
      throw new ExternalApiError('Stability', 'API key not configured (STABILITY_API_KEY)');
    }

    logger.info({ filename, size: image.length }, 'Removing background with Stability AI');

    let payload = image;
    let mimeType: string = getImageMimeType(filename);

    // Stability rejects payloads over 10MB
    if (payload.length > STABILITY_CONSTANTS.MAX_PAYLOAD_BYTES) {
      logger.info({
        originalSize: image.length,
        maxSize: STABILITY_CONSTANTS.MAX_PAYLOAD_BYTES,
      }, 'Image too large, resizing before upload');

      payload = await this.resizeImageForUpload(image);
      mimeType = 'image/jpeg';
    }

    const formData = new FormData();
    formData.append('image', new Blob([new Uint8Array(payload)], { type: mimeType }), filename);
    formData.append('output_format', 'png');

    const endpoint = `${apiBase}${STABILITY_CONSTANTS.REMOVE_BG_ENDPOINT}`;
    const result = await this.makeRequest(apiKey, endpoint, formData);

    logger.info({ filename, size: result.length }, 'Background removed successfully with Stability AI');
    return result;
  }

  /**
   * Single call; failures propagate to the pipeline
   */
  private async makeRequest(apiKey: string, endpoint: string, formData: FormData): Promise<Buffer> {
    let response: Response;
    try {
      logger.debug({ endpoint }, 'Calling Stability AI remove-background API');

      response = await fetch(endpoint, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${apiKey}`,
          'Accept': 'image/*',
        },
        body: formData,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExternalApiError(
        'Stability',
        `Request failed: ${message}`,
        error instanceof Error ? error : undefined
      );
    }

    if (!response.ok) {
      let errorDetails = '';
      try {
        errorDetails = await response.text();
      } catch {
        errorDetails = `HTTP ${response.status}`;
      }

      logger.error({ status: response.status, error: errorDetails.slice(0, 500) }, 'Stability API error');
      throw new ExternalApiError('Stability', `API error (HTTP ${response.status}): ${errorDetails}`);
    }

    const arrayBuffer = await response.arrayBuffer();
    return Buffer.from(arrayBuffer);
  }

  /**
   * Progressively shrink the image until it fits the payload limit
   */
  private async resizeImageForUpload(imageBuffer: Buffer): Promise<Buffer> {
    let currentBuffer: Buffer = imageBuffer;
    let currentWidth: number = STABILITY_CONSTANTS.RESIZE_TARGET_WIDTH;

    while (currentBuffer.length > STABILITY_CONSTANTS.MAX_PAYLOAD_BYTES && currentWidth >= 512) {
      currentBuffer = await sharp(imageBuffer)
        .resize(currentWidth, null, {
          fit: 'inside',
          withoutEnlargement: true,
        })
        .jpeg({ quality: 85 })
        .toBuffer();

      if (currentBuffer.length > STABILITY_CONSTANTS.MAX_PAYLOAD_BYTES) {
        currentWidth = Math.floor(currentWidth * 0.75);
      }
    }

    return currentBuffer;
  }

  isAvailable(): boolean {
    return !!this.options.apiKey;
  }
}

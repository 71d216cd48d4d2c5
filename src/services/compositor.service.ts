import sharp from 'sharp';

import { createChildLogger } from '../utils/logger.js';
import { getImageDimensions, type ImageDimensions } from '../utils/image-utils.js';
import type { BackgroundRemovalProvider } from '../providers/interfaces/background-removal.provider.js';

const logger = createChildLogger({ service: 'compositor' });

/**
 * Where the scaled foreground lands on the background canvas
 */
export interface Placement {
  /** Scaled foreground size (width always equals the background width) */
  width: number;
  height: number;
  /** Offset of the scaled foreground's top-left corner; `top` is negative when it overflows */
  left: number;
  top: number;
  /** Rows cut off above the canvas */
  clippedRows: number;
  /** Rows of foreground actually painted onto the canvas */
  visibleHeight: number;
}

export interface CompositeResult {
  /** PNG with the background's exact dimensions */
  image: Buffer;
  width: number;
  height: number;
  placement: Placement;
}

export interface ImageInput {
  data: Buffer;
  filename: string;
}

/**
 * Fit the foreground to the background width, centered horizontally and
 * resting on the bottom edge.
 */
export function computePlacement(foreground: ImageDimensions, background: ImageDimensions): Placement {
  const width = background.width;
  const height = Math.max(1, Math.floor((foreground.height * background.width) / foreground.width));
  const left = Math.floor((background.width - width) / 2);
  const top = background.height - height;
  const clippedRows = top < 0 ? -top : 0;

  return {
    width,
    height,
    left,
    top,
    clippedRows,
    visibleHeight: height - clippedRows,
  };
}

/**
 * CompositorService - cut out the foreground subject and paste it onto the background
 */
export class CompositorService {
  constructor(private readonly backgroundRemoval: BackgroundRemovalProvider) {}

  async composite(foreground: ImageInput, background: ImageInput): Promise<CompositeResult> {
    const backgroundSize = await getImageDimensions(background.data);

    const cutout = await this.backgroundRemoval.removeBackground(foreground.data, foreground.filename);
    const cutoutSize = await getImageDimensions(cutout);

    const placement = computePlacement(cutoutSize, backgroundSize);

    logger.debug(
      {
        provider: this.backgroundRemoval.providerId,
        background: backgroundSize,
        cutout: cutoutSize,
        placement,
      },
      'Compositing foreground onto background'
    );

    let overlay = sharp(cutout)
      .ensureAlpha()
      .resize(placement.width, placement.height, { fit: 'fill', kernel: sharp.kernel.lanczos3 });

    // Anything above the canvas is dropped before pasting
    if (placement.clippedRows > 0) {
      overlay = sharp(await overlay.png().toBuffer()).extract({
        left: 0,
        top: placement.clippedRows,
        width: placement.width,
        height: placement.visibleHeight,
      });
    }

    const overlayBuffer = await overlay.png().toBuffer();

    const { data, info } = await sharp(background.data)
      .composite([
        {
          input: overlayBuffer,
          left: placement.left,
          top: Math.max(0, placement.top),
          blend: 'over',
        },
      ])
      .png()
      .toBuffer({ resolveWithObject: true });

    if (placement.clippedRows > 0) {
      logger.info(
        { clippedRows: placement.clippedRows },
        'Scaled foreground taller than background, top clipped'
      );
    }

    return {
      image: data,
      width: info.width,
      height: info.height,
      placement,
    };
  }
}

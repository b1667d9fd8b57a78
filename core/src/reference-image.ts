import sharp from 'sharp';
import { describeError } from './errors/index.js';
import type { Logger } from './logger.js';

/** Longest edge a reference image keeps; larger images are scaled down to fit. */
export const MAX_REFERENCE_DIMENSION = 4096;

export interface PreparedReference {
  data: Uint8Array;
  mimeType: string;
  width?: number;
  height?: number;
}

/**
 * Normalises a user reference image before it is hashed: EXIF orientation is
 * applied, only the first frame is kept, the longest edge is capped at
 * {@link MAX_REFERENCE_DIMENSION}, and the result is re-encoded as PNG when it
 * has an alpha channel or as JPEG (quality 90) otherwise.
 *
 * Bytes that do not decode as an image are returned unchanged under
 * `fallbackMimeType`.
 */
export async function prepareReferenceImage(
  data: Uint8Array,
  fallbackMimeType: string,
  logger: Partial<Logger> = {},
): Promise<PreparedReference> {
  let hasAlpha: boolean;
  try {
    ({ hasAlpha = false } = await sharp(data).metadata());
  } catch (error) {
    logger.debug?.('Reference is not a decodable image, keeping its bytes', { reason: describeError(error) });
    return { data, mimeType: fallbackMimeType };
  }

  const pipeline = sharp(data)
    .rotate()
    .resize({
      width: MAX_REFERENCE_DIMENSION,
      height: MAX_REFERENCE_DIMENSION,
      fit: 'inside',
      withoutEnlargement: true,
    })
    .toColourspace('srgb');
  const encoded = hasAlpha ? pipeline.png() : pipeline.jpeg({ quality: 90 });
  const { data: output, info } = await encoded.toBuffer({ resolveWithObject: true });

  return {
    data: output,
    mimeType: hasAlpha ? 'image/png' : 'image/jpeg',
    width: info.width,
    height: info.height,
  };
}

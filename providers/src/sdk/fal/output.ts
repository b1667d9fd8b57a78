import { isRecord } from '@keyreel/core';

/**
 * Normalizes fal.ai output to its media URLs.
 *
 * - Video: { video: { url } }
 * - Image (single): { image: { url } }
 * - Image (multiple): { images: [{ url }] }
 *
 * The output may be wrapped in a { data: ... } envelope.
 */
export function normalizeFalOutput(output: unknown): string[] {
  if (!isRecord(output)) {
    return [];
  }
  const obj = isRecord(output.data) ? output.data : output;
  const urls: string[] = [];

  const video = extractUrl(obj.video);
  if (video) urls.push(video);

  if (Array.isArray(obj.images)) {
    for (const item of obj.images) {
      const url = extractUrl(item);
      if (url) urls.push(url);
    }
  }

  const image = extractUrl(obj.image);
  if (image) urls.push(image);

  return urls;
}

function extractUrl(item: unknown): string | undefined {
  if (!isRecord(item)) {
    return undefined;
  }
  return typeof item.url === 'string' && item.url.length > 0 ? item.url : undefined;
}

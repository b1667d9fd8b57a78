import type { FalSettings, ImageClient, Logger, VideoClient } from '@keyreel/core';
import { draftFromUrls } from '../unified/artefacts.js';
import type { FalClientManager } from './client.js';
import { normalizeFalOutput } from './output.js';
import { falSubscribe } from './subscribe.js';

interface FalMediaOptions {
  manager: FalClientManager;
  settings: FalSettings;
  logger?: Partial<Logger>;
}

/**
 * Style reference from the uploaded references, keyframes from the style
 * reference plus the previous keyframe when there is one.
 */
export function createFalImageClient({ manager, settings, logger }: FalMediaOptions): ImageClient {
  return {
    async generateStyleReference({ prompt, references, signal }) {
      manager.ensure();
      const imageUrls = await Promise.all(references.map((ref) => manager.upload(ref)));
      const { output } = await falSubscribe(
        settings.styleModel,
        { prompt, image_url: imageUrls[0], ...(imageUrls.length > 1 ? { image_urls: imageUrls } : {}) },
        { logger, label: 'style-reference', signal },
      );
      return draftFromUrls(normalizeFalOutput(output), { kind: 'image', fallbackMimeType: 'image/png', signal });
    },

    async generateKeyframe({ index, prompt, styleReference, previous, signal }) {
      manager.ensure();
      const sources = previous ? [styleReference, previous] : [styleReference];
      const imageUrls = await Promise.all(sources.map((ref) => manager.upload(ref)));
      const { output } = await falSubscribe(
        settings.keyframeModel,
        { prompt, image_urls: imageUrls },
        { logger, label: `keyframe-${index}`, signal },
      );
      return draftFromUrls(normalizeFalOutput(output), { kind: 'image', fallbackMimeType: 'image/png', signal });
    },
  };
}

/** Clip lengths the image-to-video endpoint accepts, in seconds. */
const CLIP_DURATIONS = [5, 10] as const;

export function clipDurationFor(seconds: number): string {
  const fit = CLIP_DURATIONS.find((duration) => seconds <= duration) ?? CLIP_DURATIONS[CLIP_DURATIONS.length - 1];
  return String(fit);
}

/**
 * Image-to-video between the segment's two boundary keyframes.
 */
export function createFalVideoClient({ manager, settings, logger }: FalMediaOptions): VideoClient {
  return {
    async generateSegment({ segment, prompt, firstFrame, lastFrame, signal }) {
      manager.ensure();
      const [imageUrl, tailImageUrl] = await Promise.all([manager.upload(firstFrame), manager.upload(lastFrame)]);
      const { output } = await falSubscribe(
        settings.videoModel,
        {
          prompt,
          image_url: imageUrl,
          tail_image_url: tailImageUrl,
          duration: clipDurationFor(segment.durationSec),
        },
        { logger, label: `video-${segment.index}`, signal },
      );
      return draftFromUrls(normalizeFalOutput(output), { kind: 'video', fallbackMimeType: 'video/mp4', signal });
    },
  };
}

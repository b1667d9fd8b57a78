import { fal } from '@fal-ai/client';
import {
  ServiceErrorCode,
  createServiceError,
  describeError,
  type ArtifactRef,
  type Logger,
} from '@keyreel/core';
import { readArtifactBytes } from '../unified/artefacts.js';

export interface FalClientManager {
  /** Configures the fal client with the key on first use. */
  ensure(): typeof fal;
  /** Uploads a stored artifact to fal storage and returns its URL. */
  upload(ref: ArtifactRef): Promise<string>;
}

export function createFalClientManager(apiKey: string | undefined, logger?: Partial<Logger>): FalClientManager {
  if (!apiKey) {
    throw createServiceError(ServiceErrorCode.MISSING_CREDENTIALS, 'FAL_KEY is required to use the fal.ai provider.', {
      suggestion: 'Set FAL_KEY or enable mocks with KEYREEL_ENABLE_MOCKS=1.',
    });
  }
  let configured = false;
  const uploads = new Map<string, string>();

  const ensure = (): typeof fal => {
    if (!configured) {
      fal.config({ credentials: apiKey });
      configured = true;
    }
    return fal;
  };

  return {
    ensure,
    async upload(ref) {
      const cached = uploads.get(ref.artifact.id);
      if (cached) {
        return cached;
      }
      const bytes = await readArtifactBytes(ref);
      let url: string;
      try {
        url = await ensure().storage.upload(new Blob([new Uint8Array(bytes)], { type: ref.artifact.mimeType }));
      } catch (error) {
        throw createServiceError(
          ServiceErrorCode.REQUEST_FAILED,
          `Upload of artifact ${ref.artifact.id} to fal.ai failed: ${describeError(error)}`,
          { cause: error },
        );
      }
      logger?.debug?.('providers.fal-ai.upload', { artifact: ref.artifact.id, url });
      uploads.set(ref.artifact.id, url);
      return url;
    },
  };
}

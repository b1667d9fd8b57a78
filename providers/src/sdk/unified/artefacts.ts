import { Buffer } from 'node:buffer';
import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import {
  ServiceErrorCode,
  createServiceError,
  describeError,
  type ArtifactDraft,
  type ArtifactRef,
  type MediaKind,
} from '@keyreel/core';

/**
 * Downloads binary data from a URL and returns it as a Buffer.
 */
export async function downloadBinary(url: string, signal?: AbortSignal): Promise<Buffer> {
  let response: Response;
  try {
    response = await fetch(url, { signal });
  } catch (error) {
    throw createServiceError(ServiceErrorCode.REQUEST_FAILED, `Failed to download ${url}: ${describeError(error)}`, {
      cause: error,
    });
  }
  if (!response.ok) {
    throw createServiceError(ServiceErrorCode.REQUEST_FAILED, `Failed to download ${url} (${response.status})`);
  }
  return Buffer.from(await response.arrayBuffer());
}

/**
 * Downloads the first output URL into an artifact draft.
 */
export async function draftFromUrls(
  urls: string[],
  options: { kind: MediaKind; fallbackMimeType: string; signal?: AbortSignal },
): Promise<ArtifactDraft> {
  const [url] = urls;
  if (!url) {
    throw createServiceError(ServiceErrorCode.MALFORMED_RESPONSE, `Provider returned no ${options.kind} URL.`);
  }
  const data = await downloadBinary(url, options.signal);
  return { data, kind: options.kind, mimeType: mimeTypeFromUrl(url) ?? options.fallbackMimeType };
}

const MIME_BY_EXTENSION: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
  '.mp4': 'video/mp4',
  '.webm': 'video/webm',
  '.mov': 'video/quicktime',
};

export function mimeTypeFromUrl(url: string): string | undefined {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return undefined;
  }
  return MIME_BY_EXTENSION[extname(pathname).toLowerCase()];
}

/**
 * Reads the payload behind an artifact reference from its local path.
 */
export async function readArtifactBytes(ref: ArtifactRef): Promise<Buffer> {
  try {
    return await readFile(ref.path);
  } catch (error) {
    throw createServiceError(
      ServiceErrorCode.REQUEST_FAILED,
      `Artifact ${ref.artifact.id} could not be read from ${ref.path}: ${describeError(error)}`,
      { cause: error },
    );
  }
}

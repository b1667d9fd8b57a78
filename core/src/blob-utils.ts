import { Buffer } from 'node:buffer';

export function toBuffer(data: Buffer | Uint8Array | string): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  return typeof data === 'string' ? Buffer.from(data) : Buffer.from(data);
}

const MIME_TYPE_MAP: Record<string, string> = {
  'mp4': 'video/mp4',
  'webm': 'video/webm',
  'mov': 'video/quicktime',
  'png': 'image/png',
  'jpg': 'image/jpeg',
  'jpeg': 'image/jpeg',
  'webp': 'image/webp',
  'avif': 'image/avif',
  'gif': 'image/gif',
  'json': 'application/json',
  'txt': 'text/plain',
};

export function inferMimeType(extension: string): string {
  const normalized = extension.toLowerCase().replace(/^\./, '');
  return MIME_TYPE_MAP[normalized] ?? 'application/octet-stream';
}

const EXTENSION_MAP: Record<string, string> = {
  'video/mp4': 'mp4',
  'video/webm': 'webm',
  'video/quicktime': 'mov',
  'video/x-matroska': 'mkv',
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/jpg': 'jpg',
  'image/webp': 'webp',
  'image/avif': 'avif',
  'image/gif': 'gif',
  'text/plain': 'txt',
  'application/json': 'json',
};

export function inferBlobExtension(mimeType?: string): string {
  if (!mimeType) {
    return 'bin';
  }
  const normalized = mimeType.toLowerCase();
  const mapped = EXTENSION_MAP[normalized];
  if (mapped) {
    return mapped;
  }
  if (normalized.startsWith('video/')) {
    return normalized.slice('video/'.length);
  }
  if (normalized.startsWith('image/')) {
    return normalized.slice('image/'.length);
  }
  return 'bin';
}

/**
 * Blobs live at `blobs/{prefix}/{hash}.{ext}` where prefix is the first two
 * characters of the hash.
 */
export function blobSegments(hash: string, extension: string): string[] {
  return ['blobs', hash.slice(0, 2), `${hash}.${extension}`];
}

export function metadataSegments(hash: string): string[] {
  return ['blobs', hash.slice(0, 2), `${hash}.json`];
}

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/**
 * Reads width and height from a PNG header. Other formats return null.
 */
export function readImageDimensions(data: Buffer): { width: number; height: number } | null {
  if (data.length < 24 || !data.subarray(0, 8).equals(PNG_SIGNATURE)) {
    return null;
  }
  if (data.toString('ascii', 12, 16) !== 'IHDR') {
    return null;
  }
  return {
    width: data.readUInt32BE(16),
    height: data.readUInt32BE(20),
  };
}

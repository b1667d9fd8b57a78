import { createHash } from 'node:crypto';

export interface HashedValue {
  hash: string;
  canonical: string;
}

/**
 * SHA-256 of raw bytes, hex encoded. This is an artifact's identity.
 */
export function hashBytes(data: Uint8Array | string): string {
  return createHash('sha256').update(data).digest('hex');
}

export function hashPayload(payload: unknown): HashedValue {
  const canonical = canonicalStringify(payload);
  return {
    canonical,
    hash: hashBytes(canonical),
  };
}

/**
 * Order-sensitive digest over a list of artifact ids, used to fingerprint the
 * reference image set of a run.
 */
export function hashArtifactIds(ids: readonly string[]): string {
  return hashBytes(ids.join(''));
}

export function canonicalStringify(value: unknown): string {
  return JSON.stringify(normalizeForSerialization(value));
}

export function normalizeForSerialization(value: unknown): unknown {
  if (value === null || value === undefined) {
    return null;
  }
  if (Array.isArray(value)) {
    return value.map((item) => normalizeForSerialization(item));
  }
  if (value instanceof Uint8Array) {
    return hashBytes(value);
  }
  if (typeof value === 'object') {
    const entries = Object.entries(value);
    entries.sort(([aKey], [bKey]) => aKey.localeCompare(bKey));
    const output: Record<string, unknown> = {};
    for (const [key, val] of entries) {
      output[key] = normalizeForSerialization(val);
    }
    return output;
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return value.toString();
  }
  return value;
}

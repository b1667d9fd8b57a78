import { isArtifactDraft, isRecord } from '../types.js';

const MAX_TEXT = 160;

/**
 * Compact, log-friendly copy of a step's inputs or outputs. Empty values are
 * dropped, payload bytes are summarised and long text is truncated.
 */
export function compactSnapshot(value: unknown): unknown {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    if (value.length === 0) {
      return undefined;
    }
    return value.length > MAX_TEXT ? `${value.slice(0, MAX_TEXT)}…` : value;
  }
  if (value instanceof Uint8Array) {
    return `<${value.byteLength} bytes>`;
  }
  if (isArtifactDraft(value)) {
    return { draft: value.kind, mimeType: value.mimeType, size: value.data.length };
  }
  if (Array.isArray(value)) {
    const items = value.map(compactSnapshot).filter((item) => item !== undefined);
    return items.length > 0 ? items : undefined;
  }
  if (isRecord(value)) {
    const entries = Object.entries(value)
      .map(([key, entry]) => [key, compactSnapshot(entry)] as const)
      .filter(([, entry]) => entry !== undefined);
    return entries.length > 0 ? Object.fromEntries(entries) : undefined;
  }
  return value;
}

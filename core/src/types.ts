import type { Buffer } from 'node:buffer';

export type IsoDatetime = string;

export interface Clock {
  now(): IsoDatetime;
}

export type MediaKind = 'image' | 'video';

/**
 * Immutable stored payload, identified by the SHA-256 of its bytes.
 */
export interface Artifact {
  id: string;
  kind: MediaKind;
  size: number;
  mimeType: string;
  extension: string;
  width?: number;
  height?: number;
  /** Storage location of the payload, stable for the run. */
  location: string;
  createdAt: IsoDatetime;
}

/**
 * Payload not yet written to the artifact store. Steps may return drafts
 * inside their updates; the engine stores them during commit.
 */
export interface ArtifactDraft {
  data: Buffer | Uint8Array | string;
  mimeType: string;
  kind: MediaKind;
  width?: number;
  height?: number;
}

export interface PositionHint {
  x: number;
  y: number;
}

/** Terminal pose a segment must end on. */
export interface EndAnchor {
  pose: string;
  facing: string;
  expression: string;
  propState?: string;
  positionHint?: PositionHint;
}

export interface Segment {
  /** 1-based, contiguous. */
  index: number;
  durationSec: number;
  style: string;
  shot: string;
  camera: string;
  story: string;
  propsBackground: string[];
  endAnchor: EndAnchor;
  consistencyFlags: string[];
}

export type BoundaryPosition = 'start' | 'end';

export interface GateVerdict {
  accepted: true;
  notes: string[];
}

// -----------------------------------------------------------------------------
// Guards
// -----------------------------------------------------------------------------

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(isString);
}

export function isUnknownArray(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

export function isMediaKind(value: unknown): value is MediaKind {
  return value === 'image' || value === 'video';
}

export function isArtifact(value: unknown): value is Artifact {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    isMediaKind(value.kind) &&
    typeof value.size === 'number' &&
    typeof value.mimeType === 'string' &&
    typeof value.extension === 'string' &&
    typeof value.location === 'string'
  );
}

export function isArtifactList(value: unknown): value is Artifact[] {
  return Array.isArray(value) && value.every(isArtifact);
}

export function isArtifactDraft(value: unknown): value is ArtifactDraft {
  if (!isRecord(value) || !isMediaKind(value.kind) || typeof value.mimeType !== 'string') {
    return false;
  }
  const data = value.data;
  return typeof data === 'string' || data instanceof Uint8Array;
}

export function isEndAnchor(value: unknown): value is EndAnchor {
  return (
    isRecord(value) &&
    typeof value.pose === 'string' &&
    typeof value.facing === 'string' &&
    typeof value.expression === 'string'
  );
}

export function isSegment(value: unknown): value is Segment {
  return (
    isRecord(value) &&
    typeof value.index === 'number' &&
    typeof value.durationSec === 'number' &&
    isStringArray(value.propsBackground) &&
    isStringArray(value.consistencyFlags) &&
    isEndAnchor(value.endAnchor)
  );
}

export function isSegmentList(value: unknown): value is Segment[] {
  return Array.isArray(value) && value.every(isSegment);
}

export function isGateVerdict(value: unknown): value is GateVerdict {
  return isRecord(value) && value.accepted === true && isStringArray(value.notes);
}

import { createLedgerViolation, LedgerErrorCode } from '../errors/index.js';
import type { BoundaryPosition } from '../types.js';

export interface BoundaryBinding {
  segment: number;
  position: BoundaryPosition;
  artifactId: string;
}

/** A binding as recorded: the artifact plus the step that bound it. */
export interface BoundaryRecord {
  artifactId: string;
  stepId: string;
}

export interface SegmentBoundaries {
  segment: number;
  start?: BoundaryRecord;
  end?: BoundaryRecord;
}

/** An enforced equality between segment `left`'s end and segment `right`'s start. */
export interface Adjacency {
  left: number;
  right: number;
  artifactId: string;
}

export interface FlagCheck {
  /** Locked flags the candidate does not carry. */
  missing: string[];
  /** Candidate flags not locked yet. */
  added: string[];
}

export interface LedgerSnapshot {
  boundaries: SegmentBoundaries[];
  lockedFlags: string[];
}

/** Read-only face handed to steps. */
export interface LedgerReader {
  boundary(segment: number, position: BoundaryPosition): BoundaryRecord | undefined;
  adjacencies(): Adjacency[];
  lockedFlags(): string[];
  checkFlags(candidate: readonly string[]): FlagCheck;
  snapshot(): LedgerSnapshot;
}

export interface ConsistencyLedger extends LedgerReader {
  bindBoundary(segment: number, position: BoundaryPosition, artifactId: string, stepId: string): void;
  /** Throws the violation `bind` would raise for this batch, without applying anything. */
  checkBindings(bindings: readonly BoundaryBinding[], stepId: string): void;
  /** Drops every binding owned by the step. Used when the engine supersedes its outputs. */
  release(stepId: string): number;
  lockFlags(flags: readonly string[]): void;
}

type BoundaryTable = Map<number, { start?: BoundaryRecord; end?: BoundaryRecord }>;

/**
 * Per-run record of which artifact satisfies each segment boundary.
 *
 * Mutators are synchronous, so concurrently running steps can never observe
 * a half-applied binding.
 */
export function createConsistencyLedger(): ConsistencyLedger {
  const table: BoundaryTable = new Map();
  const flags: string[] = [];

  return {
    bindBoundary(segment, position, artifactId, stepId) {
      applyBinding(table, { segment, position, artifactId }, stepId);
    },

    checkBindings(bindings, stepId) {
      const scratch = cloneTable(table);
      for (const binding of bindings) {
        applyBinding(scratch, binding, stepId);
      }
    },

    release(stepId) {
      let released = 0;
      for (const [segment, entry] of table) {
        if (entry.start?.stepId === stepId) {
          delete entry.start;
          released += 1;
        }
        if (entry.end?.stepId === stepId) {
          delete entry.end;
          released += 1;
        }
        if (!entry.start && !entry.end) {
          table.delete(segment);
        }
      }
      return released;
    },

    lockFlags(candidate) {
      for (const flag of candidate) {
        const normalized = flag.trim();
        if (normalized && !flags.includes(normalized)) {
          flags.push(normalized);
        }
      }
    },

    checkFlags(candidate) {
      const normalized = new Set(candidate.map((flag) => flag.trim()).filter(Boolean));
      return {
        missing: flags.filter((flag) => !normalized.has(flag)),
        added: [...normalized].filter((flag) => !flags.includes(flag)),
      };
    },

    lockedFlags() {
      return [...flags];
    },

    boundary(segment, position) {
      const record = table.get(segment)?.[position];
      return record ? { ...record } : undefined;
    },

    adjacencies() {
      const result: Adjacency[] = [];
      for (const segment of sortedSegments(table)) {
        const end = table.get(segment)?.end;
        const nextStart = table.get(segment + 1)?.start;
        if (end && nextStart && end.artifactId === nextStart.artifactId) {
          result.push({ left: segment, right: segment + 1, artifactId: end.artifactId });
        }
      }
      return result;
    },

    snapshot() {
      return {
        boundaries: sortedSegments(table).map((segment) => {
          const entry = table.get(segment) ?? {};
          return {
            segment,
            ...(entry.start ? { start: { ...entry.start } } : {}),
            ...(entry.end ? { end: { ...entry.end } } : {}),
          };
        }),
        lockedFlags: [...flags],
      };
    },
  };
}

function applyBinding(table: BoundaryTable, binding: BoundaryBinding, stepId: string): void {
  const { segment, position, artifactId } = binding;
  if (!Number.isInteger(segment) || segment < 1) {
    throw createLedgerViolation(
      LedgerErrorCode.INVALID_SEGMENT_INDEX,
      `Segment index ${segment} is not a positive integer.`,
      { context: `step ${stepId}` },
    );
  }

  const entry = table.get(segment) ?? {};
  const existing = entry[position];
  if (existing && (existing.artifactId !== artifactId || existing.stepId !== stepId)) {
    throw createLedgerViolation(
      LedgerErrorCode.BOUNDARY_ALREADY_BOUND,
      `Segment ${segment} ${position} is already bound to ${existing.artifactId} by ${existing.stepId}.`,
      { context: `step ${stepId}` },
    );
  }

  const neighbor =
    position === 'end' ? table.get(segment + 1)?.start : segment > 1 ? table.get(segment - 1)?.end : undefined;
  if (neighbor && neighbor.artifactId !== artifactId) {
    const [left, right] = position === 'end' ? [segment, segment + 1] : [segment - 1, segment];
    throw createLedgerViolation(
      LedgerErrorCode.ADJACENT_BOUNDARY_MISMATCH,
      `Segment ${left} ends on ${position === 'end' ? artifactId : neighbor.artifactId} but segment ${right} starts on ${position === 'end' ? neighbor.artifactId : artifactId}.`,
      {
        context: `step ${stepId}`,
        suggestion: 'Adjacent segments must share the keyframe at their common boundary.',
      },
    );
  }

  entry[position] = { artifactId, stepId };
  table.set(segment, entry);
}

function cloneTable(table: BoundaryTable): BoundaryTable {
  const copy: BoundaryTable = new Map();
  for (const [segment, entry] of table) {
    copy.set(segment, { ...entry });
  }
  return copy;
}

function sortedSegments(table: BoundaryTable): number[] {
  return [...table.keys()].sort((a, b) => a - b);
}

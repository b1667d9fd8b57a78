import { ConfigurationErrorCode, createConfigurationError, createRuntimeError, RuntimeErrorCode } from '../errors/index.js';
import type { AnyContextKey, ContextKey, ContextView, RunSeed } from '../steps/types.js';

export interface ContextEntry {
  value: unknown;
  stepId: string;
  /** Rework round of the owning step when the value was committed. */
  round: number;
}

/** A value moved out of the live context by a rework round. */
export interface ContextRevision extends ContextEntry {
  key: string;
  supersededAt: number;
}

export interface CommitEntry {
  key: AnyContextKey;
  value: unknown;
}

/**
 * Write-once state bag for one run. Only the engine's commit path mutates it.
 */
export interface RunContext {
  readonly runId: string;
  readonly seed: RunSeed;
  has(name: string): boolean;
  entry(name: string): ContextEntry | undefined;
  /** Snapshot of the declared reads, taken now. */
  view(reads: readonly AnyContextKey[], stepId: string): ContextView;
  /** Throws what `commit` would throw for these entries, without applying them. */
  validate(stepId: string, entries: readonly CommitEntry[]): void;
  /** Applies every entry or none. A key may only be written while it is not live. */
  commit(stepId: string, entries: readonly CommitEntry[], round: number): void;
  /** Moves the step's live values to the history. Returns the keys it moved. */
  supersede(stepId: string): string[];
  history(): ContextRevision[];
  /** Live values by key name, in commit order. */
  snapshot(): Record<string, unknown>;
}

export function createRunContext(runId: string, seed: RunSeed): RunContext {
  const live = new Map<string, ContextEntry>();
  const revisions: ContextRevision[] = [];

  const validate = (stepId: string, entries: readonly CommitEntry[]): void => {
    for (const { key, value } of entries) {
      const existing = live.get(key.name);
      if (existing) {
        throw createConfigurationError(
          ConfigurationErrorCode.KEY_ALREADY_WRITTEN,
          `Context key "${key.name}" was already written by ${existing.stepId}.`,
          { context: `step ${stepId}` },
        );
      }
      if (!key.guard(value)) {
        throw createConfigurationError(
          ConfigurationErrorCode.CONTEXT_TYPE_MISMATCH,
          `Value written to "${key.name}" does not match the key's type.`,
          { context: `step ${stepId}` },
        );
      }
    }
  };

  return {
    runId,
    seed,

    has(name) {
      return live.has(name);
    },

    entry(name) {
      return live.get(name);
    },

    view(reads, stepId) {
      const declared = new Set(reads.map((key) => key.name));
      const captured = new Map<string, unknown>();
      for (const name of declared) {
        const entry = live.get(name);
        if (entry) {
          captured.set(name, entry.value);
        }
      }
      return createContextView(stepId, declared, captured);
    },

    validate,

    commit(stepId, entries, round) {
      validate(stepId, entries);
      for (const { key, value } of entries) {
        live.set(key.name, { value, stepId, round });
      }
    },

    supersede(stepId) {
      const moved: string[] = [];
      for (const [name, entry] of live) {
        if (entry.stepId === stepId) {
          revisions.push({ key: name, ...entry, supersededAt: revisions.length });
          moved.push(name);
        }
      }
      for (const name of moved) {
        live.delete(name);
      }
      return moved;
    },

    history() {
      return [...revisions];
    },

    snapshot() {
      const result: Record<string, unknown> = {};
      for (const [name, entry] of live) {
        result[name] = entry.value;
      }
      return result;
    },
  };
}

function createContextView(
  stepId: string,
  declared: ReadonlySet<string>,
  captured: ReadonlyMap<string, unknown>,
): ContextView {
  const read = <T>(key: ContextKey<T>): T => {
    if (!declared.has(key.name)) {
      throw createConfigurationError(
        ConfigurationErrorCode.UNDECLARED_READ,
        `Step ${stepId} read "${key.name}" without declaring it.`,
        { suggestion: `Add the key to the reads of ${stepId}.` },
      );
    }
    if (!captured.has(key.name)) {
      throw createRuntimeError(
        RuntimeErrorCode.DEPENDENCY_UNAVAILABLE,
        `Context key "${key.name}" has not been committed.`,
        { context: `step ${stepId}` },
      );
    }
    const value = captured.get(key.name);
    if (!key.guard(value)) {
      throw createConfigurationError(
        ConfigurationErrorCode.CONTEXT_TYPE_MISMATCH,
        `Context key "${key.name}" holds a value of the wrong type.`,
        { context: `step ${stepId}` },
      );
    }
    return value;
  };

  return {
    get: read,
    has(key) {
      return declared.has(key.name) && captured.has(key.name);
    },
  };
}

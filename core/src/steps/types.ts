import type { ArtifactStore } from '../artifact-store.js';
import type { BoundaryBinding, LedgerReader } from '../ledger/index.js';
import type { Logger } from '../logger.js';
import type { Artifact, ArtifactDraft } from '../types.js';

/**
 * Typed name of a Run Context entry. The guard is checked on every read and
 * on every commit, so a view only ever hands out values of type `T`.
 */
export interface ContextKey<T> {
  readonly name: string;
  readonly guard: (value: unknown) => value is T;
}

export type AnyContextKey = ContextKey<unknown>;

export function defineKey<T>(name: string, guard: (value: unknown) => value is T): ContextKey<T> {
  return { name, guard };
}

export type StepKind =
  | 'ingest'
  | 'describe'
  | 'style-bible'
  | 'style-reference'
  | 'draft-storyboard'
  | 'validate-storyboard'
  | 'plan-segments'
  | 'keyframe'
  | 'check-keyframe'
  | 'video'
  | 'check-video'
  | 'assemble'
  | 'report';

/** Values fixed when the run is created. Every step can read them. */
export interface RunSeed {
  prompt: string;
  /** Source paths of the user's reference images. */
  referenceImages: string[];
  targetDurationSec: number;
  fps: number;
  targetSegmentCount: number;
  maxSegmentDurationSec: number;
}

/** Read-only projection of the Run Context limited to a step's declared reads. */
export interface ContextView {
  get<T>(key: ContextKey<T>): T;
  has(key: AnyContextKey): boolean;
}

/** A value a step may hand back for a key: artifact keys also accept a draft. */
export type UpdateValue<T> = T extends Artifact ? Artifact | ArtifactDraft : T;

export interface ContextUpdate {
  key: AnyContextKey;
  value: unknown;
}

export function update<T>(key: ContextKey<T>, value: UpdateValue<T>): ContextUpdate {
  return { key, value };
}

export interface LedgerEffects {
  bind?: BoundaryBinding[];
  lockFlags?: string[];
}

export type StepOutcome =
  | { status: 'success'; updates: ContextUpdate[]; ledger?: LedgerEffects }
  | { status: 'retryable'; reason: string; cause?: unknown }
  | { status: 'fatal'; reason: string; cause?: unknown }
  | { status: 'reject'; feedback: string };

export function succeed(updates: ContextUpdate[], ledger?: LedgerEffects): StepOutcome {
  return ledger ? { status: 'success', updates, ledger } : { status: 'success', updates };
}

export function retryable(reason: string, cause?: unknown): StepOutcome {
  return { status: 'retryable', reason, cause };
}

export function fatal(reason: string | Error): StepOutcome {
  return typeof reason === 'string'
    ? { status: 'fatal', reason }
    : { status: 'fatal', reason: reason.message, cause: reason };
}

export function reject(feedback: string): StepOutcome {
  return { status: 'reject', feedback };
}

/** Fire-and-forget channel to the run log collaborator. */
export interface StepLog {
  prompt(text: string): void;
  response(value: unknown): void;
}

export interface StepEnvironment {
  runId: string;
  run: RunSeed;
  artifacts: ArtifactStore;
  ledger: LedgerReader;
  /** Rework feedback accumulated for this step, oldest first. */
  feedback: readonly string[];
  /** 1-based, restarts every rework round. */
  attempt: number;
  reworkRound: number;
  /** Aborted when the invocation times out or the run is cancelled. */
  signal: AbortSignal;
  logger: Partial<Logger>;
  log: StepLog;
}

export interface StepDefinition {
  id: string;
  kind: StepKind;
  reads: readonly AnyContextKey[];
  writes: readonly AnyContextKey[];
  /** Whether the engine may invoke the step again after a retryable failure. */
  retryable: boolean;
  /** A failed optional step skips its dependents instead of failing the run. */
  optional?: boolean;
  /** Never dispatched alongside another step. */
  exclusive?: boolean;
  /** Present on quality gates: the step whose output a rejection sends back. */
  gate?: { producer: string };
  invoke(view: ContextView, env: StepEnvironment): Promise<StepOutcome>;
}

import type { ArtifactStore } from '../artifact-store.js';
import type { SerializedError } from '../errors/index.js';
import type { StepGraph } from '../graph/index.js';
import type { ConsistencyLedger } from '../ledger/index.js';
import type { Logger } from '../logger.js';
import type { RunLogSink } from '../run-log.js';
import type { RunSeed, StepKind } from '../steps/types.js';
import type { Clock, IsoDatetime } from '../types.js';
import type { ExecutionBackend } from './backends.js';
import type { RunContext } from './run-context.js';

export type StepState =
  | 'pending'
  | 'running'
  | 'succeeded'
  | 'retrying'
  | 'rejected-for-rework'
  | 'failed'
  | 'skipped'
  | 'cancelled';

export type RunStatus = 'succeeded' | 'failed' | 'cancelled';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 500,
  backoffFactor: 2,
  maxDelayMs: 8_000,
};

export const DEFAULT_MAX_REWORK_ROUNDS = 2;

export interface StepRecord {
  id: string;
  kind: StepKind;
  state: StepState;
  /** Every invocation across all attempts and rework rounds. */
  invocations: number;
  /** Attempts made in the current rework round. */
  attempts: number;
  reworkRounds: number;
  feedback: string[];
  durationMs: number;
  error?: SerializedError;
}

/** Why a run did not succeed, naming the step that brought it down. */
export interface RunFailure {
  stepId: string;
  code: string;
  message: string;
  feedback?: string;
}

/**
 * Types of progress events emitted during a run.
 */
export type ProgressEventType =
  | 'run-start'
  | 'step-start'
  | 'step-retry'
  | 'step-rework'
  | 'step-complete'
  | 'run-complete';

export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: IsoDatetime;
  runId: string;
  stepId?: string;
  state?: StepState;
  attempt?: number;
  reworkRound?: number;
  delayMs?: number;
  status?: RunStatus;
  error?: { message: string; code?: string };
  progress?: { completed: number; total: number };
  message?: string;
}

export type ProgressHandler = (event: ProgressEvent) => void;

export interface ExecutionEngineOptions {
  backend: ExecutionBackend;
  retry?: Partial<RetryPolicy>;
  maxReworkRounds?: number;
  /**
   * Wall-clock limit for one invocation. A timeout aborts `env.signal` and
   * counts as a retryable failure; the next attempt starts only once the
   * timed-out invocation has settled.
   */
  stepTimeoutMs?: number;
  /** Wall-clock limit for the whole run. Expiry cancels it. */
  runTimeoutMs?: number;
  logger?: Partial<Logger>;
  clock?: Clock;
  onProgress?: ProgressHandler;
  runLog?: RunLogSink;
  /** Waits between attempts. Resolves early when the signal aborts. */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export interface RunRequest {
  runId: string;
  seed: RunSeed;
  graph: StepGraph;
  artifacts: ArtifactStore;
  ledger?: ConsistencyLedger;
  signal?: AbortSignal;
}

export interface RunResult {
  runId: string;
  status: RunStatus;
  context: RunContext;
  ledger: ConsistencyLedger;
  steps: StepRecord[];
  failure?: RunFailure;
  startedAt: IsoDatetime;
  completedAt: IsoDatetime;
  timingsMs: Record<string, number>;
}

import pLimit from 'p-limit';
import {
  ConfigurationErrorCode,
  createConfigurationError,
  createRuntimeError,
  describeError,
  isPipelineError,
  RuntimeErrorCode,
  serializeError,
  ValidationErrorCode,
} from '../errors/index.js';
import { createConsistencyLedger, type ConsistencyLedger, type LedgerReader } from '../ledger/index.js';
import type { RunLogEntry } from '../run-log.js';
import type {
  ContextView,
  StepDefinition,
  StepEnvironment,
  StepLog,
  StepOutcome,
} from '../steps/types.js';
import { isArtifactDraft, type Clock } from '../types.js';
import type { ExecutionBackend } from './backends.js';
import { createRunContext, type CommitEntry } from './run-context.js';
import { compactSnapshot } from './snapshots.js';
import {
  DEFAULT_MAX_REWORK_ROUNDS,
  DEFAULT_RETRY_POLICY,
  type ExecutionEngineOptions,
  type ProgressEvent,
  type RetryPolicy,
  type RunFailure,
  type RunRequest,
  type RunResult,
  type StepRecord,
  type StepState,
} from './types.js';

export interface ExecutionEngine {
  readonly backend: ExecutionBackend;
  run(request: RunRequest): Promise<RunResult>;
}

const systemClock: Clock = { now: () => new Date().toISOString() };

/**
 * Walks a step graph in dependency order.
 *
 * Each step runs a small state machine: retryable failures are re-attempted
 * with exponential backoff, a quality gate's rejection sends its producer
 * back to pending with the gate's feedback, and any other failure of a
 * required step fails the run. Successful outcomes are committed one at a
 * time: artifact drafts are stored, ledger bindings are checked and applied,
 * then the updates land in the run context.
 *
 * The backend decides how many steps may be in flight; the scheduling loop
 * and the commit path are the same for both.
 */
export function createExecutionEngine(options: ExecutionEngineOptions): ExecutionEngine {
  const retry = resolveRetryPolicy(options.retry);
  const maxReworkRounds = options.maxReworkRounds ?? DEFAULT_MAX_REWORK_ROUNDS;
  if (!Number.isInteger(maxReworkRounds) || maxReworkRounds < 0) {
    throw createConfigurationError(
      ConfigurationErrorCode.INVALID_SETTING,
      `maxReworkRounds must be a non-negative integer, got ${maxReworkRounds}.`,
    );
  }
  assertPositive('stepTimeoutMs', options.stepTimeoutMs);
  assertPositive('runTimeoutMs', options.runTimeoutMs);

  const backend = options.backend;
  const logger = options.logger ?? {};
  const clock = options.clock ?? systemClock;
  const sleep = options.sleep ?? delay;

  async function run(request: RunRequest): Promise<RunResult> {
    const { runId, graph, artifacts } = request;
    const ledger = request.ledger ?? createConsistencyLedger();
    const ledgerReader = readOnlyLedger(ledger);
    const context = createRunContext(runId, request.seed);
    const commitLock = pLimit(1);
    const cancellation = linkCancellation(request.signal, options.runTimeoutMs);
    const total = graph.order.length;

    const records = new Map<string, StepRecord>();
    for (const id of graph.order) {
      records.set(id, createRecord(graph.step(id)));
    }
    const gateRounds = new Map<string, number>();
    const stepRounds = new Map<string, number>();
    const inflight = new Map<string, Promise<void>>();
    let exclusiveInFlight = false;
    const runState: { failure?: RunFailure } = {};

    const startedAt = clock.now();
    const startedMs = Date.now();

    const recordOf = (id: string): StepRecord => {
      const record = records.get(id);
      if (!record) {
        throw createRuntimeError(RuntimeErrorCode.STEP_FAILED, `Unknown step "${id}".`);
      }
      return record;
    };
    const stateOf = (id: string): StepState => recordOf(id).state;
    const halted = (): boolean => runState.failure !== undefined || cancellation.signal.aborted;

    const emit = (event: Omit<ProgressEvent, 'timestamp' | 'runId'>): void => {
      options.onProgress?.({ ...event, timestamp: clock.now(), runId });
    };
    const completed = (): number =>
      [...records.values()].filter(
        (record) => record.state === 'succeeded' || record.state === 'skipped' || record.state === 'failed',
      ).length;

    function settle(step: StepDefinition, state: StepState): void {
      recordOf(step.id).state = state;
      emit({
        type: 'step-complete',
        stepId: step.id,
        state,
        progress: { completed: completed(), total },
      });
    }

    function fail(
      step: StepDefinition,
      code: string,
      message: string,
      details: { error?: unknown; feedback?: string } = {},
    ): void {
      const record = recordOf(step.id);
      record.error = serializeError(details.error ?? createRuntimeError(code, message));
      settle(step, 'failed');
      if (step.optional) {
        logger.warn?.(`Optional step ${step.id} failed, its dependents will be skipped: ${message}`);
        return;
      }
      logger.error?.(`Step ${step.id} failed: ${message}`, { code });
      if (!runState.failure) {
        runState.failure = { stepId: step.id, code, message, ...(details.feedback ? { feedback: details.feedback } : {}) };
      }
    }

    /**
     * Settles a step that ended while the run was being cancelled. Its
     * failure is the cancellation's doing, so nothing is recorded against it.
     */
    function settleIfCancelled(step: StepDefinition, reason: string): boolean {
      if (!cancellation.signal.aborted) {
        return false;
      }
      logger.warn?.(`Step ${step.id} stopped by cancellation: ${reason}`);
      settle(step, 'cancelled');
      return true;
    }

    function createStepLog(stepId: string): StepLog {
      const send = (entry: RunLogEntry): void => {
        const sink = options.runLog;
        if (!sink) {
          return;
        }
        void sink.record(runId, stepId, entry).catch((error: unknown) => {
          logger.warn?.(`Run log for ${stepId} was not written: ${describeError(error)}`);
        });
      };
      return {
        prompt: (text) => send({ kind: 'prompt', text }),
        response: (value) => send({ kind: 'response', value }),
      };
    }

    async function invoke(
      step: StepDefinition,
      view: ContextView,
      attempt: number,
      round: number,
    ): Promise<StepOutcome> {
      const controller = new AbortController();
      const forward = (): void => controller.abort(cancellation.signal.reason);
      if (cancellation.signal.aborted) {
        forward();
      } else {
        cancellation.signal.addEventListener('abort', forward, { once: true });
      }
      let timer: ReturnType<typeof setTimeout> | undefined;
      let invocation: Promise<StepOutcome> | undefined;

      const env: StepEnvironment = {
        runId,
        run: request.seed,
        artifacts,
        ledger: ledgerReader,
        feedback: [...recordOf(step.id).feedback],
        attempt,
        reworkRound: round,
        signal: controller.signal,
        logger,
        log: createStepLog(step.id),
      };

      try {
        invocation = step.invoke(view, env);
        const timeoutMs = options.stepTimeoutMs;
        if (timeoutMs === undefined) {
          return await invocation;
        }
        const timeout = new Promise<never>((_, reject) => {
          timer = setTimeout(() => {
            const error = createRuntimeError(
              RuntimeErrorCode.STEP_TIMEOUT,
              `Step ${step.id} did not finish within ${timeoutMs}ms.`,
            );
            controller.abort(error);
            reject(error);
          }, timeoutMs);
        });
        return await Promise.race([invocation, timeout]);
      } catch (error) {
        if (invocation) {
          // A timed-out invocation keeps its slot until it settles.
          await Promise.allSettled([invocation]);
        }
        return classifyThrown(step, error);
      } finally {
        clearTimeout(timer);
        cancellation.signal.removeEventListener('abort', forward);
      }
    }

    async function commit(step: StepDefinition, outcome: Extract<StepOutcome, { status: 'success' }>, round: number) {
      const declared = new Set(step.writes.map((key) => key.name));
      const seen = new Set<string>();
      for (const { key } of outcome.updates) {
        if (!declared.has(key.name) || seen.has(key.name)) {
          throw createConfigurationError(
            ConfigurationErrorCode.UNDECLARED_WRITE,
            seen.has(key.name)
              ? `Step ${step.id} wrote "${key.name}" more than once.`
              : `Step ${step.id} wrote "${key.name}" without declaring it.`,
          );
        }
        seen.add(key.name);
      }
      const missing = [...declared].filter((name) => !seen.has(name));
      if (missing.length > 0) {
        throw createConfigurationError(
          ConfigurationErrorCode.INCOMPLETE_WRITE,
          `Step ${step.id} succeeded without writing ${missing.map((name) => `"${name}"`).join(', ')}.`,
        );
      }

      const entries: CommitEntry[] = [];
      for (const { key, value } of outcome.updates) {
        entries.push({ key, value: isArtifactDraft(value) ? await artifacts.put(value) : value });
      }

      const bindings = outcome.ledger?.bind ?? [];
      context.validate(step.id, entries);
      ledger.checkBindings(bindings, step.id);

      for (const binding of bindings) {
        ledger.bindBoundary(binding.segment, binding.position, binding.artifactId, step.id);
      }
      if (outcome.ledger?.lockFlags) {
        ledger.lockFlags(outcome.ledger.lockFlags);
      }
      context.commit(step.id, entries, round);

      logger.debug?.('engine.step.output', {
        stepId: step.id,
        output: compactSnapshot(Object.fromEntries(entries.map((entry) => [entry.key.name, entry.value]))),
        ledger: compactSnapshot(outcome.ledger),
      });
    }

    async function rework(gate: StepDefinition, feedback: string): Promise<void> {
      const producerId = gate.gate?.producer;
      if (producerId === undefined) {
        fail(gate, RuntimeErrorCode.STEP_FAILED, `Step ${gate.id} rejected its input but is not a quality gate.`);
        return;
      }
      const rounds = gateRounds.get(gate.id) ?? 0;
      if (rounds >= maxReworkRounds) {
        fail(
          gate,
          ValidationErrorCode.REWORK_EXHAUSTED,
          `Gate ${gate.id} rejected ${producerId} after ${rounds} rework round(s): ${feedback}`,
          { feedback },
        );
        return;
      }
      if (halted()) {
        settle(gate, 'cancelled');
        return;
      }

      const scope = graph.reworkScope(gate.id);
      await commitLock(() => {
        for (const id of scope) {
          context.supersede(id);
          ledger.release(id);
        }
      });

      gateRounds.set(gate.id, rounds + 1);
      const producer = recordOf(producerId);
      producer.feedback.push(feedback);
      producer.reworkRounds += 1;
      producer.state = 'rejected-for-rework';
      emit({
        type: 'step-rework',
        stepId: producerId,
        state: 'rejected-for-rework',
        reworkRound: rounds + 1,
        message: feedback,
      });
      logger.warn?.(
        `Gate ${gate.id} rejected ${producerId} (round ${rounds + 1} of ${maxReworkRounds}): ${feedback}`,
      );

      for (const id of scope) {
        stepRounds.set(id, (stepRounds.get(id) ?? 0) + 1);
        recordOf(id).state = 'pending';
      }
    }

    async function executeStep(step: StepDefinition): Promise<void> {
      const record = recordOf(step.id);
      const round = stepRounds.get(step.id) ?? 0;
      const maxAttempts = step.retryable ? retry.maxAttempts : 1;

      for (let attempt = 1; ; attempt += 1) {
        if (attempt > 1 && halted()) {
          settle(step, 'cancelled');
          return;
        }
        record.state = 'running';
        record.attempts = attempt;
        record.invocations += 1;
        emit({ type: 'step-start', stepId: step.id, state: 'running', attempt, reworkRound: round });
        logger.debug?.('engine.step.input', {
          stepId: step.id,
          attempt,
          reworkRound: round,
          input: compactSnapshot(
            Object.fromEntries(step.reads.map((key) => [key.name, context.entry(key.name)?.value])),
          ),
        });

        const view = context.view(step.reads, step.id);
        const began = Date.now();
        const outcome = await invoke(step, view, attempt, round);
        record.durationMs += Date.now() - began;

        switch (outcome.status) {
          case 'success': {
            try {
              await commitLock(() => commit(step, outcome, round));
            } catch (error) {
              fail(step, errorCode(error), describeError(error), { error });
              return;
            }
            settle(step, 'succeeded');
            logger.info?.(`Step ${step.id} succeeded`, {
              attempt,
              ...(round > 0 ? { reworkRound: round } : {}),
            });
            return;
          }
          case 'reject': {
            await rework(step, outcome.feedback);
            return;
          }
          case 'retryable': {
            if (attempt < maxAttempts) {
              const delayMs = backoffDelay(retry, attempt);
              record.state = 'retrying';
              emit({
                type: 'step-retry',
                stepId: step.id,
                state: 'retrying',
                attempt,
                delayMs,
                message: outcome.reason,
              });
              logger.warn?.(
                `Step ${step.id} attempt ${attempt}/${maxAttempts} failed, retrying in ${delayMs}ms: ${outcome.reason}`,
              );
              await sleep(delayMs, cancellation.signal);
              continue;
            }
            if (settleIfCancelled(step, outcome.reason)) {
              return;
            }
            if (step.retryable) {
              fail(
                step,
                RuntimeErrorCode.RETRIES_EXHAUSTED,
                `Step ${step.id} failed after ${attempt} attempt(s): ${outcome.reason}`,
                { error: outcome.cause },
              );
            } else {
              fail(step, errorCode(outcome.cause), outcome.reason, { error: outcome.cause });
            }
            return;
          }
          case 'fatal': {
            if (settleIfCancelled(step, outcome.reason)) {
              return;
            }
            fail(step, errorCode(outcome.cause), outcome.reason, { error: outcome.cause });
            return;
          }
        }
      }
    }

    function skipOrphans(): void {
      for (const id of graph.order) {
        if (stateOf(id) !== 'pending') {
          continue;
        }
        const blocked = graph.dependencies(id).some((dep) => {
          const state = stateOf(dep);
          return state === 'skipped' || (state === 'failed' && graph.step(dep).optional === true);
        });
        if (blocked) {
          logger.info?.(`Step ${id} skipped: an optional dependency did not succeed`);
          settle(graph.step(id), 'skipped');
        }
      }
    }

    function dispatchReady(): void {
      for (const id of graph.order) {
        if (inflight.size >= backend.capacity || exclusiveInFlight) {
          return;
        }
        if (stateOf(id) !== 'pending' || inflight.has(id)) {
          continue;
        }
        if (!graph.dependencies(id).every((dep) => stateOf(dep) === 'succeeded')) {
          continue;
        }
        const step = graph.step(id);
        if (step.exclusive) {
          if (inflight.size > 0) {
            return;
          }
          exclusiveInFlight = true;
        }
        const task = backend
          .run(() => executeStep(step))
          .catch((error: unknown) => {
            if (!settleIfCancelled(step, describeError(error))) {
              fail(step, errorCode(error), describeError(error), { error });
            }
          })
          .finally(() => {
            inflight.delete(id);
            if (step.exclusive) {
              exclusiveInFlight = false;
            }
          });
        inflight.set(id, task);
      }
    }

    emit({ type: 'run-start', progress: { completed: 0, total } });
    logger.info?.(`Run ${runId} started`, { steps: total, backend: backend.kind, capacity: backend.capacity });

    try {
      for (;;) {
        skipOrphans();
        if (!halted()) {
          dispatchReady();
        }
        if (inflight.size === 0) {
          break;
        }
        await Promise.race(inflight.values());
      }
    } finally {
      cancellation.dispose();
    }

    const cancelled = cancellation.signal.aborted;
    const stranded = graph.order.filter((id) => stateOf(id) === 'pending');
    if (cancelled) {
      for (const id of stranded) {
        recordOf(id).state = 'cancelled';
      }
      logger.warn?.(`Run ${runId} cancelled: ${describeError(cancellation.signal.reason)}`);
    } else if (!runState.failure && stranded.length > 0) {
      const [first] = stranded;
      runState.failure = {
        stepId: first ?? '',
        code: RuntimeErrorCode.DEPENDENCY_UNAVAILABLE,
        message: `Steps never became ready: ${stranded.join(', ')}.`,
      };
    }

    const { failure } = runState;
    const status = failure ? 'failed' : cancelled ? 'cancelled' : 'succeeded';
    const timingsMs: Record<string, number> = {};
    for (const record of records.values()) {
      timingsMs[record.id] = record.durationMs;
    }
    timingsMs.total = Date.now() - startedMs;

    emit({
      type: 'run-complete',
      status,
      progress: { completed: completed(), total },
      ...(failure ? { stepId: failure.stepId, error: { message: failure.message, code: failure.code } } : {}),
    });
    if (status === 'succeeded') {
      logger.info?.(`Run ${runId} succeeded`, { durationMs: timingsMs.total });
    }

    return {
      runId,
      status,
      context,
      ledger,
      steps: graph.order.map(recordOf),
      ...(failure ? { failure } : {}),
      startedAt,
      completedAt: clock.now(),
      timingsMs,
    };
  }

  return { backend, run };
}

/**
 * Maps an error thrown by a step onto the outcome it stands for.
 */
export function classifyThrown(step: StepDefinition, error: unknown): StepOutcome {
  const reason = describeError(error);
  if (!isPipelineError(error)) {
    return step.retryable ? { status: 'retryable', reason, cause: error } : { status: 'fatal', reason, cause: error };
  }
  switch (error.category) {
    case 'service':
      return { status: 'retryable', reason, cause: error };
    case 'runtime':
      return error.code === RuntimeErrorCode.STEP_TIMEOUT
        ? { status: 'retryable', reason, cause: error }
        : { status: 'fatal', reason, cause: error };
    case 'validation':
      return step.gate ? { status: 'reject', feedback: reason } : { status: 'fatal', reason, cause: error };
    default:
      return { status: 'fatal', reason, cause: error };
  }
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.initialDelayMs * policy.backoffFactor ** (attempt - 1), policy.maxDelayMs);
}

function resolveRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw createConfigurationError(
      ConfigurationErrorCode.INVALID_SETTING,
      `maxAttempts must be a positive integer, got ${policy.maxAttempts}.`,
    );
  }
  if (policy.initialDelayMs < 0 || policy.maxDelayMs < 0 || policy.backoffFactor < 1) {
    throw createConfigurationError(
      ConfigurationErrorCode.INVALID_SETTING,
      'Retry delays must be non-negative and the backoff factor at least 1.',
    );
  }
  return policy;
}

function assertPositive(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isFinite(value) || value <= 0)) {
    throw createConfigurationError(
      ConfigurationErrorCode.INVALID_SETTING,
      `${name} must be a positive number of milliseconds, got ${value}.`,
    );
  }
}

function errorCode(error: unknown): string {
  return isPipelineError(error) ? error.code : RuntimeErrorCode.STEP_FAILED;
}

function createRecord(step: StepDefinition): StepRecord {
  return {
    id: step.id,
    kind: step.kind,
    state: 'pending',
    invocations: 0,
    attempts: 0,
    reworkRounds: 0,
    feedback: [],
    durationMs: 0,
  };
}

function readOnlyLedger(ledger: ConsistencyLedger): LedgerReader {
  return {
    boundary: (segment, position) => ledger.boundary(segment, position),
    adjacencies: () => ledger.adjacencies(),
    lockedFlags: () => ledger.lockedFlags(),
    checkFlags: (candidate) => ledger.checkFlags(candidate),
    snapshot: () => ledger.snapshot(),
  };
}

function linkCancellation(signal: AbortSignal | undefined, timeoutMs: number | undefined) {
  const controller = new AbortController();
  const forward = (): void => controller.abort(signal?.reason);
  if (signal?.aborted) {
    forward();
  } else {
    signal?.addEventListener('abort', forward, { once: true });
  }
  const timer =
    timeoutMs === undefined
      ? undefined
      : setTimeout(() => {
          controller.abort(
            createRuntimeError(RuntimeErrorCode.RUN_CANCELLED, `Run exceeded its ${timeoutMs}ms time limit.`),
          );
        }, timeoutMs);
  return {
    signal: controller.signal,
    dispose(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forward);
    },
  };
}

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

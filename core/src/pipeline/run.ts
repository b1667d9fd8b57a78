import { randomUUID } from 'node:crypto';
import { createArtifactStore } from '../artifact-store.js';
import { resolveSegmentCount, type PipelineConfig } from '../config.js';
import { ConfigurationErrorCode, createConfigurationError } from '../errors/index.js';
import { createParallelBackend, createSequentialBackend } from '../execution/backends.js';
import { createExecutionEngine } from '../execution/engine.js';
import type { ProgressHandler, RunResult } from '../execution/types.js';
import { buildStepGraph } from '../graph/index.js';
import type { Logger } from '../logger.js';
import { createReportStore, isReport, type Report } from '../report.js';
import { createRunLogSink } from '../run-log.js';
import type { RunSeed } from '../steps/types.js';
import { createStorageContext, type StorageContext } from '../storage.js';
import type { Clock } from '../types.js';
import { reportKey } from './keys.js';
import type { ServiceClients } from './services.js';
import { createPipelineSteps } from './steps.js';
import { createTimingCollector } from './timings.js';

export interface PipelineRunOptions {
  config: PipelineConfig;
  services: ServiceClients;
  prompt: string;
  referenceImages: string[];
  runId?: string;
  /** Defaults to the configured target duration. */
  targetDurationSec?: number;
  /** Defaults to what the target duration needs at the configured segment ceiling. */
  segmentCount?: number;
  /** Defaults to local storage under `config.storageRoot`. */
  storage?: StorageContext;
  logger?: Partial<Logger>;
  clock?: Clock;
  onProgress?: ProgressHandler;
  signal?: AbortSignal;
  readReference?: (path: string) => Promise<Uint8Array>;
  /** Replaces the wait between retry attempts. */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export interface PipelineRunResult extends RunResult {
  segmentCount: number;
  /** Present when the report step committed. */
  report?: Report;
}

export function createRunId(): string {
  return `run-${randomUUID().slice(0, 8)}`;
}

/**
 * Builds the pipeline graph for one prompt and runs it to completion.
 */
export async function runPipeline(options: PipelineRunOptions): Promise<PipelineRunResult> {
  const { config } = options;
  const runId = options.runId ?? createRunId();
  const targetDurationSec = options.targetDurationSec ?? config.targetDurationSec;
  const segmentCount =
    options.segmentCount ?? resolveSegmentCount(targetDurationSec, config.maxSegmentDurationSec);
  const seed: RunSeed = {
    prompt: options.prompt,
    referenceImages: options.referenceImages,
    targetDurationSec,
    fps: config.fps,
    targetSegmentCount: segmentCount,
    maxSegmentDurationSec: config.maxSegmentDurationSec,
  };
  validateSeed(seed);

  const logger = options.logger ?? {};
  const storage = options.storage ?? createStorageContext({ kind: 'local', rootDir: config.storageRoot });
  const artifacts = createArtifactStore(storage, { clock: options.clock, logger });
  const timings = createTimingCollector();

  const graph = buildStepGraph(
    createPipelineSteps({
      segmentCount,
      services: options.services,
      reports: createReportStore(storage),
      readReference: options.readReference,
      output: config.output,
      timings: () => timings.snapshot(),
      clock: options.clock,
    }),
  );

  const engine = createExecutionEngine({
    backend:
      config.backend === 'sequential' ? createSequentialBackend() : createParallelBackend(config.concurrency),
    retry: config.retry,
    maxReworkRounds: config.maxReworkRounds,
    stepTimeoutMs: config.stepTimeoutMs,
    runTimeoutMs: config.runTimeoutMs,
    logger,
    clock: options.clock,
    runLog: createRunLogSink(storage),
    sleep: options.sleep,
    onProgress: (event) => {
      timings.observe(event);
      options.onProgress?.(event);
    },
  });

  logger.info?.(`Planning ${segmentCount} segment(s) for run ${runId}`, {
    targetDurationSec,
    references: seed.referenceImages.length,
  });
  const result = await engine.run({ runId, seed, graph, artifacts, signal: options.signal });
  const report = result.context.entry(reportKey.name)?.value;
  return { ...result, segmentCount, ...(isReport(report) ? { report } : {}) };
}

function validateSeed(seed: RunSeed): void {
  if (seed.referenceImages.length === 0) {
    throw createConfigurationError(ConfigurationErrorCode.INVALID_RUN_SEED, 'At least one reference image is required.', {
      suggestion: 'Pass reference images with --image.',
    });
  }
  if (!(seed.targetDurationSec > 0)) {
    throw createConfigurationError(
      ConfigurationErrorCode.INVALID_RUN_SEED,
      `Target duration must be positive, got ${seed.targetDurationSec}.`,
    );
  }
  if (!Number.isInteger(seed.targetSegmentCount) || seed.targetSegmentCount < 1) {
    throw createConfigurationError(
      ConfigurationErrorCode.INVALID_RUN_SEED,
      `Segment count must be a positive integer, got ${seed.targetSegmentCount}.`,
    );
  }
}

import {
  ConfigurationErrorCode,
  createConfigurationError,
  createLogger,
  isBackendKind,
  loadClipInputs,
  resolvePipelineConfig,
  runPipeline,
  type Environment,
  type LogLevel,
  type Logger,
  type PipelineConfig,
  type PipelineConfigOverrides,
  type PipelineRunResult,
  type ProgressHandler,
  type ServiceClients,
  type StorageContext,
} from '@keyreel/core';
import { createServiceClients } from '@keyreel/providers';

export interface GenerateOptions {
  /** YAML file with prompt, images, durationSec and segments; flags win over it. */
  inputsPath?: string;
  prompt?: string;
  images: string[];
  durationSec?: number;
  segments?: number;
  fps?: number;
  runId?: string;
  storageRoot?: string;
  backend?: string;
  concurrency?: number;
  /** Overrides KEYREEL_ENABLE_MOCKS when set. */
  mocks?: boolean;
  logLevel: LogLevel;
}

export interface GenerateDependencies {
  env?: Environment;
  /** Defaults to local storage under the configured root. */
  storage?: StorageContext;
  services?: ServiceClients;
  logger?: Logger;
  onProgress?: ProgressHandler;
  readReference?: (path: string) => Promise<Uint8Array>;
  signal?: AbortSignal;
}

export interface GenerateResult {
  config: PipelineConfig;
  run: PipelineRunResult;
}

export async function runGenerate(
  requested: GenerateOptions,
  deps: GenerateDependencies = {},
): Promise<GenerateResult> {
  const options = await mergeInputsFile(requested);
  const prompt = options.prompt?.trim();
  if (!prompt) {
    throw createConfigurationError(ConfigurationErrorCode.INVALID_RUN_SEED, 'A prompt is required.', {
      suggestion: 'Pass --prompt "<what should happen>".',
    });
  }

  const config = resolvePipelineConfig(deps.env ?? process.env, buildOverrides(options));
  const logger = deps.logger ?? createLogger({ level: options.logLevel });
  const services = deps.services ?? createServiceClients(config, { logger });

  logger.debug('Resolved pipeline configuration', {
    storageRoot: config.storageRoot,
    backend: config.backend,
    concurrency: config.concurrency,
    mocks: config.enableMocks,
  });

  const run = await runPipeline({
    config,
    services,
    prompt,
    referenceImages: options.images,
    runId: options.runId,
    targetDurationSec: options.durationSec,
    segmentCount: options.segments,
    storage: deps.storage,
    logger,
    onProgress: deps.onProgress,
    readReference: deps.readReference,
    signal: deps.signal,
  });
  return { config, run };
}

async function mergeInputsFile(options: GenerateOptions): Promise<GenerateOptions> {
  if (!options.inputsPath) {
    return options;
  }
  const inputs = await loadClipInputs(options.inputsPath);
  return {
    ...options,
    prompt: options.prompt ?? inputs.prompt,
    images: options.images.length > 0 ? options.images : inputs.images,
    durationSec: options.durationSec ?? inputs.durationSec,
    segments: options.segments ?? inputs.segments,
  };
}

function buildOverrides(options: GenerateOptions): PipelineConfigOverrides {
  const overrides: PipelineConfigOverrides = {};
  if (options.storageRoot) {
    overrides.storageRoot = options.storageRoot;
  }
  if (options.backend !== undefined) {
    if (!isBackendKind(options.backend)) {
      throw createConfigurationError(
        ConfigurationErrorCode.INVALID_SETTING,
        `--backend must be "parallel" or "sequential", got "${options.backend}".`,
      );
    }
    overrides.backend = options.backend;
  }
  if (options.concurrency !== undefined) {
    overrides.concurrency = options.concurrency;
  }
  if (options.mocks !== undefined) {
    overrides.enableMocks = options.mocks;
  }
  if (options.durationSec !== undefined) {
    overrides.targetDurationSec = options.durationSec;
  }
  if (options.fps !== undefined) {
    overrides.fps = options.fps;
  }
  return overrides;
}

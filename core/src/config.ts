import { ConfigurationErrorCode, createConfigurationError } from './errors/index.js';
import { DEFAULT_MAX_REWORK_ROUNDS, DEFAULT_RETRY_POLICY, type RetryPolicy } from './execution/types.js';

export type BackendKind = 'parallel' | 'sequential';

export function isBackendKind(value: unknown): value is BackendKind {
  return value === 'parallel' || value === 'sequential';
}

export interface ChatEndpointSettings {
  apiKey?: string;
  baseUrl?: string;
  model: string;
}

export interface FalSettings {
  apiKey?: string;
  styleModel: string;
  keyframeModel: string;
  videoModel: string;
}

/** Final video encoding. Any field set makes assembly re-encode instead of stream-copy. */
export interface OutputSettings {
  width?: number;
  height?: number;
  /** ffmpeg bitrate, such as `8M` or `4500k`. */
  bitrate?: string;
}

export interface ServiceSettings {
  perception: ChatEndpointSettings;
  reasoning: ChatEndpointSettings;
  fal: FalSettings;
  ffmpegPath: string;
}

export interface PipelineConfig {
  /** Directory holding `blobs/` and `runs/`. */
  storageRoot: string;
  enableMocks: boolean;
  backend: BackendKind;
  concurrency: number;
  retry: RetryPolicy;
  maxReworkRounds: number;
  stepTimeoutMs?: number;
  runTimeoutMs?: number;
  maxSegmentDurationSec: number;
  fps: number;
  targetDurationSec: number;
  output: OutputSettings;
  services: ServiceSettings;
}

export type PipelineConfigOverrides = Partial<Omit<PipelineConfig, 'retry' | 'services'>> & {
  retry?: Partial<RetryPolicy>;
};

export type Environment = Record<string, string | undefined>;

export const DEFAULT_STORAGE_ROOT = '.keyreel';
export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_FPS = 24;
export const DEFAULT_TARGET_DURATION_SEC = 30;
export const DEFAULT_MAX_SEGMENT_DURATION_SEC = 8;

const BITRATE_PATTERN = /^\d+(\.\d+)?[kKmM]?$/;

/**
 * Builds the pipeline configuration from `KEYREEL_*` variables and the
 * service credential variables. Explicit overrides win over the environment.
 */
export function resolvePipelineConfig(
  env: Environment = process.env,
  overrides: PipelineConfigOverrides = {},
): PipelineConfig {
  const backend = overrides.backend ?? readBackend(env.KEYREEL_BACKEND);
  const retry: RetryPolicy = {
    maxAttempts: readInteger(env, 'KEYREEL_MAX_ATTEMPTS') ?? DEFAULT_RETRY_POLICY.maxAttempts,
    initialDelayMs: readNumber(env, 'KEYREEL_BACKOFF_INITIAL_MS') ?? DEFAULT_RETRY_POLICY.initialDelayMs,
    backoffFactor: readNumber(env, 'KEYREEL_BACKOFF_FACTOR') ?? DEFAULT_RETRY_POLICY.backoffFactor,
    maxDelayMs: readNumber(env, 'KEYREEL_BACKOFF_MAX_MS') ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    ...overrides.retry,
  };

  const config: PipelineConfig = {
    storageRoot: overrides.storageRoot ?? nonEmpty(env.KEYREEL_STORAGE_ROOT) ?? DEFAULT_STORAGE_ROOT,
    enableMocks: overrides.enableMocks ?? readBoolean(env, 'KEYREEL_ENABLE_MOCKS') ?? true,
    backend,
    concurrency: overrides.concurrency ?? readInteger(env, 'KEYREEL_CONCURRENCY') ?? DEFAULT_CONCURRENCY,
    retry,
    maxReworkRounds:
      overrides.maxReworkRounds ?? readInteger(env, 'KEYREEL_MAX_REWORK_ROUNDS') ?? DEFAULT_MAX_REWORK_ROUNDS,
    stepTimeoutMs: overrides.stepTimeoutMs ?? readNumber(env, 'KEYREEL_STEP_TIMEOUT_MS'),
    runTimeoutMs: overrides.runTimeoutMs ?? readNumber(env, 'KEYREEL_RUN_TIMEOUT_MS'),
    maxSegmentDurationSec:
      overrides.maxSegmentDurationSec ??
      readNumber(env, 'KEYREEL_MAX_SEGMENT_SEC') ??
      DEFAULT_MAX_SEGMENT_DURATION_SEC,
    fps: overrides.fps ?? readInteger(env, 'KEYREEL_FPS') ?? DEFAULT_FPS,
    targetDurationSec:
      overrides.targetDurationSec ?? readNumber(env, 'KEYREEL_DURATION_SEC') ?? DEFAULT_TARGET_DURATION_SEC,
    output: {
      width: readInteger(env, 'KEYREEL_OUTPUT_WIDTH'),
      height: readInteger(env, 'KEYREEL_OUTPUT_HEIGHT'),
      bitrate: nonEmpty(env.KEYREEL_OUTPUT_BITRATE),
      ...overrides.output,
    },
    services: {
      perception: {
        apiKey: nonEmpty(env.PERCEPTION_API_KEY),
        baseUrl: nonEmpty(env.PERCEPTION_API_URL),
        model: nonEmpty(env.PERCEPTION_MODEL) ?? 'gpt-4o-mini',
      },
      reasoning: {
        apiKey: nonEmpty(env.REASONING_API_KEY),
        baseUrl: nonEmpty(env.REASONING_API_URL),
        model: nonEmpty(env.REASONING_MODEL) ?? 'gpt-4o-mini',
      },
      fal: {
        apiKey: nonEmpty(env.FAL_KEY),
        styleModel: nonEmpty(env.FAL_STYLE_MODEL) ?? 'fal-ai/flux-pro/kontext',
        keyframeModel: nonEmpty(env.FAL_KEYFRAME_MODEL) ?? 'fal-ai/flux-pro/kontext/multi',
        videoModel: nonEmpty(env.FAL_VIDEO_MODEL) ?? 'fal-ai/kling-video/v2.1/pro/image-to-video',
      },
      ffmpegPath: nonEmpty(env.KEYREEL_FFMPEG_PATH) ?? 'ffmpeg',
    },
  };

  validatePipelineConfig(config);
  return config;
}

export function validatePipelineConfig(config: PipelineConfig): void {
  requireInteger('concurrency', config.concurrency, 1);
  requireInteger('retry.maxAttempts', config.retry.maxAttempts, 1);
  requireInteger('maxReworkRounds', config.maxReworkRounds, 0);
  requireInteger('fps', config.fps, 1);
  if (config.retry.initialDelayMs < 0 || config.retry.maxDelayMs < 0) {
    throw invalid('Retry delays must not be negative.');
  }
  if (config.retry.backoffFactor < 1) {
    throw invalid(`retry.backoffFactor must be at least 1, got ${config.retry.backoffFactor}.`);
  }
  if (!(config.maxSegmentDurationSec >= 1)) {
    throw invalid(`maxSegmentDurationSec must be at least 1, got ${config.maxSegmentDurationSec}.`);
  }
  if (!(config.targetDurationSec > 0)) {
    throw invalid(`targetDurationSec must be positive, got ${config.targetDurationSec}.`);
  }
  for (const [name, value] of [
    ['output.width', config.output.width],
    ['output.height', config.output.height],
  ] as const) {
    if (value !== undefined) {
      requireInteger(name, value, 1);
    }
  }
  if (config.output.bitrate !== undefined && !BITRATE_PATTERN.test(config.output.bitrate)) {
    throw invalid(`output.bitrate must look like "8M" or "4500k", got "${config.output.bitrate}".`);
  }
  for (const [name, value] of [
    ['stepTimeoutMs', config.stepTimeoutMs],
    ['runTimeoutMs', config.runTimeoutMs],
  ] as const) {
    if (value !== undefined && !(value > 0)) {
      throw invalid(`${name} must be positive, got ${value}.`);
    }
  }
}

/**
 * Number of segments a run plans for: enough segments of at most
 * `maxSegmentDurationSec` to cover the target duration.
 */
export function resolveSegmentCount(targetDurationSec: number, maxSegmentDurationSec: number): number {
  return Math.max(1, Math.ceil(targetDurationSec / maxSegmentDurationSec));
}

function readBackend(raw: string | undefined): BackendKind {
  const value = nonEmpty(raw)?.toLowerCase();
  if (value === undefined || value === 'parallel') {
    return 'parallel';
  }
  if (value === 'sequential') {
    return 'sequential';
  }
  throw invalid(`KEYREEL_BACKEND must be "parallel" or "sequential", got "${raw}".`);
}

function readBoolean(env: Environment, name: string): boolean | undefined {
  const value = nonEmpty(env[name])?.toLowerCase();
  if (value === undefined) {
    return undefined;
  }
  if (value === 'true' || value === '1') {
    return true;
  }
  if (value === 'false' || value === '0') {
    return false;
  }
  throw invalid(`${name} must be true or false, got "${env[name]}".`);
}

function readNumber(env: Environment, name: string): number | undefined {
  const raw = nonEmpty(env[name]);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw invalid(`${name} must be a number, got "${raw}".`);
  }
  return value;
}

function readInteger(env: Environment, name: string): number | undefined {
  const value = readNumber(env, name);
  if (value !== undefined && !Number.isInteger(value)) {
    throw invalid(`${name} must be an integer, got "${env[name]}".`);
  }
  return value;
}

function requireInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw invalid(`${name} must be an integer of at least ${min}, got ${value}.`);
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function invalid(message: string) {
  return createConfigurationError(ConfigurationErrorCode.INVALID_SETTING, message, {
    suggestion: 'Check the KEYREEL_* environment variables and command line flags.',
  });
}

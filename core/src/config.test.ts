import { describe, expect, it } from 'vitest';
import { resolvePipelineConfig, resolveSegmentCount } from './config.js';

describe('resolvePipelineConfig', () => {
  it('falls back to defaults when nothing is set', () => {
    const config = resolvePipelineConfig({});

    expect(config).toMatchObject({
      storageRoot: '.keyreel',
      enableMocks: true,
      backend: 'parallel',
      concurrency: 4,
      retry: { maxAttempts: 3, initialDelayMs: 500, backoffFactor: 2, maxDelayMs: 8000 },
      maxReworkRounds: 2,
      maxSegmentDurationSec: 8,
      fps: 24,
      targetDurationSec: 30,
    });
    expect(config.stepTimeoutMs).toBeUndefined();
    expect(config.services.ffmpegPath).toBe('ffmpeg');
  });

  it('reads KEYREEL_* variables and service credentials', () => {
    const config = resolvePipelineConfig({
      KEYREEL_STORAGE_ROOT: '/tmp/reels',
      KEYREEL_ENABLE_MOCKS: 'false',
      KEYREEL_BACKEND: 'Sequential',
      KEYREEL_CONCURRENCY: '2',
      KEYREEL_MAX_ATTEMPTS: '5',
      KEYREEL_BACKOFF_INITIAL_MS: '100',
      KEYREEL_MAX_REWORK_ROUNDS: '0',
      KEYREEL_STEP_TIMEOUT_MS: '60000',
      KEYREEL_FPS: '30',
      PERCEPTION_API_KEY: 'test-secret',
      PERCEPTION_API_URL: 'http://localhost:9000/v1',
      REASONING_MODEL: 'planner-large',
      FAL_KEY: 'test-secret',
    });

    expect(config.storageRoot).toBe('/tmp/reels');
    expect(config.enableMocks).toBe(false);
    expect(config.backend).toBe('sequential');
    expect(config.concurrency).toBe(2);
    expect(config.retry).toEqual({ maxAttempts: 5, initialDelayMs: 100, backoffFactor: 2, maxDelayMs: 8000 });
    expect(config.maxReworkRounds).toBe(0);
    expect(config.stepTimeoutMs).toBe(60000);
    expect(config.fps).toBe(30);
    expect(config.services.perception).toEqual({
      apiKey: 'test-secret',
      baseUrl: 'http://localhost:9000/v1',
      model: 'gpt-4o-mini',
    });
    expect(config.services.reasoning.model).toBe('planner-large');
    expect(config.services.fal.apiKey).toBe('test-secret');
  });

  it('reads the output resolution and bitrate', () => {
    const config = resolvePipelineConfig(
      { KEYREEL_OUTPUT_WIDTH: '1280', KEYREEL_OUTPUT_HEIGHT: '720', KEYREEL_OUTPUT_BITRATE: '4500k' },
      { output: { bitrate: '8M' } },
    );

    expect(config.output).toEqual({ width: 1280, height: 720, bitrate: '8M' });
    expect(resolvePipelineConfig({}).output).toEqual({
      width: undefined,
      height: undefined,
      bitrate: undefined,
    });
  });

  it('lets overrides win over the environment', () => {
    const config = resolvePipelineConfig(
      { KEYREEL_CONCURRENCY: '2', KEYREEL_MAX_ATTEMPTS: '5' },
      { concurrency: 8, retry: { maxAttempts: 1 } },
    );

    expect(config.concurrency).toBe(8);
    expect(config.retry.maxAttempts).toBe(1);
  });

  it.each([
    [{ KEYREEL_CONCURRENCY: '0' }, 'concurrency must be an integer of at least 1, got 0.'],
    [{ KEYREEL_CONCURRENCY: 'many' }, 'KEYREEL_CONCURRENCY must be a number, got "many".'],
    [{ KEYREEL_FPS: '23.5' }, 'KEYREEL_FPS must be an integer, got "23.5".'],
    [{ KEYREEL_BACKEND: 'threads' }, 'KEYREEL_BACKEND must be "parallel" or "sequential", got "threads".'],
    [{ KEYREEL_ENABLE_MOCKS: 'maybe' }, 'KEYREEL_ENABLE_MOCKS must be true or false, got "maybe".'],
    [{ KEYREEL_BACKOFF_FACTOR: '0.5' }, 'retry.backoffFactor must be at least 1, got 0.5.'],
    [{ KEYREEL_MAX_SEGMENT_SEC: '0.5' }, 'maxSegmentDurationSec must be at least 1, got 0.5.'],
    [{ KEYREEL_RUN_TIMEOUT_MS: '-1' }, 'runTimeoutMs must be positive, got -1.'],
    [{ KEYREEL_OUTPUT_WIDTH: '0' }, 'output.width must be an integer of at least 1, got 0.'],
    [{ KEYREEL_OUTPUT_BITRATE: 'fast' }, 'output.bitrate must look like "8M" or "4500k", got "fast".'],
  ])('rejects %o with C010', (env, message) => {
    expect(() => resolvePipelineConfig(env)).toThrowError(
      expect.objectContaining({ code: 'C010', message }),
    );
  });
});

describe('resolveSegmentCount', () => {
  it('covers the target duration with segments no longer than the ceiling', () => {
    expect(resolveSegmentCount(21, 8)).toBe(3);
    expect(resolveSegmentCount(24, 8)).toBe(3);
    expect(resolveSegmentCount(25, 8)).toBe(4);
    expect(resolveSegmentCount(0.5, 8)).toBe(1);
  });
});

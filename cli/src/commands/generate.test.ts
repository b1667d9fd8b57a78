import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import { createLogger, createStorageContext, type ProgressEvent } from '@keyreel/core';
import { runGenerate, type GenerateOptions } from './generate.js';
import { runInspect } from './inspect.js';

function quietLogger() {
  return createLogger({ sink: { log: vi.fn(), warn: vi.fn(), error: vi.fn() } });
}

const baseOptions: GenerateOptions = {
  prompt: 'a fox chasing fireflies at dusk',
  images: ['fox.png'],
  durationSec: 16,
  runId: 'run-cli',
  logLevel: 'info',
};

describe('runGenerate', () => {
  it('runs the mock pipeline end to end and stores a report', async () => {
    const storage = createStorageContext({ kind: 'memory' });
    const events: ProgressEvent[] = [];

    const { config, run } = await runGenerate(baseOptions, {
      env: {},
      storage,
      logger: quietLogger(),
      onProgress: (event) => events.push(event),
      readReference: async () => Buffer.from('reference-bytes'),
    });

    expect(config.enableMocks).toBe(true);
    expect(run.status).toBe('succeeded');
    expect(run.segmentCount).toBe(2);
    expect(run.report?.segments.map((segment) => segment.durationSec)).toEqual([8, 8]);
    expect(run.report?.keyframeIds).toHaveLength(3);
    expect(events[0]?.type).toBe('run-start');
    expect(events[events.length - 1]?.type).toBe('run-complete');

    const stored = await runInspect({ runId: 'run-cli' }, { storage });
    expect(stored).toEqual(run.report);
  });

  it('honours an explicit segment count and backend', async () => {
    const { config, run } = await runGenerate(
      { ...baseOptions, segments: 3, backend: 'sequential', concurrency: 2 },
      {
        env: {},
        storage: createStorageContext({ kind: 'memory' }),
        logger: quietLogger(),
        readReference: async () => Buffer.from('reference-bytes'),
      },
    );

    expect(config.backend).toBe('sequential');
    expect(config.concurrency).toBe(2);
    expect(run.segmentCount).toBe(3);
    expect(run.report?.videoIds).toHaveLength(3);
  });

  it('renders at the requested frame rate', async () => {
    const { config, run } = await runGenerate(
      { ...baseOptions, fps: 12, runId: 'run-fps' },
      {
        env: { KEYREEL_FPS: '30' },
        storage: createStorageContext({ kind: 'memory' }),
        logger: quietLogger(),
        readReference: async () => Buffer.from('reference-bytes'),
      },
    );

    expect(config.fps).toBe(12);
    expect(run.status).toBe('succeeded');
    expect(run.report?.globalFps).toBe(12);
  });

  it('requires a prompt', async () => {
    await expect(runGenerate({ ...baseOptions, prompt: '  ' }, { env: {} })).rejects.toMatchObject({
      code: 'C011',
      message: 'A prompt is required.',
    });
  });

  it('rejects an unknown backend', async () => {
    await expect(runGenerate({ ...baseOptions, backend: 'threads' }, { env: {} })).rejects.toMatchObject({
      code: 'C010',
      message: '--backend must be "parallel" or "sequential", got "threads".',
    });
  });

  it('needs credentials when live services are requested', async () => {
    await expect(
      runGenerate({ ...baseOptions, mocks: false }, { env: {}, logger: quietLogger() }),
    ).rejects.toMatchObject({ code: 'S003' });
  });
});

describe('runInspect', () => {
  it('raises T003 for an unknown run', async () => {
    await expect(
      runInspect({ runId: 'run-missing' }, { storage: createStorageContext({ kind: 'memory' }) }),
    ).rejects.toMatchObject({ code: 'T003', message: 'No report found for run run-missing.' });
  });
});

describe('runGenerate with an inputs file', () => {
  it('fills missing flags from the file and lets flags win', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'generate-inputs-'));
    try {
      const inputsPath = join(dir, 'clip.yaml');
      await writeFile(inputsPath, 'prompt: a kitten in snow\nimages: [kitten.png]\ndurationSec: 8\nsegments: 2\n', 'utf8');
      const readReference = vi.fn(async () => Buffer.from('reference-bytes'));

      const { run } = await runGenerate(
        { inputsPath, images: [], segments: 1, runId: 'run-inputs', logLevel: 'info' },
        { env: {}, storage: createStorageContext({ kind: 'memory' }), logger: quietLogger(), readReference },
      );

      expect(run.status).toBe('succeeded');
      expect(run.segmentCount).toBe(1);
      expect(readReference).toHaveBeenCalledWith(join(dir, 'kitten.png'));
      expect(run.report?.targetDurationSec).toBe(8);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

import { describe, expect, it } from 'vitest';
import { createStorageContext, ensureDirectoriesForPath, runDirectory } from './storage.js';
import { isPipelineError, ConfigurationErrorCode } from './errors/index.js';

function memoryContext(basePath?: string) {
  return createStorageContext({ kind: 'memory', basePath });
}

describe('createStorageContext', () => {
  it('resolves paths relative to the base path', () => {
    const ctx = memoryContext('cache');
    expect(ctx.resolve('blobs', 'ab', 'abc.png')).toBe('cache/blobs/ab/abc.png');
    expect(runDirectory(ctx, 'run-1')).toBe('cache/runs/run-1');
  });

  it('drops empty base paths and stray slashes', () => {
    const ctx = memoryContext();
    expect(ctx.resolve('/runs/', 'run-1')).toBe('runs/run-1');
  });

  it('rejects segments that escape the root', () => {
    const ctx = memoryContext('cache');
    try {
      ctx.resolve('runs', '..');
      expect.fail('Expected an error to be thrown');
    } catch (error) {
      expect(isPipelineError(error)).toBe(true);
      if (isPipelineError(error)) {
        expect(error.code).toBe(ConfigurationErrorCode.INVALID_SETTING);
      }
    }
  });

  it('locates memory paths as storage-relative', () => {
    const ctx = memoryContext('cache');
    expect(ctx.locate('cache/blobs/x.png')).toBe('cache/blobs/x.png');
  });

  it('locates local paths under the root directory', () => {
    const ctx = createStorageContext({ kind: 'local', rootDir: '/tmp/keyreel-root' });
    expect(ctx.locate('blobs/ab/abc.png')).toBe('/tmp/keyreel-root/blobs/ab/abc.png');
  });
});

describe('ensureDirectoriesForPath', () => {
  it('creates each parent directory', async () => {
    const ctx = memoryContext();
    await ensureDirectoriesForPath(ctx, 'runs/run-1/logs/file.txt');

    expect(await ctx.storage.directoryExists('runs')).toBe(true);
    expect(await ctx.storage.directoryExists('runs/run-1')).toBe(true);
    expect(await ctx.storage.directoryExists('runs/run-1/logs')).toBe(true);
  });
});

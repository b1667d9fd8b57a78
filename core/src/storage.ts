import { resolve as resolvePath } from 'node:path';
import { FileStorage } from '@flystorage/file-storage';
import { LocalStorageAdapter } from '@flystorage/local-fs';
import { InMemoryStorageAdapter } from '@flystorage/in-memory';
import { createConfigurationError, ConfigurationErrorCode } from './errors/index.js';

export type StorageConfig =
  | { kind: 'local'; rootDir: string; basePath?: string }
  | { kind: 'memory'; basePath?: string };

/**
 * Storage shared by the artifact store, run logs and reports.
 *
 * Layout under `basePath`:
 * - `blobs/<id[0..2]>/<id>.<ext>` payloads, `<id>.json` metadata (shared across runs)
 * - `runs/<runId>/` per-run logs and the final report
 */
export interface StorageContext {
  storage: FileStorage;
  basePath: string;
  /** Joins `basePath` with the given segments into a storage-relative path. */
  resolve(...segments: string[]): string;
  /** Location a collaborator outside the storage layer can open. */
  locate(relativePath: string): string;
}

export function createStorageContext(config: StorageConfig): StorageContext {
  const basePath = trimSlashes(config.basePath ?? '');
  const storage =
    config.kind === 'local'
      ? new FileStorage(new LocalStorageAdapter(config.rootDir))
      : new FileStorage(new InMemoryStorageAdapter());
  const rootDir = config.kind === 'local' ? resolvePath(config.rootDir) : null;

  return {
    storage,
    basePath,
    resolve(...segments: string[]): string {
      const parts = [basePath, ...segments.map(trimSlashes)].filter((part) => part.length > 0);
      for (const part of parts) {
        if (part.split('/').includes('..')) {
          throw createConfigurationError(
            ConfigurationErrorCode.INVALID_SETTING,
            `Storage path segment "${part}" escapes the storage root.`,
          );
        }
      }
      return parts.join('/');
    },
    locate(relativePath: string): string {
      return rootDir ? resolvePath(rootDir, relativePath) : relativePath;
    },
  };
}

/**
 * Creates every parent directory of a storage-relative file path.
 */
export async function ensureDirectoriesForPath(
  context: Pick<StorageContext, 'storage'>,
  fullPath: string,
): Promise<void> {
  const segments = fullPath.split('/').slice(0, -1);
  if (!segments.length) {
    return;
  }
  let current = '';
  for (const segment of segments) {
    current = current ? `${current}/${segment}` : segment;
    if (!(await context.storage.directoryExists(current))) {
      await context.storage.createDirectory(current, {});
    }
  }
}

export function runDirectory(context: StorageContext, runId: string): string {
  return context.resolve('runs', runId);
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

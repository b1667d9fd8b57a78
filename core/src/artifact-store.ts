import type { Buffer } from 'node:buffer';
import {
  blobSegments,
  inferBlobExtension,
  metadataSegments,
  readImageDimensions,
  toBuffer,
} from './blob-utils.js';
import {
  createStorageError,
  describeError,
  isPipelineError,
  StorageErrorCode,
} from './errors/index.js';
import { hashBytes } from './hashing.js';
import type { Logger } from './logger.js';
import { ensureDirectoriesForPath, type StorageContext } from './storage.js';
import { isArtifact, type Artifact, type ArtifactDraft, type Clock } from './types.js';

export interface ArtifactStore {
  /**
   * Stores the payload under the SHA-256 of its bytes. Storing bytes that are
   * already present returns the existing record without writing anything.
   */
  put(draft: ArtifactDraft): Promise<Artifact>;
  get(id: string): Promise<Artifact | undefined>;
  /** Like `get`, but a missing artifact is a StorageError. */
  require(id: string): Promise<Artifact>;
  has(id: string): Promise<boolean>;
  resolvePath(id: string): Promise<string>;
  read(id: string): Promise<Buffer>;
  /** Artifacts stored or looked up through this instance. */
  list(): Artifact[];
}

export interface ArtifactStoreOptions {
  clock?: Clock;
  logger?: Partial<Logger>;
}

const defaultClock: Clock = { now: () => new Date().toISOString() };

export function createArtifactStore(
  context: StorageContext,
  options: ArtifactStoreOptions = {},
): ArtifactStore {
  const clock = options.clock ?? defaultClock;
  const logger = options.logger ?? {};
  const index = new Map<string, Artifact>();
  // Per-id lock: concurrent puts of the same bytes share one write.
  const inflight = new Map<string, Promise<Artifact>>();

  async function lookup(id: string): Promise<Artifact | undefined> {
    const cached = index.get(id);
    if (cached) {
      return cached;
    }
    const metadataPath = context.resolve(...metadataSegments(id));
    let raw: string;
    try {
      if (!(await context.storage.fileExists(metadataPath))) {
        return undefined;
      }
      raw = await context.storage.readToString(metadataPath);
    } catch (error) {
      throw createStorageError(
        StorageErrorCode.READ_FAILED,
        `Failed to read artifact metadata for ${id}: ${describeError(error)}`,
        { context: metadataPath, cause: error },
      );
    }
    const parsed = parseMetadata(raw);
    if (!parsed || parsed.id !== id) {
      throw createStorageError(
        StorageErrorCode.INVALID_METADATA,
        `Artifact metadata for ${id} is corrupted.`,
        { context: metadataPath, suggestion: 'Delete the metadata file so the payload is re-stored.' },
      );
    }
    index.set(id, parsed);
    return parsed;
  }

  async function persist(id: string, data: Buffer, draft: ArtifactDraft): Promise<Artifact> {
    const extension = inferBlobExtension(draft.mimeType);
    const blobPath = context.resolve(...blobSegments(id, extension));
    const metadataPath = context.resolve(...metadataSegments(id));
    const dimensions =
      draft.width !== undefined && draft.height !== undefined
        ? { width: draft.width, height: draft.height }
        : draft.kind === 'image'
          ? readImageDimensions(data)
          : null;

    const artifact: Artifact = {
      id,
      kind: draft.kind,
      size: data.byteLength,
      mimeType: draft.mimeType,
      extension,
      ...(dimensions ?? {}),
      location: context.locate(blobPath),
      createdAt: clock.now(),
    };

    try {
      await ensureDirectoriesForPath(context, blobPath);
      if (!(await context.storage.fileExists(blobPath))) {
        const tmpPath = `${blobPath}.tmp-${Date.now().toString(16)}-${Math.random().toString(16).slice(2)}`;
        await context.storage.write(tmpPath, data, { mimeType: draft.mimeType });
        await context.storage.moveFile(tmpPath, blobPath);
      }
      await context.storage.write(metadataPath, JSON.stringify(artifact, null, 2), {
        mimeType: 'application/json',
      });
    } catch (error) {
      throw createStorageError(
        StorageErrorCode.WRITE_FAILED,
        `Failed to persist artifact ${id}: ${describeError(error)}`,
        { context: blobPath, cause: error },
      );
    }

    logger.debug?.('artifacts.put', { id, kind: artifact.kind, size: artifact.size });
    return artifact;
  }

  async function require(id: string): Promise<Artifact> {
    const artifact = await lookup(id);
    if (!artifact) {
      throw createStorageError(StorageErrorCode.ARTIFACT_NOT_FOUND, `Artifact ${id} is not stored.`);
    }
    return artifact;
  }

  return {
    async put(draft) {
      const data = toBuffer(draft.data);
      const id = hashBytes(data);
      const pending = inflight.get(id);
      if (pending) {
        return pending;
      }
      const task = (async () => {
        const existing = await lookup(id);
        if (existing) {
          return existing;
        }
        const stored = await persist(id, data, draft);
        index.set(id, stored);
        return stored;
      })();
      inflight.set(id, task);
      try {
        return await task;
      } finally {
        inflight.delete(id);
      }
    },

    get: lookup,

    require,

    async has(id) {
      return (await lookup(id)) !== undefined;
    },

    async resolvePath(id) {
      return (await require(id)).location;
    },

    async read(id) {
      const artifact = await require(id);
      const blobPath = context.resolve(...blobSegments(id, artifact.extension));
      try {
        return toBuffer(await context.storage.readToUint8Array(blobPath));
      } catch (error) {
        if (isPipelineError(error)) {
          throw error;
        }
        throw createStorageError(
          StorageErrorCode.READ_FAILED,
          `Failed to read artifact ${id}: ${describeError(error)}`,
          { context: blobPath, cause: error },
        );
      }
    },

    list() {
      return [...index.values()];
    },
  };
}

function parseMetadata(raw: string): Artifact | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isArtifact(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

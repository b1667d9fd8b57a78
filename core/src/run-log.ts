import { createStorageError, describeError, StorageErrorCode } from './errors/index.js';
import { normalizeForSerialization } from './hashing.js';
import { ensureDirectoriesForPath, runDirectory, type StorageContext } from './storage.js';

export type RunLogEntry = { kind: 'prompt'; text: string } | { kind: 'response'; value: unknown };

/**
 * Receives the prompt and response of each step invocation. The engine never
 * waits on it for anything but failure reporting.
 */
export interface RunLogSink {
  record(runId: string, stepId: string, entry: RunLogEntry): Promise<void>;
}

/**
 * Writes `runs/<runId>/<stepId>-prompt.txt` and `<stepId>-response.json`.
 * A later invocation of the same step replaces the earlier files.
 */
export function createRunLogSink(context: StorageContext): RunLogSink {
  return {
    async record(runId, stepId, entry) {
      const fileName = entry.kind === 'prompt' ? `${stepId}-prompt.txt` : `${stepId}-response.json`;
      const path = `${runDirectory(context, runId)}/${fileName}`;
      const contents =
        entry.kind === 'prompt'
          ? entry.text
          : JSON.stringify(normalizeForSerialization(entry.value), null, 2);
      try {
        await ensureDirectoriesForPath(context, path);
        await context.storage.write(path, contents, {
          mimeType: entry.kind === 'prompt' ? 'text/plain' : 'application/json',
        });
      } catch (error) {
        throw createStorageError(
          StorageErrorCode.WRITE_FAILED,
          `Failed to write run log ${fileName}: ${describeError(error)}`,
          { context: path, cause: error },
        );
      }
    },
  };
}

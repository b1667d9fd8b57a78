import {
  StorageErrorCode,
  createReportStore,
  createStorageContext,
  createStorageError,
  resolvePipelineConfig,
  type Environment,
  type Report,
  type StorageContext,
} from '@keyreel/core';

export interface InspectOptions {
  runId: string;
  storageRoot?: string;
}

export interface InspectDependencies {
  env?: Environment;
  storage?: StorageContext;
}

/**
 * Loads the stored report of a finished run.
 */
export async function runInspect(options: InspectOptions, deps: InspectDependencies = {}): Promise<Report> {
  const storage =
    deps.storage ??
    createStorageContext({
      kind: 'local',
      rootDir: options.storageRoot ?? resolvePipelineConfig(deps.env ?? process.env).storageRoot,
    });
  const report = await createReportStore(storage).read(options.runId);
  if (!report) {
    throw createStorageError(StorageErrorCode.ARTIFACT_NOT_FOUND, `No report found for run ${options.runId}.`, {
      suggestion: 'Check the run id and --storage-root.',
    });
  }
  return report;
}

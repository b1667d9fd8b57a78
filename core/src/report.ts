import { createStorageError, describeError, StorageErrorCode } from './errors/index.js';
import type { LedgerSnapshot } from './ledger/index.js';
import { ensureDirectoriesForPath, runDirectory, type StorageContext } from './storage.js';
import { isRecord, isSegmentList, isStringArray, type IsoDatetime, type Segment } from './types.js';

/** Terminal manifest of a run. Tooling downstream of the pipeline reads it. */
export interface Report {
  runId: string;
  /** Hash over the ingested reference artifact ids. */
  referenceHash: string;
  globalFps: number;
  targetDurationSec: number;
  segments: Segment[];
  keyframeIds: string[];
  videoIds: string[];
  finalVideoId: string;
  /** Where the final video can be opened. */
  finalVideoPath: string;
  ledger: LedgerSnapshot;
  timingsMs: Record<string, number>;
  costEstimate: number;
  createdAt: IsoDatetime;
}

export function isReport(value: unknown): value is Report {
  return (
    isRecord(value) &&
    typeof value.runId === 'string' &&
    typeof value.referenceHash === 'string' &&
    typeof value.globalFps === 'number' &&
    isSegmentList(value.segments) &&
    isStringArray(value.keyframeIds) &&
    isStringArray(value.videoIds) &&
    typeof value.finalVideoId === 'string' &&
    isRecord(value.ledger) &&
    isRecord(value.timingsMs)
  );
}

export function formatReportText(report: Report): string {
  return [
    `runId: ${report.runId}`,
    `referenceHash: ${report.referenceHash}`,
    `globalFps: ${report.globalFps}`,
    `segmentCount: ${report.segments.length}`,
    `finalVideo: ${report.finalVideoPath}`,
    '',
  ].join('\n');
}

export interface ReportLocation {
  jsonPath: string;
  textPath: string;
}

export interface ReportStore {
  write(report: Report): Promise<ReportLocation>;
  read(runId: string): Promise<Report | undefined>;
}

/**
 * Persists reports as `runs/<runId>/report.json` and `report.txt`.
 */
export function createReportStore(context: StorageContext): ReportStore {
  const locationOf = (runId: string): ReportLocation => {
    const dir = runDirectory(context, runId);
    return { jsonPath: `${dir}/report.json`, textPath: `${dir}/report.txt` };
  };

  return {
    async write(report) {
      const location = locationOf(report.runId);
      try {
        await ensureDirectoriesForPath(context, location.jsonPath);
        await context.storage.write(location.jsonPath, JSON.stringify(report, null, 2), {
          mimeType: 'application/json',
        });
        await context.storage.write(location.textPath, formatReportText(report), {
          mimeType: 'text/plain',
        });
      } catch (error) {
        throw createStorageError(
          StorageErrorCode.WRITE_FAILED,
          `Failed to write the report for run ${report.runId}: ${describeError(error)}`,
          { context: location.jsonPath, cause: error },
        );
      }
      return location;
    },

    async read(runId) {
      const { jsonPath } = locationOf(runId);
      if (!(await context.storage.fileExists(jsonPath))) {
        return undefined;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(await context.storage.readToString(jsonPath));
      } catch (error) {
        throw createStorageError(
          StorageErrorCode.READ_FAILED,
          `Failed to read the report for run ${runId}: ${describeError(error)}`,
          { context: jsonPath, cause: error },
        );
      }
      if (!isReport(parsed)) {
        throw createStorageError(
          StorageErrorCode.INVALID_METADATA,
          `Report for run ${runId} is not a valid manifest.`,
          { context: jsonPath },
        );
      }
      return parsed;
    },
  };
}

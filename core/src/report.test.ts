import { describe, expect, it, vi } from 'vitest';
import { createReportStore, formatReportText, type Report } from './report.js';
import { createStorageContext } from './storage.js';

function sampleReport(): Report {
  return {
    runId: 'run-1234',
    referenceHash: 'abc123',
    globalFps: 24,
    targetDurationSec: 12,
    segments: [
      {
        index: 1,
        durationSec: 6,
        style: 'watercolour',
        shot: 'fox in grass',
        camera: 'dolly-in',
        story: 'opening',
        propsBackground: ['scarf'],
        endAnchor: { pose: 'sitting', facing: 'camera', expression: 'calm' },
        consistencyFlags: ['scarf visible'],
      },
    ],
    keyframeIds: ['k1', 'k2'],
    videoIds: ['v1'],
    finalVideoId: 'final',
    finalVideoPath: 'blobs/fi/final.mp4',
    ledger: { boundaries: [], lockedFlags: ['scarf visible'] },
    timingsMs: { ingest: 3 },
    costEstimate: 0,
    createdAt: '2026-01-01T00:00:00.000Z',
  };
}

describe('formatReportText', () => {
  it('lists the run summary one field per line', () => {
    expect(formatReportText(sampleReport())).toBe(
      [
        'runId: run-1234',
        'referenceHash: abc123',
        'globalFps: 24',
        'segmentCount: 1',
        'finalVideo: blobs/fi/final.mp4',
        '',
      ].join('\n'),
    );
  });
});

describe('createReportStore', () => {
  it('writes both files under the run directory and reads the manifest back', async () => {
    const context = createStorageContext({ kind: 'memory' });
    const store = createReportStore(context);

    const location = await store.write(sampleReport());

    expect(location).toEqual({ jsonPath: 'runs/run-1234/report.json', textPath: 'runs/run-1234/report.txt' });
    expect(await store.read('run-1234')).toEqual(sampleReport());
    expect(await context.storage.readToString(location.textPath)).toBe(formatReportText(sampleReport()));
  });

  it('returns undefined for a run without a report', async () => {
    const store = createReportStore(createStorageContext({ kind: 'memory' }));
    expect(await store.read('run-missing')).toBeUndefined();
  });

  it('rejects a manifest that does not parse as a report', async () => {
    const context = createStorageContext({ kind: 'memory' });
    await context.storage.write('runs/run-bad/report.json', '{"runId":"run-bad"}');

    await expect(createReportStore(context).read('run-bad')).rejects.toMatchObject({ code: 'T004' });
  });

  it('wraps write failures as T001', async () => {
    const context = createStorageContext({ kind: 'memory' });
    vi.spyOn(context.storage, 'write').mockRejectedValue(new Error('quota exceeded'));

    await expect(createReportStore(context).write(sampleReport())).rejects.toMatchObject({
      code: 'T001',
      message: 'Failed to write the report for run run-1234: quota exceeded',
    });
  });
});

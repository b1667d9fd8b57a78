import { describe, expect, it, vi } from 'vitest';
import { createRunLogSink } from './run-log.js';
import { createStorageContext } from './storage.js';

describe('createRunLogSink', () => {
  it('writes prompts as text and responses as JSON', async () => {
    const context = createStorageContext({ kind: 'memory' });
    const sink = createRunLogSink(context);

    await sink.record('run-1', 'describe', { kind: 'prompt', text: 'Describe the fox.' });
    await sink.record('run-1', 'describe', { kind: 'response', value: { description: 'golden fox' } });

    expect(await context.storage.readToString('runs/run-1/describe-prompt.txt')).toBe('Describe the fox.');
    expect(JSON.parse(await context.storage.readToString('runs/run-1/describe-response.json'))).toEqual({
      description: 'golden fox',
    });
  });

  it('replaces the files of an earlier invocation', async () => {
    const context = createStorageContext({ kind: 'memory' });
    const sink = createRunLogSink(context);

    await sink.record('run-1', 'keyframe-2', { kind: 'prompt', text: 'first' });
    await sink.record('run-1', 'keyframe-2', { kind: 'prompt', text: 'second' });

    expect(await context.storage.readToString('runs/run-1/keyframe-2-prompt.txt')).toBe('second');
  });

  it('raises T001 when the write fails', async () => {
    const context = createStorageContext({ kind: 'memory' });
    vi.spyOn(context.storage, 'write').mockRejectedValue(new Error('read-only'));

    await expect(
      createRunLogSink(context).record('run-1', 'ingest', { kind: 'prompt', text: 'x' }),
    ).rejects.toMatchObject({ code: 'T001', message: 'Failed to write run log ingest-prompt.txt: read-only' });
  });
});

import { describe, expect, it } from 'vitest';
import { resolvePipelineConfig } from '@keyreel/core';
import { createServiceClients, resolveProviderMode } from './registry.js';

describe('createServiceClients', () => {
  it('defaults to deterministic mock clients', async () => {
    const config = resolvePipelineConfig({});
    const clients = createServiceClients(config);

    expect(resolveProviderMode(config)).toBe('mock');
    const first = await clients.reasoning.draftStoryboard({
      prompt: 'fox',
      description: 'fox',
      styleBible: 'gold',
      targetDurationSec: 12,
      segmentCount: 2,
      maxSegmentDurationSec: 8,
      feedback: [],
    });
    const second = await clients.reasoning.draftStoryboard({
      prompt: 'fox',
      description: 'fox',
      styleBible: 'gold',
      targetDurationSec: 12,
      segmentCount: 2,
      maxSegmentDurationSec: 8,
      feedback: [],
    });
    expect(second).toEqual(first);
  });

  it('applies overrides over the selected clients', async () => {
    const clients = createServiceClients(resolvePipelineConfig({}), {
      overrides: {
        styleBible: {
          async write() {
            return 'fixed bible';
          },
        },
      },
    });
    await expect(clients.styleBible.write({ description: 'fox', prompt: 'dusk' })).resolves.toBe('fixed bible');
  });

  it('requires credentials in live mode', () => {
    const config = resolvePipelineConfig({ KEYREEL_ENABLE_MOCKS: '0' });
    expect(() => createServiceClients(config)).toThrowError(expect.objectContaining({ code: 'S003' }));
  });

  it('builds live clients once every credential is present', () => {
    const config = resolvePipelineConfig({
      KEYREEL_ENABLE_MOCKS: 'false',
      PERCEPTION_API_KEY: 'test-secret',
      REASONING_API_KEY: 'test-secret',
      FAL_KEY: 'test-secret',
    });
    expect(resolveProviderMode(config)).toBe('live');
    const clients = createServiceClients(config);
    expect(Object.keys(clients).sort()).toEqual(['assembler', 'image', 'perception', 'reasoning', 'styleBible', 'video']);
  });
});

import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { ArtifactRef, FalSettings, Segment } from '@keyreel/core';
import type { FalClientManager } from './client.js';

const mocks = vi.hoisted(() => ({ falSubscribe: vi.fn(), draftFromUrls: vi.fn() }));

vi.mock('./subscribe.js', () => ({ falSubscribe: mocks.falSubscribe }));
vi.mock('../unified/artefacts.js', () => ({ draftFromUrls: mocks.draftFromUrls }));

import { clipDurationFor, createFalImageClient, createFalVideoClient } from './media.js';

const settings: FalSettings = {
  apiKey: 'test-secret',
  styleModel: 'style-model',
  keyframeModel: 'keyframe-model',
  videoModel: 'video-model',
};

function ref(id: string): ArtifactRef {
  return {
    artifact: {
      id,
      kind: 'image',
      size: 1,
      mimeType: 'image/png',
      extension: 'png',
      location: `/tmp/${id}.png`,
      createdAt: '2026-01-01T00:00:00.000Z',
    },
    path: `/tmp/${id}.png`,
  };
}

function fakeManager(): FalClientManager {
  return {
    ensure: vi.fn(),
    upload: vi.fn(async (item: ArtifactRef) => `https://upload.example.test/${item.artifact.id}`),
  };
}

const segment: Segment = {
  index: 2,
  durationSec: 7,
  style: 'storybook',
  shot: 'leap',
  camera: 'wide',
  story: 'beat',
  propsBackground: ['meadow'],
  endAnchor: { pose: 'sitting', facing: 'camera', expression: 'calm' },
  consistencyFlags: [],
};

describe('fal media clients', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.falSubscribe.mockResolvedValue({ output: { video: { url: 'https://cdn.example.test/v.mp4' } }, requestId: 'r' });
    mocks.draftFromUrls.mockResolvedValue({ data: Buffer.from('media'), mimeType: 'video/mp4', kind: 'video' });
  });

  it('picks the shortest clip length that covers the segment', () => {
    expect(clipDurationFor(4)).toBe('5');
    expect(clipDurationFor(5)).toBe('5');
    expect(clipDurationFor(7.5)).toBe('10');
    expect(clipDurationFor(12)).toBe('10');
  });

  it('chains keyframes from the style reference and the previous keyframe', async () => {
    const client = createFalImageClient({ manager: fakeManager(), settings });

    await client.generateKeyframe({ index: 3, prompt: 'kf', styleReference: ref('style'), previous: ref('k2') });

    expect(mocks.falSubscribe).toHaveBeenCalledWith(
      'keyframe-model',
      { prompt: 'kf', image_urls: ['https://upload.example.test/style', 'https://upload.example.test/k2'] },
      expect.objectContaining({ label: 'keyframe-3' }),
    );
  });

  it('sends a single reference as image_url', async () => {
    const client = createFalImageClient({ manager: fakeManager(), settings });

    await client.generateStyleReference({ prompt: 'sheet', references: [ref('a')] });

    expect(mocks.falSubscribe).toHaveBeenCalledWith(
      'style-model',
      { prompt: 'sheet', image_url: 'https://upload.example.test/a' },
      expect.objectContaining({ label: 'style-reference' }),
    );
  });

  it('animates between the two boundary keyframes', async () => {
    const client = createFalVideoClient({ manager: fakeManager(), settings });

    const draft = await client.generateSegment({
      segment,
      prompt: 'leap',
      firstFrame: ref('k2'),
      lastFrame: ref('k3'),
      fps: 24,
      feedback: [],
    });

    expect(mocks.falSubscribe).toHaveBeenCalledWith(
      'video-model',
      {
        prompt: 'leap',
        image_url: 'https://upload.example.test/k2',
        tail_image_url: 'https://upload.example.test/k3',
        duration: '10',
      },
      expect.objectContaining({ label: 'video-2' }),
    );
    expect(mocks.draftFromUrls).toHaveBeenCalledWith(['https://cdn.example.test/v.mp4'], {
      kind: 'video',
      fallbackMimeType: 'video/mp4',
      signal: undefined,
    });
    expect(draft.mimeType).toBe('video/mp4');
  });
});

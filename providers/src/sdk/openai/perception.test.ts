import { describe, expect, it, vi } from 'vitest';
import type { ArtifactRef, Segment } from '@keyreel/core';
import type { ChatClient, ChatRequest } from './client.js';

vi.mock('../unified/artefacts.js', () => ({
  readArtifactBytes: vi.fn(async (ref: ArtifactRef) => Buffer.from(`bytes of ${ref.artifact.id}`)),
}));

import { createChatPerceptionClient } from './perception.js';
import { createChatReasoningClient } from './reasoning.js';

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

function fakeChat(reply: string): ChatClient & { requests: ChatRequest[] } {
  const requests: ChatRequest[] = [];
  return {
    model: 'test-model',
    requests,
    async complete(request) {
      requests.push(request);
      return reply;
    },
  };
}

const segment: Segment = {
  index: 1,
  durationSec: 6,
  style: 'storybook',
  shot: 'walk',
  camera: 'wide',
  story: 'start',
  propsBackground: ['meadow'],
  endAnchor: { pose: 'sitting', facing: 'camera', expression: 'calm' },
  consistencyFlags: [],
};

describe('createChatPerceptionClient', () => {
  it('sends every reference image before the prompt text', async () => {
    const chat = fakeChat('  A golden fox.  ');
    const description = await createChatPerceptionClient(chat).describe({
      prompt: 'Describe it.',
      references: [ref('a'), ref('b')],
    });

    expect(description).toBe('A golden fox.');
    expect(chat.requests[0]?.prompt).toEqual([
      {
        role: 'user',
        content: [
          { type: 'image', image: Buffer.from('bytes of a'), mediaType: 'image/png' },
          { type: 'image', image: Buffer.from('bytes of b'), mediaType: 'image/png' },
          { type: 'text', text: 'Describe it.' },
        ],
      },
    ]);
  });

  it('reviews the candidate next to the previous keyframe', async () => {
    const chat = fakeChat('{"accepted": false, "feedback": "wrong pose"}');
    const review = await createChatPerceptionClient(chat).reviewKeyframe({
      index: 2,
      candidate: ref('k2'),
      previous: ref('k1'),
      anchor: segment.endAnchor,
      lockedFlags: ['scarf visible'],
      segment,
    });

    expect(review).toEqual({ accepted: false, feedback: 'wrong pose' });
    const prompt = chat.requests[0]?.prompt;
    const [message] = Array.isArray(prompt) ? prompt : [];
    expect(message?.role).toBe('user');
    expect(Array.isArray(message?.content) ? message.content.length : 0).toBe(3);
  });
});

describe('createChatReasoningClient', () => {
  it('returns the raw storyboard text', async () => {
    const chat = fakeChat('[{"id": 1}]');
    const raw = await createChatReasoningClient(chat).draftStoryboard({
      prompt: 'fox',
      description: 'fox',
      styleBible: 'gold',
      targetDurationSec: 6,
      segmentCount: 1,
      maxSegmentDurationSec: 8,
      feedback: [],
    });
    expect(raw).toBe('[{"id": 1}]');
  });
});

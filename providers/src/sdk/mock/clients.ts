import type {
  ArtifactDraft,
  ImageClient,
  KeyframeRequest,
  MediaAssembler,
  PerceptionClient,
  ReasoningClient,
  StyleReferenceRequest,
  VideoClient,
} from '@keyreel/core';
import { colorFromText, generateMockPng } from '../unified/png-generator.js';
import { mockStoryboard } from './storyboard.js';

const MOCK_IMAGE_WIDTH = 16;
const MOCK_IMAGE_HEIGHT = 9;

export function createMockPerceptionClient(): PerceptionClient {
  return {
    async describe({ prompt, references }) {
      const intent = prompt.split('\n')[0]?.trim() ?? '';
      return [
        `A compact, fluffy companion seen in ${references.length} reference image(s).`,
        'Main colours: warm gold #E8B04B and cream white #F6EBD9, with starlight blue #7FA7E0 accents.',
        'Markings: pale blaze on the chest, darker tips on the ears and tail.',
        'Always wears a knitted red scarf.',
        'Typical expressions: curious head tilt, bright open smile.',
        `Intent: ${intent}`,
      ].join('\n');
    },
    async reviewKeyframe() {
      return { accepted: true };
    },
  };
}

export function createMockReasoningClient(): ReasoningClient {
  return {
    async draftStoryboard({ signal: _signal, ...request }) {
      return mockStoryboard(request);
    },
  };
}

/**
 * Images are small solid PNGs whose colour and text chunks come from the
 * prompt, so a reworked prompt always yields a new artifact.
 */
export function createMockImageClient(): ImageClient {
  return {
    async generateStyleReference(request: StyleReferenceRequest) {
      return mockImage(request.prompt, {
        Kind: 'style-reference',
        References: request.references.map((ref) => ref.artifact.id).join(','),
      });
    },
    async generateKeyframe(request: KeyframeRequest) {
      return mockImage(request.prompt, {
        Kind: 'keyframe',
        Index: String(request.index),
        StyleReference: request.styleReference.artifact.id,
        Previous: request.previous?.artifact.id ?? 'none',
      });
    },
  };
}

function mockImage(prompt: string, text: Record<string, string>): ArtifactDraft {
  return {
    data: generateMockPng({
      width: MOCK_IMAGE_WIDTH,
      height: MOCK_IMAGE_HEIGHT,
      color: colorFromText(prompt),
      text: { ...text, Prompt: prompt },
    }),
    mimeType: 'image/png',
    kind: 'image',
    width: MOCK_IMAGE_WIDTH,
    height: MOCK_IMAGE_HEIGHT,
  };
}

/**
 * Video segments are text payloads naming both boundary frames, which the
 * video gate can inspect.
 */
export function createMockVideoClient(): VideoClient {
  return {
    async generateSegment({ segment, fps, firstFrame, lastFrame, prompt }) {
      const content = [
        `[video segment ${segment.index}]`,
        `fps: ${fps}`,
        `duration: ${segment.durationSec}s`,
        `first frame: ${firstFrame.artifact.id}`,
        `last frame: ${lastFrame.artifact.id}`,
        prompt,
      ].join('\n');
      return { data: content, mimeType: 'text/plain', kind: 'video' };
    },
  };
}

export function createMockAssembler(): MediaAssembler {
  return {
    async assemble({ segments, fps }) {
      const content = [
        `[final video]`,
        `fps: ${fps}`,
        ...segments.map((ref, position) => `segment ${position + 1}: ${ref.artifact.id}`),
      ].join('\n\n');
      return { data: content, mimeType: 'text/plain', kind: 'video' };
    },
  };
}

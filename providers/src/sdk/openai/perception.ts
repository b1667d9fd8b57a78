import type { ImagePart, ModelMessage } from 'ai';
import type { ArtifactRef, PerceptionClient } from '@keyreel/core';
import { readArtifactBytes } from '../unified/artefacts.js';
import type { ChatClient } from './client.js';
import { DESCRIBE_SYSTEM_PROMPT, REVIEW_SYSTEM_PROMPT, composeReviewPrompt, parseReview } from './prompts.js';

/**
 * Vision client over a chat endpoint that accepts image parts.
 */
export function createChatPerceptionClient(chat: ChatClient): PerceptionClient {
  return {
    async describe({ prompt, references, signal }) {
      const images = await Promise.all(references.map(toImagePart));
      return (await chat.complete({ system: DESCRIBE_SYSTEM_PROMPT, prompt: userMessage(prompt, images), signal })).trim();
    },

    async reviewKeyframe({ index, candidate, previous, anchor, lockedFlags, signal }) {
      const images = await Promise.all([candidate, ...(previous ? [previous] : [])].map(toImagePart));
      const text = composeReviewPrompt({ index, hasPrevious: previous !== undefined, anchor, lockedFlags });
      const reply = await chat.complete({ system: REVIEW_SYSTEM_PROMPT, prompt: userMessage(text, images), signal });
      return parseReview(reply);
    },
  };
}

function userMessage(text: string, images: ImagePart[]): ModelMessage[] {
  return [{ role: 'user', content: [...images, { type: 'text', text }] }];
}

async function toImagePart(ref: ArtifactRef): Promise<ImagePart> {
  return { type: 'image', image: await readArtifactBytes(ref), mediaType: ref.artifact.mimeType };
}

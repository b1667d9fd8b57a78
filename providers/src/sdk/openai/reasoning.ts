import type { ReasoningClient } from '@keyreel/core';
import type { ChatClient } from './client.js';
import { STORYBOARD_SYSTEM_PROMPT, composeStoryboardPrompt } from './prompts.js';

/**
 * Returns the model's raw text; the storyboard steps parse and validate it.
 */
export function createChatReasoningClient(chat: ChatClient): ReasoningClient {
  return {
    async draftStoryboard({ signal, ...request }) {
      return chat.complete({ system: STORYBOARD_SYSTEM_PROMPT, prompt: composeStoryboardPrompt(request), signal });
    },
  };
}

import { createOpenAI } from '@ai-sdk/openai';
import { generateText, type ModelMessage } from 'ai';
import {
  ServiceErrorCode,
  createServiceError,
  describeError,
  isPipelineError,
  type ChatEndpointSettings,
  type Logger,
} from '@keyreel/core';

export interface ChatRequest {
  system?: string;
  /** Plain prompt, or full messages when images go along. */
  prompt: string | ModelMessage[];
  signal?: AbortSignal;
}

export interface ChatClient {
  readonly model: string;
  complete(request: ChatRequest): Promise<string>;
}

export interface ChatClientOptions {
  /** Names the endpoint in errors and log lines, e.g. "perception". */
  role: string;
  settings: ChatEndpointSettings;
  logger?: Partial<Logger>;
}

/**
 * Chat-completions client for an OpenAI-compatible endpoint.
 *
 * Credentials are checked up front; the provider itself is created on first
 * use.
 */
export function createChatClient(options: ChatClientOptions): ChatClient {
  const { role, settings, logger } = options;
  const apiKey = settings.apiKey;
  if (!apiKey) {
    throw createServiceError(ServiceErrorCode.MISSING_CREDENTIALS, `No API key configured for the ${role} endpoint.`, {
      suggestion: `Set ${role.toUpperCase()}_API_KEY or enable mocks with KEYREEL_ENABLE_MOCKS=1.`,
    });
  }

  let provider: ReturnType<typeof createOpenAI> | null = null;
  const ensure = (): ReturnType<typeof createOpenAI> => {
    if (!provider) {
      provider = createOpenAI({ apiKey, ...(settings.baseUrl ? { baseURL: settings.baseUrl } : {}) });
    }
    return provider;
  };

  return {
    model: settings.model,
    async complete(request) {
      const startedAt = Date.now();
      logger?.debug?.(`providers.${role}.request`, { model: settings.model });
      let text: string;
      try {
        const model = ensure().chat(settings.model);
        const generation =
          typeof request.prompt === 'string'
            ? await generateText({
                model,
                system: request.system,
                prompt: request.prompt,
                abortSignal: request.signal,
              })
            : await generateText({
                model,
                system: request.system,
                messages: request.prompt,
                abortSignal: request.signal,
              });
        text = generation.text;
      } catch (error) {
        if (isPipelineError(error)) {
          throw error;
        }
        throw createServiceError(
          ServiceErrorCode.REQUEST_FAILED,
          `The ${role} endpoint request failed: ${describeError(error)}`,
          { cause: error, context: `model ${settings.model}` },
        );
      }
      logger?.debug?.(`providers.${role}.response`, {
        model: settings.model,
        elapsedMs: Date.now() - startedAt,
        length: text.length,
      });
      if (text.trim().length === 0) {
        throw createServiceError(ServiceErrorCode.MALFORMED_RESPONSE, `The ${role} endpoint returned an empty response.`);
      }
      return text;
    },
  };
}

import type { Logger, PipelineConfig, ServiceClients } from '@keyreel/core';
import { createFfmpegAssembler } from './sdk/ffmpeg/assembler.js';
import { createFalClientManager } from './sdk/fal/client.js';
import { createFalImageClient, createFalVideoClient } from './sdk/fal/media.js';
import {
  createMockAssembler,
  createMockImageClient,
  createMockPerceptionClient,
  createMockReasoningClient,
  createMockVideoClient,
} from './sdk/mock/clients.js';
import { createChatClient } from './sdk/openai/client.js';
import { createChatPerceptionClient } from './sdk/openai/perception.js';
import { createChatReasoningClient } from './sdk/openai/reasoning.js';
import { createTemplateStyleBibleWriter } from './style-bible.js';

export type ProviderMode = 'mock' | 'live';

export interface CreateServiceClientsOptions {
  logger?: Partial<Logger>;
  /** Replaces individual clients, whatever the mode. */
  overrides?: Partial<ServiceClients>;
}

export function resolveProviderMode(config: Pick<PipelineConfig, 'enableMocks'>): ProviderMode {
  return config.enableMocks ? 'mock' : 'live';
}

/**
 * Builds every service client a run needs. Mock mode is deterministic and
 * offline; live mode fails fast with S003 when a credential is missing.
 */
export function createServiceClients(
  config: PipelineConfig,
  options: CreateServiceClientsOptions = {},
): ServiceClients {
  const { logger, overrides = {} } = options;
  const mode = resolveProviderMode(config);
  logger?.debug?.('providers.registry.mode', { mode });

  const clients = mode === 'mock' ? createMockClients() : createLiveClients(config, logger);
  return { ...clients, ...overrides };
}

function createMockClients(): ServiceClients {
  return {
    perception: createMockPerceptionClient(),
    reasoning: createMockReasoningClient(),
    styleBible: createTemplateStyleBibleWriter(),
    image: createMockImageClient(),
    video: createMockVideoClient(),
    assembler: createMockAssembler(),
  };
}

function createLiveClients(config: PipelineConfig, logger?: Partial<Logger>): ServiceClients {
  const { services } = config;
  const manager = createFalClientManager(services.fal.apiKey, logger);
  return {
    perception: createChatPerceptionClient(
      createChatClient({ role: 'perception', settings: services.perception, logger }),
    ),
    reasoning: createChatReasoningClient(createChatClient({ role: 'reasoning', settings: services.reasoning, logger })),
    styleBible: createTemplateStyleBibleWriter(),
    image: createFalImageClient({ manager, settings: services.fal, logger }),
    video: createFalVideoClient({ manager, settings: services.fal, logger }),
    assembler: createFfmpegAssembler({ ffmpegPath: services.ffmpegPath, logger }),
  };
}

export {
  createServiceClients,
  resolveProviderMode,
  type CreateServiceClientsOptions,
  type ProviderMode,
} from './registry.js';
export { createTemplateStyleBibleWriter, renderStyleBible } from './style-bible.js';
export {
  createMockAssembler,
  createMockImageClient,
  createMockPerceptionClient,
  createMockReasoningClient,
  createMockVideoClient,
} from './sdk/mock/clients.js';
export { mockStoryboard, MOCK_CONSISTENCY_FLAGS } from './sdk/mock/storyboard.js';
export { createChatClient, type ChatClient, type ChatClientOptions, type ChatRequest } from './sdk/openai/client.js';
export { createChatPerceptionClient } from './sdk/openai/perception.js';
export { createChatReasoningClient } from './sdk/openai/reasoning.js';
export { createFalClientManager, type FalClientManager } from './sdk/fal/client.js';
export { createFalImageClient, createFalVideoClient, clipDurationFor } from './sdk/fal/media.js';
export { normalizeFalOutput } from './sdk/fal/output.js';
export { falSubscribe, type FalSubscribeOptions, type FalSubscribeResult } from './sdk/fal/subscribe.js';
export { createFfmpegAssembler, buildAssembleArgs, buildConcatList, type FfmpegAssemblerOptions } from './sdk/ffmpeg/assembler.js';
export { generateMockPng, colorFromText, readPngText, type MockPngOptions, type RgbColor } from './sdk/unified/png-generator.js';
export { downloadBinary, draftFromUrls, mimeTypeFromUrl, readArtifactBytes } from './sdk/unified/artefacts.js';

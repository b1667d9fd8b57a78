import { beforeEach, describe, expect, it, vi } from 'vitest';

const mocks = vi.hoisted(() => ({
  generateText: vi.fn(),
  chat: vi.fn((model: string) => ({ modelId: model })),
  createOpenAI: vi.fn(),
}));

vi.mock('ai', () => ({ generateText: mocks.generateText }));
vi.mock('@ai-sdk/openai', () => ({ createOpenAI: mocks.createOpenAI }));

import { createChatClient } from './client.js';

const settings = { apiKey: 'test-secret', baseUrl: 'https://llm.example.test/v1', model: 'test-model' };

describe('createChatClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.createOpenAI.mockReturnValue({ chat: mocks.chat });
  });

  it('raises S003 without an API key', () => {
    expect(() => createChatClient({ role: 'reasoning', settings: { model: 'test-model' } })).toThrowError(
      expect.objectContaining({ code: 'S003', message: 'No API key configured for the reasoning endpoint.' }),
    );
  });

  it('creates the provider once and sends the prompt to the chat model', async () => {
    mocks.generateText.mockResolvedValue({ text: 'a fox' });
    const client = createChatClient({ role: 'perception', settings });

    await expect(client.complete({ system: 'sys', prompt: 'describe' })).resolves.toBe('a fox');
    await client.complete({ prompt: 'again' });

    expect(mocks.createOpenAI).toHaveBeenCalledTimes(1);
    expect(mocks.createOpenAI).toHaveBeenCalledWith({ apiKey: 'test-secret', baseURL: 'https://llm.example.test/v1' });
    expect(mocks.chat).toHaveBeenCalledWith('test-model');
    expect(mocks.generateText).toHaveBeenNthCalledWith(1, {
      model: { modelId: 'test-model' },
      system: 'sys',
      prompt: 'describe',
      abortSignal: undefined,
    });
  });

  it('passes message lists through as messages', async () => {
    mocks.generateText.mockResolvedValue({ text: 'ok' });
    const messages = [{ role: 'user' as const, content: 'hello' }];

    await createChatClient({ role: 'perception', settings }).complete({ prompt: messages });

    expect(mocks.generateText).toHaveBeenCalledWith(expect.objectContaining({ messages }));
  });

  it('wraps request failures as S001', async () => {
    mocks.generateText.mockRejectedValue(new Error('503 upstream'));
    const client = createChatClient({ role: 'reasoning', settings });

    await expect(client.complete({ prompt: 'plan' })).rejects.toMatchObject({
      code: 'S001',
      message: 'The reasoning endpoint request failed: 503 upstream',
      context: 'model test-model',
    });
  });

  it('raises S002 for an empty reply', async () => {
    mocks.generateText.mockResolvedValue({ text: '  ' });
    await expect(createChatClient({ role: 'reasoning', settings }).complete({ prompt: 'plan' })).rejects.toMatchObject({
      code: 'S002',
    });
  });
});

import { describe, expect, it } from 'vitest';
import { createTemplateStyleBibleWriter } from './style-bible.js';

describe('createTemplateStyleBibleWriter', () => {
  it('closes the brief with the description and the intent', async () => {
    const text = await createTemplateStyleBibleWriter().write({
      description: '  A small golden fox. ',
      prompt: 'fireflies at dusk',
    });
    const lines = text.split('\n');

    expect(lines).toHaveLength(7);
    expect(lines[5]).toBe('Description: A small golden fox.');
    expect(lines[6]).toBe('Intent: fireflies at dusk');
  });

  it('falls back to a default intent for a blank prompt', async () => {
    const text = await createTemplateStyleBibleWriter().write({ description: 'fox', prompt: '   ' });
    expect(text.split('\n')[6]).toBe('Intent: A short fantasy clip starring the subject');
  });
});

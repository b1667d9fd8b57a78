import type { StyleBibleRequest, StyleBibleWriter } from '@keyreel/core';

const DEFAULT_INTENT = 'A short fantasy clip starring the subject';

/**
 * Writes the style bible from a fixed brief. Only the description and the
 * user's intent vary between runs.
 */
export function createTemplateStyleBibleWriter(): StyleBibleWriter {
  return {
    async write(request: StyleBibleRequest): Promise<string> {
      return renderStyleBible(request);
    },
  };
}

export function renderStyleBible({ description, prompt }: Pick<StyleBibleRequest, 'description' | 'prompt'>): string {
  return [
    'Character and temperament: a lively, curious companion that always wears its knitted scarf, with clear and bright eyes.',
    'Colour and light: warm gold and cream white dominate, with starlight blue highlights and soft backlight.',
    'Rendering and camera: smooth cel shading over clean line art, favouring dolly-in moves and gentle pans.',
    'Sets and props: floating stone steps, a mirror lake and stardust plants recur; the scarf and an energy orb are the main props.',
    'Avoid: modern city elements, heavy mechanical armour, realistic gore.',
    `Description: ${description.trim()}`,
    `Intent: ${prompt.trim() || DEFAULT_INTENT}`,
  ].join('\n');
}

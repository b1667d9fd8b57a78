import { describe, expect, it } from 'vitest';
import { normalizeFalOutput } from './output.js';

describe('normalizeFalOutput', () => {
  it('reads video, image lists and single images', () => {
    expect(normalizeFalOutput({ video: { url: 'https://a.test/v.mp4' } })).toEqual(['https://a.test/v.mp4']);
    expect(normalizeFalOutput({ images: [{ url: 'https://a.test/1.png' }, { url: '' }, {}] })).toEqual([
      'https://a.test/1.png',
    ]);
    expect(normalizeFalOutput({ image: { url: 'https://a.test/2.png' } })).toEqual(['https://a.test/2.png']);
  });

  it('unwraps a data envelope', () => {
    expect(normalizeFalOutput({ data: { video: { url: 'https://a.test/v.mp4' } } })).toEqual(['https://a.test/v.mp4']);
  });

  it('returns nothing for other values', () => {
    expect(normalizeFalOutput(null)).toEqual([]);
    expect(normalizeFalOutput('https://a.test/v.mp4')).toEqual([]);
  });
});

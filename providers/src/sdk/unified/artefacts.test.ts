import { afterEach, describe, expect, it, vi } from 'vitest';
import { downloadBinary, draftFromUrls, mimeTypeFromUrl, readArtifactBytes } from './artefacts.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('mimeTypeFromUrl', () => {
  it('maps known extensions and ignores query strings', () => {
    expect(mimeTypeFromUrl('https://cdn.example.test/out/clip.MP4?sig=1')).toBe('video/mp4');
    expect(mimeTypeFromUrl('https://cdn.example.test/frame.jpeg')).toBe('image/jpeg');
    expect(mimeTypeFromUrl('https://cdn.example.test/blob')).toBeUndefined();
    expect(mimeTypeFromUrl('not a url')).toBeUndefined();
  });
});

describe('downloadBinary', () => {
  it('returns the response body', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('png-bytes')));
    await expect(downloadBinary('https://cdn.example.test/a.png')).resolves.toEqual(Buffer.from('png-bytes'));
  });

  it('raises S001 for an error status', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('gone', { status: 404 })));
    await expect(downloadBinary('https://cdn.example.test/a.png')).rejects.toMatchObject({
      code: 'S001',
      message: 'Failed to download https://cdn.example.test/a.png (404)',
    });
  });

  it('raises S001 when the request itself fails', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new Error('socket hang up');
    }));
    await expect(downloadBinary('https://cdn.example.test/a.png')).rejects.toMatchObject({
      code: 'S001',
      message: 'Failed to download https://cdn.example.test/a.png: socket hang up',
    });
  });
});

describe('draftFromUrls', () => {
  it('downloads the first URL and infers its type', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('clip')));
    const draft = await draftFromUrls(['https://cdn.example.test/v.webm', 'https://cdn.example.test/w.mp4'], {
      kind: 'video',
      fallbackMimeType: 'video/mp4',
    });
    expect(draft).toEqual({ data: Buffer.from('clip'), kind: 'video', mimeType: 'video/webm' });
  });

  it('raises S002 when the provider returned no URL', async () => {
    await expect(draftFromUrls([], { kind: 'image', fallbackMimeType: 'image/png' })).rejects.toMatchObject({
      code: 'S002',
      message: 'Provider returned no image URL.',
    });
  });
});

describe('readArtifactBytes', () => {
  it('raises S001 for a missing file', async () => {
    const ref = {
      artifact: {
        id: 'abc',
        kind: 'image' as const,
        size: 1,
        mimeType: 'image/png',
        extension: 'png',
        location: '/nonexistent/keyreel/abc.png',
        createdAt: '2026-01-01T00:00:00.000Z',
      },
      path: '/nonexistent/keyreel/abc.png',
    };
    await expect(readArtifactBytes(ref)).rejects.toMatchObject({ code: 'S001' });
  });
});

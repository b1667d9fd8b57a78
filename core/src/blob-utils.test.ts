import { describe, expect, it } from 'vitest';
import { Buffer } from 'node:buffer';
import {
  blobSegments,
  inferBlobExtension,
  inferMimeType,
  metadataSegments,
  readImageDimensions,
  toBuffer,
} from './blob-utils.js';

describe('inferBlobExtension', () => {
  it('maps known mime types', () => {
    expect(inferBlobExtension('video/mp4')).toBe('mp4');
    expect(inferBlobExtension('image/jpeg')).toBe('jpg');
    expect(inferBlobExtension('IMAGE/PNG')).toBe('png');
    expect(inferBlobExtension('text/plain')).toBe('txt');
  });

  it('falls back to the subtype for unknown media types', () => {
    expect(inferBlobExtension('video/x-flv')).toBe('x-flv');
    expect(inferBlobExtension('image/bmp')).toBe('bmp');
  });

  it('uses bin for anything else', () => {
    expect(inferBlobExtension()).toBe('bin');
    expect(inferBlobExtension('application/x-unknown')).toBe('bin');
  });
});

describe('inferMimeType', () => {
  it('accepts extensions with or without a dot', () => {
    expect(inferMimeType('.PNG')).toBe('image/png');
    expect(inferMimeType('mov')).toBe('video/quicktime');
    expect(inferMimeType('xyz')).toBe('application/octet-stream');
  });
});

describe('blob paths', () => {
  it('shards by the first two characters of the id', () => {
    expect(blobSegments('abcdef', 'png')).toEqual(['blobs', 'ab', 'abcdef.png']);
    expect(metadataSegments('abcdef')).toEqual(['blobs', 'ab', 'abcdef.json']);
  });
});

describe('toBuffer', () => {
  it('converts strings and byte arrays', () => {
    expect(toBuffer('hi').toString('utf8')).toBe('hi');
    expect(toBuffer(new Uint8Array([1, 2])).equals(Buffer.from([1, 2]))).toBe(true);
  });
});

describe('readImageDimensions', () => {
  it('reads width and height from a PNG header', () => {
    const header = Buffer.alloc(24);
    Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]).copy(header, 0);
    header.writeUInt32BE(13, 8);
    header.write('IHDR', 12, 'ascii');
    header.writeUInt32BE(640, 16);
    header.writeUInt32BE(360, 20);

    expect(readImageDimensions(header)).toEqual({ width: 640, height: 360 });
  });

  it('returns null for other payloads', () => {
    expect(readImageDimensions(Buffer.from('not an image at all, just text'))).toBeNull();
  });
});

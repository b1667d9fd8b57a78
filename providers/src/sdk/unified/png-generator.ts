import { createHash } from 'node:crypto';
import { deflateSync } from 'node:zlib';

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

export interface MockPngOptions {
  width?: number;
  height?: number;
  color?: RgbColor;
  /** Written as tEXt chunks, so distinct prompts give distinct bytes. */
  text?: Record<string, string>;
}

/**
 * Generates a solid-colour PNG for mock mode.
 * Layout: 8-byte signature + IHDR + optional tEXt chunks + IDAT + IEND.
 */
export function generateMockPng(options: MockPngOptions = {}): Buffer {
  const width = options.width ?? 1;
  const height = options.height ?? 1;
  const color = options.color ?? { r: 128, g: 128, b: 128 };

  const signature = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

  const ihdrData = Buffer.alloc(13);
  ihdrData.writeUInt32BE(width, 0);
  ihdrData.writeUInt32BE(height, 4);
  ihdrData.writeUInt8(8, 8); // bit depth
  ihdrData.writeUInt8(2, 9); // RGB
  ihdrData.writeUInt8(0, 10);
  ihdrData.writeUInt8(0, 11);
  ihdrData.writeUInt8(0, 12);

  // Each row: filter byte (0 = none) + RGB pixels
  const rowSize = 1 + width * 3;
  const rawData = Buffer.alloc(rowSize * height);
  for (let y = 0; y < height; y++) {
    const rowOffset = y * rowSize;
    rawData[rowOffset] = 0;
    for (let x = 0; x < width; x++) {
      const pixelOffset = rowOffset + 1 + x * 3;
      rawData[pixelOffset] = color.r;
      rawData[pixelOffset + 1] = color.g;
      rawData[pixelOffset + 2] = color.b;
    }
  }

  const textChunks = Object.entries(options.text ?? {}).map(([keyword, value]) =>
    createPngChunk('tEXt', Buffer.concat([Buffer.from(keyword, 'latin1'), Buffer.from([0]), Buffer.from(value, 'utf8')])),
  );

  return Buffer.concat([
    signature,
    createPngChunk('IHDR', ihdrData),
    ...textChunks,
    createPngChunk('IDAT', deflateSync(rawData, { level: 0 })),
    createPngChunk('IEND', Buffer.alloc(0)),
  ]);
}

/**
 * Stable colour for a piece of text, taken from the first bytes of its SHA-256.
 */
export function colorFromText(text: string): RgbColor {
  const digest = createHash('sha256').update(text).digest();
  return { r: digest[0] ?? 0, g: digest[1] ?? 0, b: digest[2] ?? 0 };
}

/**
 * Reads the tEXt chunks of a PNG. Returns an empty record for anything that
 * is not a PNG.
 */
export function readPngText(buffer: Uint8Array): Record<string, string> {
  const data = Buffer.from(buffer);
  const result: Record<string, string> = {};
  if (data.length < 8 || data.toString('ascii', 1, 4) !== 'PNG') {
    return result;
  }
  let offset = 8;
  while (offset + 8 <= data.length) {
    const length = data.readUInt32BE(offset);
    const type = data.toString('ascii', offset + 4, offset + 8);
    const body = data.subarray(offset + 8, offset + 8 + length);
    if (type === 'tEXt') {
      const separator = body.indexOf(0);
      if (separator > 0) {
        result[body.toString('latin1', 0, separator)] = body.toString('utf8', separator + 1);
      }
    }
    if (type === 'IEND') {
      break;
    }
    offset += 12 + length;
  }
  return result;
}

/**
 * Chunk format: length (4 bytes) + type (4 bytes) + data + CRC (4 bytes)
 */
function createPngChunk(type: string, data: Buffer): Buffer {
  const length = Buffer.alloc(4);
  length.writeUInt32BE(data.length, 0);

  const typeAndData = Buffer.concat([Buffer.from(type, 'ascii'), data]);
  const crcBuffer = Buffer.alloc(4);
  crcBuffer.writeUInt32BE(crc32(typeAndData) >>> 0, 0);

  return Buffer.concat([length, typeAndData, crcBuffer]);
}

/**
 * CRC32 with the IEEE 802.3 polynomial 0xEDB88320.
 */
function crc32(data: Buffer): number {
  let crc = 0xffffffff;
  for (let i = 0; i < data.length; i++) {
    crc ^= data[i] ?? 0;
    for (let j = 0; j < 8; j++) {
      crc = crc & 1 ? (crc >>> 1) ^ 0xedb88320 : crc >>> 1;
    }
  }
  return crc ^ 0xffffffff;
}

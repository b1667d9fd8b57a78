import { Buffer } from 'node:buffer';
import { spawn } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ServiceErrorCode,
  createServiceError,
  describeError,
  type AssembleRequest,
  type Logger,
  type MediaAssembler,
} from '@keyreel/core';

export interface FfmpegAssemblerOptions {
  ffmpegPath?: string;
  logger?: Partial<Logger>;
  /** Parent of the per-call scratch directory. Defaults to the OS temp dir. */
  workRoot?: string;
}

/**
 * Concatenates segment videos in order with ffmpeg's concat demuxer.
 * Streams are copied unless a size or bitrate is requested.
 */
export function createFfmpegAssembler(options: FfmpegAssemblerOptions = {}): MediaAssembler {
  const ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
  const logger = options.logger;

  return {
    async assemble(request) {
      const workDir = join(options.workRoot ?? tmpdir(), `keyreel-assemble-${randomUUID()}`);
      const listPath = join(workDir, 'segments.txt');
      const outputPath = join(workDir, 'final.mp4');

      try {
        await mkdir(workDir, { recursive: true });
        await writeFile(listPath, buildConcatList(request.segments.map((segment) => segment.path)), 'utf8');
        const args = buildAssembleArgs(listPath, outputPath, request);
        logger?.debug?.('providers.ffmpeg.assemble', { segments: request.segments.length, args });
        await runFfmpegCommand(ffmpegPath, args, request.signal);
        const data = Buffer.from(await readFile(outputPath));
        return {
          data,
          mimeType: 'video/mp4',
          kind: 'video',
          ...(request.width ? { width: request.width } : {}),
          ...(request.height ? { height: request.height } : {}),
        };
      } finally {
        await rm(workDir, { recursive: true, force: true }).catch((error: unknown) => {
          logger?.warn?.('providers.ffmpeg.cleanupFailed', { workDir, error: describeError(error) });
        });
      }
    },
  };
}

/**
 * Concat demuxer list. Single quotes in paths are closed, escaped and
 * reopened.
 */
export function buildConcatList(paths: string[]): string {
  return paths.map((path) => `file '${path.replace(/'/g, "'\\''")}'`).join('\n') + '\n';
}

export function buildAssembleArgs(listPath: string, outputPath: string, request: AssembleRequest): string[] {
  const args = ['-y', '-f', 'concat', '-safe', '0', '-i', listPath];
  const reencode = Boolean(request.width || request.height || request.bitrate);
  if (!reencode) {
    return [...args, '-c', 'copy', outputPath];
  }
  if (request.width || request.height) {
    args.push('-vf', `scale=${request.width ?? -2}:${request.height ?? -2}`);
  }
  args.push('-r', String(request.fps), '-c:v', 'libx264', '-pix_fmt', 'yuv420p');
  if (request.bitrate) {
    args.push('-b:v', request.bitrate);
  }
  args.push('-c:a', 'aac', outputPath);
  return args;
}

function runFfmpegCommand(ffmpegPath: string, args: string[], signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const errorChunks: Buffer[] = [];
    const ffmpeg = spawn(ffmpegPath, args, { signal });

    ffmpeg.stderr?.on('data', (chunk: Buffer) => {
      errorChunks.push(chunk);
    });

    ffmpeg.on('close', (code) => {
      if (code === 0) {
        resolve();
        return;
      }
      const stderr = Buffer.concat(errorChunks).toString('utf8').trim();
      reject(
        createServiceError(ServiceErrorCode.MEDIA_TOOL_FAILED, `ffmpeg exited with code ${code}: ${lastLine(stderr)}`),
      );
    });

    ffmpeg.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') {
        reject(
          createServiceError(ServiceErrorCode.MEDIA_TOOL_NOT_FOUND, `ffmpeg was not found at "${ffmpegPath}".`, {
            cause: error,
            suggestion: 'Install ffmpeg or point KEYREEL_FFMPEG_PATH at it.',
          }),
        );
        return;
      }
      reject(
        createServiceError(ServiceErrorCode.MEDIA_TOOL_FAILED, `Failed to spawn ffmpeg: ${error.message}`, {
          cause: error,
        }),
      );
    });
  });
}

function lastLine(text: string): string {
  const lines = text.split('\n');
  return lines[lines.length - 1] ?? '';
}

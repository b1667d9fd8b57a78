import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { inferMimeType } from '../blob-utils.js';
import {
  ConfigurationErrorCode,
  createConfigurationError,
  createServiceError,
  createStorageError,
  describeError,
  ServiceErrorCode,
  StorageErrorCode,
} from '../errors/index.js';
import { hashArtifactIds } from '../hashing.js';
import type { OutputSettings } from '../config.js';
import { prepareReferenceImage } from '../reference-image.js';
import type { ReportStore } from '../report.js';
import {
  reject,
  succeed,
  update,
  type AnyContextKey,
  type StepDefinition,
  type StepEnvironment,
} from '../steps/types.js';
import type { Artifact, Clock, GateVerdict, Segment } from '../types.js';
import {
  descriptionKey,
  finalVideoKey,
  keyframeCheckKey,
  keyframeKey,
  referencesKey,
  reportKey,
  segmentsKey,
  storyboardCheckKey,
  storyboardDraftKey,
  styleBibleKey,
  styleReferenceKey,
  videoCheckKey,
  videoKey,
} from './keys.js';
import {
  composeDescribePrompt,
  composeKeyframePrompt,
  composeStyleReferencePrompt,
  composeVideoPrompt,
} from './prompts.js';
import type { ArtifactRef, ServiceClients } from './services.js';
import {
  collectConsistencyFlags,
  extractStoryboard,
  planSegments,
  validateStoryboard,
} from './storyboard.js';

export interface PipelineStepOptions {
  /** Fixed when the graph is built; the storyboard gate enforces it. */
  segmentCount: number;
  services: ServiceClients;
  reports: ReportStore;
  /** Reads a user reference image. Defaults to the local filesystem. */
  readReference?: (path: string) => Promise<Uint8Array>;
  /** Resolution and bitrate of the assembled video. */
  output?: OutputSettings;
  /** Step timings recorded so far, copied into the report. */
  timings?: () => Record<string, number>;
  clock?: Clock;
}

const systemClock: Clock = { now: () => new Date().toISOString() };

/**
 * The video pipeline for `segmentCount` segments, in declaration order:
 * preparation, storyboard, the keyframe chain with its gates, the
 * per-segment videos with theirs, then assembly and the report.
 */
export function createPipelineSteps(options: PipelineStepOptions): StepDefinition[] {
  const count = options.segmentCount;
  if (!Number.isInteger(count) || count < 1) {
    throw createConfigurationError(
      ConfigurationErrorCode.INVALID_SETTING,
      `segmentCount must be a positive integer, got ${count}.`,
    );
  }
  const { services } = options;
  const readReference = options.readReference ?? ((path: string) => readFile(path));
  const clock = options.clock ?? systemClock;

  const steps: StepDefinition[] = [
    {
      id: 'ingest',
      kind: 'ingest',
      reads: [],
      writes: [referencesKey],
      retryable: false,
      async invoke(_view, env) {
        env.log.prompt(
          JSON.stringify(
            {
              prompt: env.run.prompt,
              targetDurationSec: env.run.targetDurationSec,
              fps: env.run.fps,
              referenceImages: env.run.referenceImages,
            },
            null,
            2,
          ),
        );
        const references: Artifact[] = [];
        for (const path of env.run.referenceImages) {
          const mimeType = inferMimeType(extname(path));
          if (!mimeType.startsWith('image/')) {
            throw createConfigurationError(
              ConfigurationErrorCode.INVALID_RUN_SEED,
              `Reference "${path}" is not a supported image.`,
              { suggestion: 'Use PNG, JPEG, WebP, AVIF or GIF reference images.' },
            );
          }
          let data: Uint8Array;
          try {
            data = await readReference(path);
          } catch (error) {
            throw createStorageError(
              StorageErrorCode.READ_FAILED,
              `Reference "${path}" could not be read: ${describeError(error)}`,
              { cause: error },
            );
          }
          const prepared = await prepareReferenceImage(data, mimeType, env.logger);
          references.push(await env.artifacts.put({ ...prepared, kind: 'image' }));
        }
        env.log.response({ references: references.map((artifact) => artifact.id) });
        return succeed([update(referencesKey, references)]);
      },
    },
    {
      id: 'describe',
      kind: 'describe',
      reads: [referencesKey],
      writes: [descriptionKey],
      retryable: true,
      async invoke(view, env) {
        const prompt = composeDescribePrompt(env.run.prompt);
        env.log.prompt(prompt);
        const references = await refsOf(env, view.get(referencesKey));
        const description = await services.perception.describe({ prompt, references, signal: env.signal });
        env.log.response({ description });
        return succeed([update(descriptionKey, requireText(description, 'Description'))]);
      },
    },
    {
      id: 'style-bible',
      kind: 'style-bible',
      reads: [descriptionKey],
      writes: [styleBibleKey],
      retryable: true,
      async invoke(view, env) {
        const description = view.get(descriptionKey);
        env.log.prompt(description);
        const styleBible = await services.styleBible.write({
          description,
          prompt: env.run.prompt,
          signal: env.signal,
        });
        env.log.response({ styleBible });
        return succeed([update(styleBibleKey, requireText(styleBible, 'Style bible'))]);
      },
    },
    {
      id: 'style-reference',
      kind: 'style-reference',
      reads: [referencesKey, descriptionKey, styleBibleKey],
      writes: [styleReferenceKey],
      retryable: true,
      async invoke(view, env) {
        const prompt = composeStyleReferencePrompt({
          prompt: env.run.prompt,
          description: view.get(descriptionKey),
          styleBible: view.get(styleBibleKey),
        });
        env.log.prompt(prompt);
        const references = await refsOf(env, view.get(referencesKey));
        const draft = await services.image.generateStyleReference({ prompt, references, signal: env.signal });
        env.log.response({ mimeType: draft.mimeType, kind: draft.kind });
        return succeed([update(styleReferenceKey, draft)]);
      },
    },
    {
      id: 'draft-storyboard',
      kind: 'draft-storyboard',
      reads: [descriptionKey, styleBibleKey],
      writes: [storyboardDraftKey],
      retryable: true,
      async invoke(view, env) {
        const request = {
          prompt: env.run.prompt,
          description: view.get(descriptionKey),
          styleBible: view.get(styleBibleKey),
          targetDurationSec: env.run.targetDurationSec,
          segmentCount: count,
          maxSegmentDurationSec: env.run.maxSegmentDurationSec,
          feedback: env.feedback,
        };
        env.log.prompt(JSON.stringify(request, null, 2));
        const raw = await services.reasoning.draftStoryboard({ ...request, signal: env.signal });
        env.log.response({ storyboard: raw });
        return succeed([update(storyboardDraftKey, extractStoryboard(raw))]);
      },
    },
    {
      id: 'validate-storyboard',
      kind: 'validate-storyboard',
      reads: [storyboardDraftKey],
      writes: [storyboardCheckKey],
      retryable: false,
      gate: { producer: 'draft-storyboard' },
      async invoke(view, env) {
        const draft = view.get(storyboardDraftKey);
        env.log.prompt('Validating storyboard against schema constraints.');
        const errors = validateStoryboard(draft, {
          segmentCount: count,
          maxSegmentDurationSec: env.run.maxSegmentDurationSec,
        });
        if (errors.length > 0) {
          env.log.response({ status: 'failed', errors });
          return reject(`Storyboard validation failed: ${errors.join('; ')}`);
        }
        env.log.response({ status: 'passed', segmentCount: draft.length });
        return succeed([update(storyboardCheckKey, verdict([`${draft.length} segment(s) accepted`]))]);
      },
    },
    {
      id: 'plan-segments',
      kind: 'plan-segments',
      reads: [storyboardDraftKey, storyboardCheckKey],
      writes: [segmentsKey],
      retryable: false,
      async invoke(view, env) {
        const segments = planSegments(view.get(storyboardDraftKey));
        const flags = collectConsistencyFlags(segments);
        env.log.response({ segments, consistencyFlags: flags });
        return succeed([update(segmentsKey, segments)], { lockFlags: flags });
      },
    },
  ];

  for (let k = 1; k <= count + 1; k += 1) {
    steps.push(keyframeStep(k), keyframeCheckStep(k));
  }
  for (let i = 1; i <= count; i += 1) {
    steps.push(videoStep(i), videoCheckStep(i));
  }
  steps.push(assembleStep(), reportStep());
  return steps;

  function keyframeStep(k: number): StepDefinition {
    const reads: AnyContextKey[] = [segmentsKey, descriptionKey, styleBibleKey, styleReferenceKey];
    if (k > 1) {
      reads.push(keyframeKey(k - 1), keyframeCheckKey(k - 1));
    }
    return {
      id: `keyframe-${k}`,
      kind: 'keyframe',
      reads,
      writes: [keyframeKey(k)],
      retryable: true,
      async invoke(view, env) {
        const segment = keyframeSegment(view.get(segmentsKey), k);
        const prompt = composeKeyframePrompt({
          index: k,
          segment,
          prompt: env.run.prompt,
          description: view.get(descriptionKey),
          styleBible: view.get(styleBibleKey),
          feedback: env.feedback,
        });
        env.log.prompt(prompt);
        const styleReference = await refOf(env, view.get(styleReferenceKey));
        const previous = k > 1 ? await refOf(env, view.get(keyframeKey(k - 1))) : undefined;
        const draft = await services.image.generateKeyframe({
          index: k,
          prompt,
          styleReference,
          ...(previous ? { previous } : {}),
          signal: env.signal,
        });
        env.log.response({ index: k, mimeType: draft.mimeType, previous: previous?.artifact.id });
        return succeed([update(keyframeKey(k), draft)]);
      },
    };
  }

  function keyframeCheckStep(k: number): StepDefinition {
    const reads: AnyContextKey[] = [segmentsKey, keyframeKey(k)];
    if (k > 1) {
      reads.push(keyframeKey(k - 1));
    }
    return {
      id: `check-keyframe-${k}`,
      kind: 'check-keyframe',
      reads,
      writes: [keyframeCheckKey(k)],
      retryable: true,
      gate: { producer: `keyframe-${k}` },
      async invoke(view, env) {
        const segment = keyframeSegment(view.get(segmentsKey), k);
        const candidate = await refOf(env, view.get(keyframeKey(k)));
        const previous = k > 1 ? await refOf(env, view.get(keyframeKey(k - 1))) : undefined;
        const lockedFlags = env.ledger.lockedFlags();
        const flags = env.ledger.checkFlags(segment.consistencyFlags);
        env.log.prompt(`Reviewing keyframe ${k} against segment ${segment.index}.`);

        const review = await services.perception.reviewKeyframe({
          index: k,
          candidate,
          ...(previous ? { previous, anchor: segment.endAnchor } : {}),
          lockedFlags,
          segment,
          signal: env.signal,
        });
        env.log.response({ review, flags });
        if (!review.accepted) {
          return reject(review.feedback ?? `Keyframe ${k} does not match its segment.`);
        }
        const notes = flags.missing.length > 0 ? [`segment does not restate: ${flags.missing.join(', ')}`] : [];
        return succeed([update(keyframeCheckKey(k), verdict(notes))]);
      },
    };
  }

  function videoStep(i: number): StepDefinition {
    return {
      id: `video-${i}`,
      kind: 'video',
      reads: [segmentsKey, keyframeKey(i), keyframeKey(i + 1), keyframeCheckKey(i), keyframeCheckKey(i + 1)],
      writes: [videoKey(i)],
      retryable: true,
      async invoke(view, env) {
        const segment = segmentAt(view.get(segmentsKey), i);
        const first = view.get(keyframeKey(i));
        const last = view.get(keyframeKey(i + 1));
        const prompt = composeVideoPrompt(segment, env.feedback);
        env.log.prompt(prompt);
        const draft = await services.video.generateSegment({
          segment,
          prompt,
          firstFrame: await refOf(env, first),
          lastFrame: await refOf(env, last),
          fps: env.run.fps,
          feedback: env.feedback,
          signal: env.signal,
        });
        env.log.response({ segment: i, mimeType: draft.mimeType, firstFrame: first.id, lastFrame: last.id });
        return succeed([update(videoKey(i), draft)], {
          bind: [
            { segment: i, position: 'start', artifactId: first.id },
            { segment: i, position: 'end', artifactId: last.id },
          ],
        });
      },
    };
  }

  function videoCheckStep(i: number): StepDefinition {
    return {
      id: `check-video-${i}`,
      kind: 'check-video',
      reads: [videoKey(i), keyframeKey(i), keyframeKey(i + 1)],
      writes: [videoCheckKey(i)],
      retryable: false,
      gate: { producer: `video-${i}` },
      async invoke(view, env) {
        const video = view.get(videoKey(i));
        const frames = [view.get(keyframeKey(i)).id, view.get(keyframeKey(i + 1)).id];
        env.log.prompt(`Verifying frame anchors of video segment ${i}.`);
        if (!video.mimeType.startsWith('text/')) {
          env.log.response({ segment: i, inspected: false });
          return succeed([update(videoCheckKey(i), verdict(['binary payload not inspected']))]);
        }
        const content = (await env.artifacts.read(video.id)).toString('utf8');
        const missing = frames.filter((id) => !content.includes(id));
        env.log.response({ segment: i, inspected: true, missing });
        if (missing.length > 0) {
          return reject(`Video segment ${i} does not start and end on its keyframes (missing ${missing.join(', ')}).`);
        }
        return succeed([update(videoCheckKey(i), verdict([]))]);
      },
    };
  }

  function assembleStep(): StepDefinition {
    const reads: AnyContextKey[] = [];
    for (let i = 1; i <= count; i += 1) {
      reads.push(videoKey(i), videoCheckKey(i));
    }
    return {
      id: 'assemble',
      kind: 'assemble',
      reads,
      writes: [finalVideoKey],
      retryable: true,
      exclusive: true,
      async invoke(view, env) {
        const videos: Artifact[] = [];
        for (let i = 1; i <= count; i += 1) {
          videos.push(view.get(videoKey(i)));
        }
        env.log.prompt(`Assembling ${count} segment(s) at ${env.run.fps} fps.`);
        const { width, height, bitrate } = options.output ?? {};
        const draft = await services.assembler.assemble({
          segments: await refsOf(env, videos),
          fps: env.run.fps,
          ...(width !== undefined ? { width } : {}),
          ...(height !== undefined ? { height } : {}),
          ...(bitrate !== undefined ? { bitrate } : {}),
          signal: env.signal,
        });
        env.log.response({ segments: videos.map((video) => video.id), mimeType: draft.mimeType });
        return succeed([update(finalVideoKey, draft)]);
      },
    };
  }

  function reportStep(): StepDefinition {
    const keyframes = Array.from({ length: count + 1 }, (_, k) => keyframeKey(k + 1));
    const videos = Array.from({ length: count }, (_, i) => videoKey(i + 1));
    return {
      id: 'report',
      kind: 'report',
      reads: [referencesKey, segmentsKey, finalVideoKey, ...keyframes, ...videos],
      writes: [reportKey],
      retryable: false,
      async invoke(view, env) {
        const finalVideo = view.get(finalVideoKey);
        const report = {
          runId: env.runId,
          referenceHash: hashArtifactIds(view.get(referencesKey).map((artifact) => artifact.id)),
          globalFps: env.run.fps,
          targetDurationSec: env.run.targetDurationSec,
          segments: view.get(segmentsKey),
          keyframeIds: keyframes.map((key) => view.get(key).id),
          videoIds: videos.map((key) => view.get(key).id),
          finalVideoId: finalVideo.id,
          finalVideoPath: await env.artifacts.resolvePath(finalVideo.id),
          ledger: env.ledger.snapshot(),
          timingsMs: options.timings?.() ?? {},
          costEstimate: 0,
          createdAt: clock.now(),
        };
        const location = await options.reports.write(report);
        env.log.response(location);
        return succeed([update(reportKey, report)]);
      },
    };
  }
}

function verdict(notes: string[]): GateVerdict {
  return { accepted: true, notes };
}

function segmentAt(segments: readonly Segment[], index: number): Segment {
  const segment = segments[index - 1];
  if (!segment) {
    throw createConfigurationError(
      ConfigurationErrorCode.INVALID_SETTING,
      `Segment ${index} is not in the plan of ${segments.length} segment(s).`,
    );
  }
  return segment;
}

/** Keyframe 1 opens segment 1; keyframe k closes segment k-1. */
function keyframeSegment(segments: readonly Segment[], k: number): Segment {
  return segmentAt(segments, k === 1 ? 1 : k - 1);
}

function requireText(value: string, label: string): string {
  const text = value.trim();
  if (!text) {
    throw createServiceError(ServiceErrorCode.MALFORMED_RESPONSE, `${label} came back empty.`);
  }
  return text;
}

async function refOf(env: StepEnvironment, artifact: Artifact): Promise<ArtifactRef> {
  return { artifact, path: await env.artifacts.resolvePath(artifact.id) };
}

function refsOf(env: StepEnvironment, artifacts: readonly Artifact[]): Promise<ArtifactRef[]> {
  return Promise.all(artifacts.map((artifact) => refOf(env, artifact)));
}

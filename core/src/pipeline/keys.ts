import { isReport, type Report } from '../report.js';
import { defineKey, type ContextKey } from '../steps/types.js';
import {
  isArtifact,
  isArtifactList,
  isGateVerdict,
  isSegmentList,
  isString,
  isUnknownArray,
  type Artifact,
  type GateVerdict,
  type Segment,
} from '../types.js';

export const referencesKey = defineKey<Artifact[]>('references', isArtifactList);
export const descriptionKey = defineKey<string>('description', isString);
export const styleBibleKey = defineKey<string>('styleBible', isString);
export const styleReferenceKey = defineKey<Artifact>('styleReference', isArtifact);
/** Raw segment objects as drafted, before validation. */
export const storyboardDraftKey = defineKey<unknown[]>('storyboardDraft', isUnknownArray);
export const storyboardCheckKey = defineKey<GateVerdict>('storyboardCheck', isGateVerdict);
export const segmentsKey = defineKey<Segment[]>('segments', isSegmentList);
export const finalVideoKey = defineKey<Artifact>('finalVideo', isArtifact);
export const reportKey = defineKey<Report>('report', isReport);

function indexedKeys<T>(
  prefix: string,
  guard: (value: unknown) => value is T,
): (index: number) => ContextKey<T> {
  const cache = new Map<number, ContextKey<T>>();
  return (index) => {
    let key = cache.get(index);
    if (!key) {
      key = defineKey<T>(`${prefix}[${index}]`, guard);
      cache.set(index, key);
    }
    return key;
  };
}

/** Keyframe k opens segment k and closes segment k-1. */
export const keyframeKey = indexedKeys<Artifact>('keyframe', isArtifact);
export const keyframeCheckKey = indexedKeys<GateVerdict>('keyframeCheck', isGateVerdict);
export const videoKey = indexedKeys<Artifact>('video', isArtifact);
export const videoCheckKey = indexedKeys<GateVerdict>('videoCheck', isGateVerdict);

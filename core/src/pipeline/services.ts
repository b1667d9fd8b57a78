import type { Artifact, ArtifactDraft, EndAnchor, Segment } from '../types.js';

/** A stored artifact together with a location the service can open. */
export interface ArtifactRef {
  artifact: Artifact;
  path: string;
}

interface ServiceRequest {
  signal?: AbortSignal;
}

export interface DescribeRequest extends ServiceRequest {
  prompt: string;
  references: ArtifactRef[];
}

export interface KeyframeReviewRequest extends ServiceRequest {
  /** 1-based keyframe number. */
  index: number;
  candidate: ArtifactRef;
  /** The keyframe this one follows, absent for the first. */
  previous?: ArtifactRef;
  /** End anchor the candidate must depict, absent for the opening frame. */
  anchor?: EndAnchor;
  lockedFlags: string[];
  segment: Segment;
}

export interface KeyframeReview {
  accepted: boolean;
  feedback?: string;
}

export interface PerceptionClient {
  /** Visual description of the subject in the reference images. */
  describe(request: DescribeRequest): Promise<string>;
  reviewKeyframe(request: KeyframeReviewRequest): Promise<KeyframeReview>;
}

export interface StoryboardRequest extends ServiceRequest {
  prompt: string;
  description: string;
  styleBible: string;
  targetDurationSec: number;
  segmentCount: number;
  maxSegmentDurationSec: number;
  /** Rejections of earlier drafts, oldest first. */
  feedback: readonly string[];
}

export interface ReasoningClient {
  /** Raw storyboard as the model returned it; validated downstream. */
  draftStoryboard(request: StoryboardRequest): Promise<unknown>;
}

export interface StyleBibleRequest extends ServiceRequest {
  description: string;
  prompt: string;
}

export interface StyleBibleWriter {
  write(request: StyleBibleRequest): Promise<string>;
}

export interface StyleReferenceRequest extends ServiceRequest {
  prompt: string;
  references: ArtifactRef[];
}

export interface KeyframeRequest extends ServiceRequest {
  index: number;
  prompt: string;
  styleReference: ArtifactRef;
  previous?: ArtifactRef;
}

export interface ImageClient {
  generateStyleReference(request: StyleReferenceRequest): Promise<ArtifactDraft>;
  generateKeyframe(request: KeyframeRequest): Promise<ArtifactDraft>;
}

export interface VideoSegmentRequest extends ServiceRequest {
  segment: Segment;
  prompt: string;
  firstFrame: ArtifactRef;
  lastFrame: ArtifactRef;
  fps: number;
  feedback: readonly string[];
}

export interface VideoClient {
  generateSegment(request: VideoSegmentRequest): Promise<ArtifactDraft>;
}

export interface AssembleRequest extends ServiceRequest {
  segments: ArtifactRef[];
  fps: number;
  width?: number;
  height?: number;
  bitrate?: string;
}

export interface MediaAssembler {
  assemble(request: AssembleRequest): Promise<ArtifactDraft>;
}

/** Every generation collaborator a pipeline run needs. */
export interface ServiceClients {
  perception: PerceptionClient;
  reasoning: ReasoningClient;
  styleBible: StyleBibleWriter;
  image: ImageClient;
  video: VideoClient;
  assembler: MediaAssembler;
}

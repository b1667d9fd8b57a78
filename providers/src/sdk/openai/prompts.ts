import {
  ServiceErrorCode,
  createServiceError,
  isRecord,
  renderTemplate,
  type EndAnchor,
  type KeyframeReview,
  type StoryboardRequest,
} from '@keyreel/core';

export const DESCRIBE_SYSTEM_PROMPT =
  'You are a character designer. Describe the subject in the attached reference images precisely and concisely.';

export const STORYBOARD_SYSTEM_PROMPT = `You are a storyboard artist for short animated clips.
Answer with a JSON array only, no prose. Each item has:
id (1-based), duration_sec (number), style, shot, camera, story, props_bg (non-empty list),
end_anchor { pose, facing, expression, prop_state, position_hint_norm { x, y } },
consistency_flags (list of traits that must stay visible in every shot).`;

const STORYBOARD_USER_TEMPLATE = `Intent: {{Prompt}}
Subject: {{Description}}
Style bible:
{{StyleBible}}

Plan exactly {{SegmentCount}} segment(s) for a clip of about {{TargetDuration}} seconds.
Every segment lasts between 1 and {{MaxSegment}} seconds.
Each segment ends on the pose the next one starts from.`;

export function composeStoryboardPrompt(request: Omit<StoryboardRequest, 'signal'>): string {
  const body = renderTemplate(STORYBOARD_USER_TEMPLATE, {
    Prompt: request.prompt,
    Description: request.description,
    StyleBible: request.styleBible,
    SegmentCount: request.segmentCount,
    TargetDuration: request.targetDurationSec,
    MaxSegment: request.maxSegmentDurationSec,
  });
  if (request.feedback.length === 0) {
    return body;
  }
  return `${body}\nThe previous draft was rejected:\n${request.feedback.map((item) => `- ${item}`).join('\n')}`;
}

export const REVIEW_SYSTEM_PROMPT = `You review keyframes for continuity.
Answer with JSON only: {"accepted": true} or {"accepted": false, "feedback": "<what to fix>"}.`;

const REVIEW_USER_TEMPLATE = `The first image is keyframe {{Index}}.{{PreviousNote}}
Required end pose: {{Anchor}}
Traits that must be visible: {{Flags}}
Accept the keyframe only if the pose matches and every trait is visible.`;

export function composeReviewPrompt(input: {
  index: number;
  hasPrevious: boolean;
  anchor?: EndAnchor;
  lockedFlags: string[];
}): string {
  return renderTemplate(REVIEW_USER_TEMPLATE, {
    Index: input.index,
    PreviousNote: input.hasPrevious ? ' The second image is the keyframe before it.' : '',
    Anchor: input.anchor ? describeAnchor(input.anchor) : 'any natural opening pose',
    Flags: input.lockedFlags.length > 0 ? input.lockedFlags : 'none',
  });
}

function describeAnchor(anchor: EndAnchor): string {
  return [anchor.pose, `facing ${anchor.facing}`, anchor.expression, anchor.propState].filter(Boolean).join(', ');
}

/**
 * Reads a review verdict from model text, with or without a code fence.
 */
export function parseReview(text: string): KeyframeReview {
  const body = text.trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw createServiceError(ServiceErrorCode.MALFORMED_RESPONSE, 'Keyframe review is not valid JSON.', {
      cause: error,
    });
  }
  const accepted = isRecord(parsed) ? parsed.accepted : undefined;
  if (!isRecord(parsed) || typeof accepted !== 'boolean') {
    throw createServiceError(ServiceErrorCode.MALFORMED_RESPONSE, 'Keyframe review has no boolean "accepted" field.');
  }
  const feedback = typeof parsed.feedback === 'string' ? parsed.feedback.trim() : '';
  return feedback ? { accepted, feedback } : { accepted };
}

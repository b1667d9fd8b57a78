import type { Segment } from '../types.js';

/**
 * Substitutes `{{Name}}` placeholders. Unknown names render as an empty string.
 */
export function renderTemplate(template: string, variables: Record<string, unknown>): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (_, name: string) => formatVariable(variables[name]));
}

function formatVariable(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (Array.isArray(value)) {
    return value.map(formatVariable).filter(Boolean).join(', ');
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

const DESCRIBE_TEMPLATE = `{{Prompt}}
Describe the subject shown in the reference images. Cover:
- species or type and body shape
- main and secondary colours, with 2 to 4 suggested HEX values
- markings and distinctive features
- accessories or marks that always appear
- typical expressions and poses`;

const STYLE_REFERENCE_TEMPLATE = `Stylised character reference sheet of the subject.
Intent: {{Prompt}}
Subject: {{Description}}
Style bible: {{StyleBible}}`;

const KEYFRAME_TEMPLATE = `Keyframe {{Index}}: {{Placement}}
Intent: {{Prompt}}
Subject: {{Description}}
Style: {{StyleBrief}}
Segment style: {{Style}}
Shot: {{Shot}}
Camera: {{Camera}}
Props and background: {{Props}}
Keep consistent: {{Flags}}
End pose: {{Anchor}}`;

const VIDEO_TEMPLATE = `Segment {{Index}} ({{Duration}}s): {{Shot}}
Story: {{Story}}
Style: {{Style}}
Camera: {{Camera}}
Props and background: {{Props}}
Keep consistent: {{Flags}}
Start on the first frame and end on the last frame exactly.`;

const STYLE_BRIEF_LENGTH = 160;

export function composeDescribePrompt(prompt: string): string {
  return renderTemplate(DESCRIBE_TEMPLATE, { Prompt: prompt.trim() || 'Describe this subject.' });
}

export function composeStyleReferencePrompt(input: {
  prompt: string;
  description: string;
  styleBible: string;
}): string {
  return renderTemplate(STYLE_REFERENCE_TEMPLATE, {
    Prompt: input.prompt,
    Description: input.description,
    StyleBible: input.styleBible,
  });
}

export interface KeyframePromptInput {
  index: number;
  /** Segment the keyframe opens (first keyframe) or closes (every other). */
  segment: Segment;
  prompt: string;
  description: string;
  styleBible: string;
  feedback: readonly string[];
}

export function composeKeyframePrompt(input: KeyframePromptInput): string {
  const { index, segment } = input;
  const opening = index === 1;
  const placement = opening
    ? `first frame of segment ${segment.index}. Open the scene naturally.`
    : `last frame of segment ${segment.index}. The next segment starts from this exact frame, keep the character, pose and set continuous.`;
  const body = renderTemplate(KEYFRAME_TEMPLATE, {
    Index: index,
    Placement: placement,
    Prompt: input.prompt,
    Description: input.description,
    StyleBrief: input.styleBible.slice(0, STYLE_BRIEF_LENGTH),
    Style: segment.style,
    Shot: segment.shot,
    Camera: segment.camera,
    Props: segment.propsBackground,
    Flags: segment.consistencyFlags,
    Anchor: opening ? undefined : describeAnchor(segment),
  });
  return withFeedback(body, input.feedback);
}

export function composeVideoPrompt(segment: Segment, feedback: readonly string[]): string {
  const body = renderTemplate(VIDEO_TEMPLATE, {
    Index: segment.index,
    Duration: segment.durationSec,
    Shot: segment.shot,
    Story: segment.story,
    Style: segment.style,
    Camera: segment.camera,
    Props: segment.propsBackground,
    Flags: segment.consistencyFlags,
  });
  return withFeedback(body, feedback);
}

function describeAnchor(segment: Segment): string {
  const { pose, facing, expression, propState } = segment.endAnchor;
  return [pose, `facing ${facing}`, expression, propState].filter(Boolean).join(', ');
}

function withFeedback(body: string, feedback: readonly string[]): string {
  if (feedback.length === 0) {
    return body;
  }
  return `${body}\nFix from review:\n${feedback.map((item) => `- ${item}`).join('\n')}`;
}

import type { StoryboardRequest } from '@keyreel/core';

interface StagePreset {
  style: string;
  shot: string;
  camera: string;
  props: string[];
  pose: string;
}

const STAGES: StagePreset[] = [
  {
    style: 'whimsical calm fantasy',
    shot: 'the subject strolls across a misty meadow at dawn, stardust drifting around it',
    camera: 'medium shot, slow dolly-in, gentle pan',
    props: ['red scarf', 'rolling dream grass', 'beams of morning mist'],
    pose: 'front paw lifted, tail raised slightly',
  },
  {
    style: 'midair aurora burst',
    shot: 'the subject leaps onto floating stone steps and plays with a glowing orb',
    camera: 'wide shot, upward tilt following the jump',
    props: ['red scarf', 'floating stone steps', 'aurora-coloured energy orb'],
    pose: 'airborne mid-leap, limbs spread',
  },
  {
    style: 'luminous chase through ruins',
    shot: 'the subject crosses a mirror lake, its trail lighting up the night sky',
    camera: 'tracking shot, glide-cam circling',
    props: ['red scarf', 'mirror lake', 'trail of starlight'],
    pose: 'low glide, claws rippling the water',
  },
  {
    style: 'crescendo of floating lights',
    shot: 'the subject hovers before a gate of light and looks back as energy waves spread',
    camera: 'close-up, slow orbit with rack focus',
    props: ['red scarf', 'gate of light', 'floating dandelions'],
    pose: 'hovering gaze, front paws crossed',
  },
];

const FALLBACK_STAGE: StagePreset = {
  style: 'dreamy kinetic tableau',
  shot: 'the subject runs through drifting light and mist',
  camera: 'medium shot, handheld energy',
  props: ['red scarf'],
  pose: 'standing steady, watching the horizon',
};

export const MOCK_CONSISTENCY_FLAGS = ['scarf always visible', 'warm golden fur', 'soft background glow'];

/**
 * Deterministic storyboard in the shape a reasoning model is asked to return.
 * Durations split the target evenly, rounded to hundredths and kept within
 * the segment ceiling.
 */
export function mockStoryboard(request: Omit<StoryboardRequest, 'signal'>): Record<string, unknown>[] {
  const { segmentCount, targetDurationSec, maxSegmentDurationSec } = request;
  const intent = request.prompt.trim() || 'a fantasy journey';
  const perSegment = Math.min(
    maxSegmentDurationSec,
    Math.max(1, Math.round((targetDurationSec / segmentCount) * 100) / 100),
  );

  return Array.from({ length: segmentCount }, (_, position) => {
    const stage = position + 1;
    const preset = STAGES[position] ?? FALLBACK_STAGE;
    const last = stage === segmentCount;
    return {
      id: stage,
      duration_sec: perSegment,
      style: preset.style,
      shot: `${preset.shot}, echoing the intent: ${intent}`,
      camera: preset.camera,
      story: `beat ${stage} of ${segmentCount}`,
      props_bg: [...preset.props],
      end_anchor: {
        pose: preset.pose,
        facing: last ? 'straight to camera' : 'front right third',
        expression: last ? 'gently content' : 'excited smile',
        prop_state: 'scarf trailing behind',
        position_hint_norm: { x: Math.round((0.35 + ((stage * 0.1) % 0.3)) * 100) / 100, y: 0.4 },
      },
      consistency_flags: [...MOCK_CONSISTENCY_FLAGS],
    };
  });
}

import { Ajv, type ErrorObject, type SchemaObject } from 'ajv';
import { createServiceError, ServiceErrorCode } from '../errors/index.js';
import { isRecord, isString, type EndAnchor, type PositionHint, type Segment } from '../types.js';

/**
 * Shape a drafted storyboard segment must have. Field names follow the
 * reasoning service's output. `end_anchor` may still be a string at this
 * point; planning coerces it.
 */
export const STORYBOARD_SEGMENT_SCHEMA: SchemaObject = {
  type: 'object',
  required: ['duration_sec', 'end_anchor', 'props_bg'],
  properties: {
    id: { type: ['integer', 'string'] },
    duration_sec: { type: ['number', 'string'] },
    style: { type: 'string' },
    shot: { type: 'string' },
    camera: { type: 'string' },
    story: { type: 'string' },
    props_bg: { type: 'array', items: { type: 'string' } },
    end_anchor: { type: ['object', 'string'] },
    consistency_flags: { type: 'array', items: { type: 'string' } },
  },
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateSegmentShape = ajv.compile(STORYBOARD_SEGMENT_SCHEMA);

export interface StoryboardRules {
  segmentCount: number;
  maxSegmentDurationSec: number;
}

/**
 * Pulls the segment list out of whatever the reasoning service returned: a
 * list, an object with a `segments` list, or either of those as JSON text.
 */
export function extractStoryboard(raw: unknown): unknown[] {
  let value = raw;
  if (isString(value)) {
    const text = stripCodeFence(value);
    try {
      value = JSON.parse(text);
    } catch (error) {
      throw createServiceError(ServiceErrorCode.MALFORMED_RESPONSE, 'Storyboard response is not valid JSON.', {
        cause: error,
      });
    }
  }
  if (Array.isArray(value)) {
    return value;
  }
  if (isRecord(value) && Array.isArray(value.segments)) {
    return value.segments;
  }
  throw createServiceError(
    ServiceErrorCode.MALFORMED_RESPONSE,
    'Storyboard response holds no segment list.',
  );
}

/**
 * Every reason the draft cannot be planned, in segment order. Empty when the
 * draft is acceptable.
 */
export function validateStoryboard(draft: unknown, rules: StoryboardRules): string[] {
  if (!Array.isArray(draft) || draft.length === 0) {
    return ['Storyboard must contain at least one segment.'];
  }
  const errors: string[] = [];
  if (draft.length !== rules.segmentCount) {
    errors.push(`Storyboard has ${draft.length} segment(s), expected ${rules.segmentCount}.`);
  }

  draft.forEach((segment, position) => {
    if (!isRecord(segment)) {
      errors.push(`Segment ${position + 1} must be an object.`);
      return;
    }
    const label = `Segment ${segmentLabel(segment, position)}`;
    if (!validateSegmentShape(segment)) {
      errors.push(...(validateSegmentShape.errors ?? []).map((error) => `${label} ${describeSchemaError(error)}`));
      return;
    }

    const duration = Number(segment.duration_sec);
    if (!Number.isFinite(duration)) {
      errors.push(`${label} duration not numeric: ${String(segment.duration_sec)}`);
    } else if (duration < 1 || duration > rules.maxSegmentDurationSec) {
      errors.push(`${label} duration invalid: ${duration} (allowed 1 to ${rules.maxSegmentDurationSec})`);
    }

    const anchor = coerceEndAnchor(segment.end_anchor);
    for (const field of ['pose', 'facing', 'expression'] as const) {
      if (!nonBlank(anchor[field])) {
        errors.push(`${label} missing end_anchor.${field}`);
      }
    }

    if (!Array.isArray(segment.props_bg) || segment.props_bg.length === 0) {
      errors.push(`${label} requires props_bg entries`);
    }
  });

  return errors;
}

/**
 * Normalises an end anchor given as an object, a JSON string, or loose
 * `key: value` / `key=value` pairs separated by commas, semicolons or
 * newlines. Anything else yields an empty record.
 */
export function coerceEndAnchor(value: unknown): Record<string, unknown> {
  if (isRecord(value)) {
    return value;
  }
  if (!isString(value)) {
    return {};
  }
  const text = value.trim();
  if (!text) {
    return {};
  }
  const parsed = parseJson(text);
  if (isRecord(parsed)) {
    return parsed;
  }

  const pairs: Record<string, unknown> = {};
  for (const chunk of text.split(/[,;\n]/)) {
    const part = chunk.trim();
    const colon = part.indexOf(':');
    const equals = part.indexOf('=');
    const cut = colon >= 0 ? colon : equals;
    if (!part || cut < 0) {
      continue;
    }
    const key = part.slice(0, cut).trim();
    if (key) {
      pairs[key] = part.slice(cut + 1).trim();
    }
  }
  return pairs;
}

/** Turns a validated draft into segments numbered 1..n in draft order. */
export function planSegments(draft: readonly unknown[]): Segment[] {
  return draft.map((raw, position) => {
    const segment = isRecord(raw) ? raw : {};
    return {
      index: position + 1,
      durationSec: Number(segment.duration_sec),
      style: text(segment.style),
      shot: text(segment.shot),
      camera: text(segment.camera),
      story: text(segment.story),
      propsBackground: strings(segment.props_bg),
      endAnchor: toEndAnchor(coerceEndAnchor(segment.end_anchor)),
      consistencyFlags: strings(segment.consistency_flags),
    };
  });
}

/** Flags of every segment, first occurrence first. */
export function collectConsistencyFlags(segments: readonly Segment[]): string[] {
  return [...new Set(segments.flatMap((segment) => segment.consistencyFlags))];
}

function toEndAnchor(record: Record<string, unknown>): EndAnchor {
  const anchor: EndAnchor = {
    pose: text(record.pose),
    facing: text(record.facing),
    expression: text(record.expression),
  };
  const propState = text(record.prop_state ?? record.propState);
  if (propState) {
    anchor.propState = propState;
  }
  const hint = toPositionHint(record.position_hint_norm ?? record.positionHint);
  if (hint) {
    anchor.positionHint = hint;
  }
  return anchor;
}

function toPositionHint(value: unknown): PositionHint | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const x = Number(value.x);
  const y = Number(value.y);
  return Number.isFinite(x) && Number.isFinite(y) ? { x, y } : undefined;
}

function segmentLabel(segment: Record<string, unknown>, position: number): string {
  const id = segment.id;
  return typeof id === 'number' || (isString(id) && id.trim()) ? String(id) : String(position + 1);
}

function describeSchemaError(error: ErrorObject): string {
  const path = error.instancePath ? error.instancePath.slice(1).replace(/\//g, '.') : '';
  return path ? `${path} ${error.message ?? 'is invalid'}` : (error.message ?? 'is invalid');
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function stripCodeFence(value: string): string {
  const match = /^```(?:json)?\s*([\s\S]*?)\s*```$/.exec(value.trim());
  return match?.[1] ?? value.trim();
}

function nonBlank(value: unknown): boolean {
  return isString(value) ? value.trim().length > 0 : value !== undefined && value !== null && value !== '';
}

function text(value: unknown): string {
  if (isString(value)) {
    return value.trim();
  }
  return typeof value === 'number' ? String(value) : '';
}

function strings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter(isString).map((item) => item.trim()).filter(Boolean) : [];
}

import { readFile } from 'node:fs/promises';
import { dirname, extname, isAbsolute, resolve } from 'node:path';
import { Ajv, type ErrorObject, type SchemaObject } from 'ajv';
import { parse as parseYaml } from 'yaml';
import { ConfigurationErrorCode, createConfigurationError, describeError } from './errors/index.js';
import { isRecord } from './types.js';

/** Run inputs kept in a YAML file instead of on the command line. */
export interface ClipInputs {
  prompt?: string;
  /** Absolute paths; relative entries resolve against the file's directory. */
  images: string[];
  durationSec?: number;
  segments?: number;
}

export const CLIP_INPUTS_SCHEMA: SchemaObject = {
  type: 'object',
  additionalProperties: false,
  properties: {
    prompt: { type: 'string' },
    images: { type: 'array', items: { type: 'string', minLength: 1 } },
    durationSec: { type: 'number', exclusiveMinimum: 0 },
    segments: { type: 'integer', minimum: 1 },
  },
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateInputs = ajv.compile(CLIP_INPUTS_SCHEMA);

/**
 * Reads a clip inputs file. Either the mapping itself or an `inputs:` section
 * holding it is accepted.
 *
 * @example
 * inputs:
 *   prompt: a fox chasing fireflies at dusk
 *   images: [fox-front.png, fox-side.png]
 *   durationSec: 20
 */
export async function loadClipInputs(filePath: string): Promise<ClipInputs> {
  const extension = extname(filePath).toLowerCase();
  if (extension !== '.yaml' && extension !== '.yml') {
    throw invalidInputs(`Input files must be YAML (*.yaml or *.yml). Received: ${filePath}`, filePath);
  }

  let contents: string;
  try {
    contents = await readFile(filePath, 'utf8');
  } catch (error) {
    throw invalidInputs(`Input file could not be read: ${describeError(error)}`, filePath, error);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    throw invalidInputs(`Input file is not valid YAML: ${describeError(error)}`, filePath, error);
  }

  const section = isRecord(parsed) && isRecord(parsed.inputs) ? parsed.inputs : parsed;
  if (!isRecord(section)) {
    throw invalidInputs('Input file must define a mapping of inputs.', filePath);
  }
  if (!validateInputs(section)) {
    throw invalidInputs(`Input file is invalid: ${formatSchemaErrors(validateInputs.errors ?? [])}`, filePath);
  }

  const baseDir = dirname(resolve(filePath));
  const images = Array.isArray(section.images)
    ? section.images.filter((item): item is string => typeof item === 'string')
    : [];
  return {
    ...(typeof section.prompt === 'string' ? { prompt: section.prompt } : {}),
    images: images.map((image) => (isAbsolute(image) ? image : resolve(baseDir, image))),
    ...(typeof section.durationSec === 'number' ? { durationSec: section.durationSec } : {}),
    ...(typeof section.segments === 'number' ? { segments: section.segments } : {}),
  };
}

function formatSchemaErrors(errors: ErrorObject[]): string {
  return errors
    .map((error) => {
      const field = error.instancePath.replace(/^\//, '').replace(/\//g, '.');
      if (error.keyword === 'additionalProperties' && isRecord(error.params)) {
        return `unknown field "${String(error.params.additionalProperty)}"`;
      }
      return field ? `${field} ${error.message ?? 'is invalid'}` : error.message ?? 'is invalid';
    })
    .join('; ');
}

function invalidInputs(message: string, filePath: string, cause?: unknown) {
  return createConfigurationError(ConfigurationErrorCode.INVALID_INPUTS_FILE, message, {
    context: filePath,
    ...(cause === undefined ? {} : { cause }),
  });
}

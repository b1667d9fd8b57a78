/**
 * Error creation helpers.
 *
 * One factory per category so call sites read as the kind of failure they
 * raise, not just the code they pick.
 */

import { PipelineError, isPipelineError, type SerializedError } from './types.js';

interface ErrorDetails {
  context?: string;
  suggestion?: string;
  cause?: unknown;
}

export function createPipelineError(
  code: string,
  message: string,
  details: ErrorDetails = {},
): PipelineError {
  return new PipelineError({ code, message, ...details });
}

/**
 * Creates a configuration error (C-code). Raised while building a run.
 */
export function createConfigurationError(
  code: string,
  message: string,
  details: ErrorDetails = {},
): PipelineError {
  return createPipelineError(code, message, details);
}

/**
 * Creates a service error (S-code). External call failures, retryable.
 */
export function createServiceError(
  code: string,
  message: string,
  details: ErrorDetails = {},
): PipelineError {
  return createPipelineError(code, message, details);
}

/**
 * Creates a validation error (V-code). A gate that throws one requests rework.
 */
export function createValidationError(
  code: string,
  message: string,
  details: ErrorDetails = {},
): PipelineError {
  return createPipelineError(code, message, details);
}

/**
 * Creates a ledger violation (L-code).
 */
export function createLedgerViolation(
  code: string,
  message: string,
  details: ErrorDetails = {},
): PipelineError {
  return createPipelineError(code, message, details);
}

/**
 * Creates a storage error (T-code).
 */
export function createStorageError(
  code: string,
  message: string,
  details: ErrorDetails = {},
): PipelineError {
  return createPipelineError(code, message, details);
}

/**
 * Creates a runtime error (R-code).
 */
export function createRuntimeError(
  code: string,
  message: string,
  details: ErrorDetails = {},
): PipelineError {
  return createPipelineError(code, message, details);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function serializeError(error: unknown): SerializedError {
  if (isPipelineError(error)) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      category: error.category,
      context: error.context,
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}

/**
 * Formats a PipelineError for display.
 */
export function formatError(error: PipelineError): string {
  const parts: string[] = [`[${error.code}] ${error.message}`];
  if (error.context) {
    parts.push(`  Context: ${error.context}`);
  }
  if (error.suggestion) {
    parts.push(`  Suggestion: ${error.suggestion}`);
  }
  return parts.join('\n');
}

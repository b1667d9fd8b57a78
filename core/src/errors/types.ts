/**
 * Shared error types for keyreel.
 *
 * Every error raised by the core carries a code whose prefix names its
 * category:
 * - C (Configuration): graph construction and step contract bugs
 * - S (Service): external generation calls, recovered by retry
 * - V (Validation): quality gate rejections, recovered by rework
 * - L (Ledger): adjacent boundary mismatches
 * - T (Storage): artifact persistence
 * - R (Runtime): engine and run lifecycle
 */

import { getErrorCategory, type ErrorCategory } from './codes.js';

export interface PipelineErrorOptions {
  /** Error code (e.g., 'C004', 'S001') */
  code: string;
  message: string;
  /** Element context (e.g., "step keyframe-2", "key video[1]") */
  context?: string;
  /** Suggested fix */
  suggestion?: string;
  cause?: unknown;
}

/**
 * Base error for all keyreel failures.
 *
 * The category is inferred from the code so that callers only ever pick a code.
 */
export class PipelineError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly context?: string;
  readonly suggestion?: string;

  constructor(options: PipelineErrorOptions) {
    super(options.message, { cause: options.cause });
    this.name = 'PipelineError';
    this.code = options.code;
    this.category = getErrorCategory(options.code);
    this.context = options.context;
    this.suggestion = options.suggestion;
  }
}

/**
 * Type guard to check if an error is a PipelineError.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Plain-object form of an error, safe to persist in a report.
 */
export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  category?: ErrorCategory;
  context?: string;
}

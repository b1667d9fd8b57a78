/**
 * keyreel error system.
 *
 * - C (Configuration): graph construction and step contract bugs
 * - S (Service): external generation calls
 * - V (Validation): quality gate rejections
 * - L (Ledger): boundary continuity violations
 * - T (Storage): artifact persistence
 * - R (Runtime): engine and run lifecycle
 */

export type { PipelineErrorOptions, SerializedError } from './types.js';
export { PipelineError, isPipelineError } from './types.js';

export {
  ConfigurationErrorCode,
  ServiceErrorCode,
  ValidationErrorCode,
  LedgerErrorCode,
  StorageErrorCode,
  RuntimeErrorCode,
  ERROR_CODE_CATEGORIES,
  getErrorCategory,
} from './codes.js';
export type {
  ErrorCategory,
  ErrorCode,
  ConfigurationErrorCodeValue,
  ServiceErrorCodeValue,
  ValidationErrorCodeValue,
  LedgerErrorCodeValue,
  StorageErrorCodeValue,
  RuntimeErrorCodeValue,
} from './codes.js';

export {
  createPipelineError,
  createConfigurationError,
  createServiceError,
  createValidationError,
  createLedgerViolation,
  createStorageError,
  createRuntimeError,
  describeError,
  serializeError,
  formatError,
} from './helpers.js';

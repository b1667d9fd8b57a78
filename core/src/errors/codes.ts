/**
 * Error code constants for keyreel.
 *
 * Code format: {Category}{Number}
 * - C: Configuration errors (C001-C099), raised while building a run
 * - S: Service errors (S001-S099), external generation calls
 * - V: Validation errors (V001-V099), quality gate rejections
 * - L: Ledger violations (L001-L099)
 * - T: Storage errors (T001-T099), artifact persistence
 * - R: Runtime errors (R001-R099), engine and run lifecycle
 */

// =============================================================================
// Configuration Error Codes (C001-C099)
// =============================================================================

export const ConfigurationErrorCode = {
  // C001-C009: Graph construction
  DUPLICATE_STEP_ID: 'C001',
  DUPLICATE_WRITER: 'C002',
  MISSING_WRITER: 'C003',
  CYCLIC_DEPENDENCY: 'C004',
  UNKNOWN_GATE_PRODUCER: 'C005',
  UNGATED_CONSUMER: 'C006',
  REQUIRED_DEPENDS_ON_OPTIONAL: 'C007',
  EMPTY_GRAPH: 'C008',

  // C010-C019: Settings
  INVALID_SETTING: 'C010',
  INVALID_RUN_SEED: 'C011',
  INVALID_INPUTS_FILE: 'C012',

  // C020-C029: Step contract
  UNDECLARED_READ: 'C020',
  UNDECLARED_WRITE: 'C021',
  INCOMPLETE_WRITE: 'C022',
  KEY_ALREADY_WRITTEN: 'C023',
  CONTEXT_TYPE_MISMATCH: 'C024',
} as const;

export type ConfigurationErrorCodeValue =
  (typeof ConfigurationErrorCode)[keyof typeof ConfigurationErrorCode];

// =============================================================================
// Service Error Codes (S001-S099)
// =============================================================================

export const ServiceErrorCode = {
  REQUEST_FAILED: 'S001',
  MALFORMED_RESPONSE: 'S002',
  MISSING_CREDENTIALS: 'S003',
  RATE_LIMITED: 'S004',
  MEDIA_TOOL_FAILED: 'S010',
  MEDIA_TOOL_NOT_FOUND: 'S011',
} as const;

export type ServiceErrorCodeValue = (typeof ServiceErrorCode)[keyof typeof ServiceErrorCode];

// =============================================================================
// Validation Error Codes (V001-V099)
// =============================================================================

export const ValidationErrorCode = {
  STORYBOARD_REJECTED: 'V001',
  KEYFRAME_REJECTED: 'V002',
  VIDEO_REJECTED: 'V003',
  REWORK_EXHAUSTED: 'V010',
} as const;

export type ValidationErrorCodeValue =
  (typeof ValidationErrorCode)[keyof typeof ValidationErrorCode];

// =============================================================================
// Ledger Error Codes (L001-L099)
// =============================================================================

export const LedgerErrorCode = {
  ADJACENT_BOUNDARY_MISMATCH: 'L001',
  BOUNDARY_ALREADY_BOUND: 'L002',
  INVALID_SEGMENT_INDEX: 'L003',
} as const;

export type LedgerErrorCodeValue = (typeof LedgerErrorCode)[keyof typeof LedgerErrorCode];

// =============================================================================
// Storage Error Codes (T001-T099)
// =============================================================================

export const StorageErrorCode = {
  WRITE_FAILED: 'T001',
  READ_FAILED: 'T002',
  ARTIFACT_NOT_FOUND: 'T003',
  INVALID_METADATA: 'T004',
} as const;

export type StorageErrorCodeValue = (typeof StorageErrorCode)[keyof typeof StorageErrorCode];

// =============================================================================
// Runtime Error Codes (R001-R099)
// =============================================================================

export const RuntimeErrorCode = {
  INVALID_CONCURRENCY_VALUE: 'R001',
  STEP_TIMEOUT: 'R002',
  RETRIES_EXHAUSTED: 'R003',
  STEP_FAILED: 'R004',
  RUN_CANCELLED: 'R005',
  DEPENDENCY_UNAVAILABLE: 'R006',
} as const;

export type RuntimeErrorCodeValue = (typeof RuntimeErrorCode)[keyof typeof RuntimeErrorCode];

// =============================================================================
// Combined Types
// =============================================================================

export type ErrorCode =
  | ConfigurationErrorCodeValue
  | ServiceErrorCodeValue
  | ValidationErrorCodeValue
  | LedgerErrorCodeValue
  | StorageErrorCodeValue
  | RuntimeErrorCodeValue;

/**
 * Maps error code prefixes to their categories.
 */
export const ERROR_CODE_CATEGORIES = {
  C: 'configuration',
  S: 'service',
  V: 'validation',
  L: 'ledger',
  T: 'storage',
  R: 'runtime',
} as const;

export type ErrorCategory = (typeof ERROR_CODE_CATEGORIES)[keyof typeof ERROR_CODE_CATEGORIES];

function isCategoryPrefix(prefix: string): prefix is keyof typeof ERROR_CODE_CATEGORIES {
  return prefix in ERROR_CODE_CATEGORIES;
}

/**
 * Gets the category for an error code.
 */
export function getErrorCategory(code: string): ErrorCategory {
  const prefix = code.charAt(0);
  return isCategoryPrefix(prefix) ? ERROR_CODE_CATEGORIES[prefix] : 'runtime';
}

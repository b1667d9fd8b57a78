export * from './errors/index.js';
export * from './types.js';
export * from './logger.js';
export * from './hashing.js';
export * from './blob-utils.js';
export * from './storage.js';
export * from './artifact-store.js';
export * from './reference-image.js';
export * from './ledger/index.js';
export * from './steps/index.js';
export * from './topology/index.js';
export * from './graph/index.js';
export * from './execution/types.js';
export * from './execution/backends.js';
export * from './execution/engine.js';
export * from './execution/run-context.js';
export * from './execution/snapshots.js';
export * from './run-log.js';
export * from './report.js';
export * from './config.js';
export * from './env-loader.js';
export * from './inputs.js';
export * from './pipeline/index.js';

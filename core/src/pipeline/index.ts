export * from './keys.js';
export * from './prompts.js';
export * from './run.js';
export * from './services.js';
export * from './steps.js';
export * from './storyboard.js';
export * from './timings.js';

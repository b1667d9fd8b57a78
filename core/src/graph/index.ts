export * from './step-graph.js';

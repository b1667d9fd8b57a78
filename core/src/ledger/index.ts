export * from './consistency-ledger.js';

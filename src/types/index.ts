export * from './record.js';
export * from './progress.js';

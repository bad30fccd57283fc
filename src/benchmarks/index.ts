/**
 * Majority Vote Benchmark Harness
 *
 * Trials, summaries, the result store and its exports.
 */

export * from './types.js';
export * from './summary.js';
export * from './result-store.js';
export * from './exporter.js';
export * from './runner.js';

/**
 * Majority Bench - instrumented Boyer-Moore majority vote
 *
 * - Engine: two-pass majority search with comparison, access,
 *   allocation and timing counters
 * - Test data: generated inputs with or without a majority, Fisher-Yates shuffle
 * - Harness: repeated trials, per-size summaries, comparison runs
 * - Store: keyed sample history with CSV and text report export
 */

export * from './types.js';
export * from './errors.js';
export * from './algorithms/index.js';
export * from './benchmarks/index.js';
export * from './utils/config.js';
export * from './utils/memory.js';
export * from './utils/parse.js';

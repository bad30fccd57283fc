/**
 * Benchmark Types
 */

import type { MajorityFinder } from '../algorithms/majority-vote.js';
import type { Clock, RandomSource, TimestampSource } from '../types.js';
import type { PerformanceSummary } from './summary.js';
import type { ResultStore } from './result-store.js';

/**
 * Outcome of a single trial
 */
export interface PerformanceSample {
  readonly id: string;
  readonly algorithmName: string;
  readonly inputSize: number;
  readonly executionTimeNanos: number;
  readonly executionTimeMillis: number;
  readonly comparisons: number;
  readonly arrayAccesses: number;
  readonly memoryAllocations: number;
  readonly hasMajority: boolean;
  readonly timestamp: number;   // epoch ms
}

/**
 * Composite store key
 */
export interface ResultKey {
  algorithmName: string;
  inputSize: number;
  majority: boolean;
}

/**
 * Summaries per input size, in the order the sizes were requested
 */
export type SizeSummaries = Map<number, PerformanceSummary>;

export type ComparisonGroup = 'with_majority' | 'without_majority';

/**
 * Majority vs no-majority comparison
 */
export type ComparisonResult = Record<ComparisonGroup, SizeSummaries>;

/**
 * Benchmark runner options
 */
export interface BenchmarkOptions {
  store?: ResultStore;
  algorithmName?: string;
  finder?: MajorityFinder;  // Defaults to findMajority with `clock`
  random?: RandomSource;    // Shuffle source
  clock?: Clock;            // Engine timer source
  now?: TimestampSource;    // Sample timestamps
  verbose?: boolean;
}

/**
 * File export options
 */
export interface ExportOptions {
  outputDir: string;
  basename: string;
}

export interface ExportPaths {
  csvPath: string;
  reportPath: string;
}

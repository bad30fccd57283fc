/**
 * Core Types for Majority Bench
 */

/**
 * Sequence accepted by the engine. Elements are integers; `null` stands in
 * for a missing element and the whole sequence may be absent.
 */
export type Sequence = ReadonlyArray<number | null>;

/**
 * Monotonic time source in nanoseconds
 */
export type Clock = () => bigint;

/**
 * Uniform random source in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Wall-clock source in epoch milliseconds
 */
export type TimestampSource = () => number;

/**
 * Majority Bench configuration
 */
export interface BenchConfig {
  // Name recorded on every sample produced by the harness
  algorithmName: string;

  // Quick benchmark
  quickSizes: number[];
  quickRuns: number;

  // Demo performance section
  demoSizes: number[];
  demoRuns: number;

  // `test` command per-size metrics
  basicTestSizes: number[];

  // Export target for CSV and report files
  outputDir: string;

  verbose: boolean;
}

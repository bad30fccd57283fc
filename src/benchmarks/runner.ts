/**
 * Benchmark Runner
 *
 * Repeats majority-vote trials over generated inputs, records every
 * successful trial in the result store and summarizes them per size.
 */

import { MajorityFinder, findMajority, hasError } from '../algorithms/majority-vote.js';
import { generateTestArray, shuffleArray } from '../algorithms/test-data.js';
import { InvalidInputError } from '../errors.js';
import { RandomSource, TimestampSource } from '../types.js';
import { loadConfig } from '../utils/config.js';
import { ResultStore } from './result-store.js';
import { PerformanceSummary, createSample } from './summary.js';
import {
  BenchmarkOptions,
  ComparisonResult,
  PerformanceSample,
  SizeSummaries,
} from './types.js';

export class MajorityBenchmark {
  readonly store: ResultStore;
  readonly algorithmName: string;
  private readonly finder: MajorityFinder;
  private readonly random: RandomSource;
  private readonly now: TimestampSource;
  private readonly verbose: boolean;

  constructor(options: BenchmarkOptions = {}) {
    const config = loadConfig();
    const clock = options.clock;

    this.store = options.store ?? new ResultStore();
    this.algorithmName = options.algorithmName ?? config.algorithmName;
    this.finder = options.finder ?? (sequence => findMajority(sequence, { clock }));
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.verbose = options.verbose ?? config.verbose;
  }

  /**
   * Run `runs` trials at one size. Trials that error are dropped, so the
   * result may be shorter than `runs`.
   */
  runTrials(size: number, wantMajority: boolean, runs: number): PerformanceSample[] {
    const samples: PerformanceSample[] = [];

    if (this.verbose) {
      console.log(`Running ${runs} trial(s) at size ${size} (majority: ${wantMajority})...`);
    }

    for (let i = 0; i < runs; i++) {
      const testArray = generateTestArray(size, wantMajority);
      shuffleArray(testArray, this.random);

      const result = this.finder(testArray);

      if (hasError(result)) {
        if (this.verbose) {
          console.warn(`  ✗ trial ${i + 1}/${runs} dropped: ${result.error.message}`);
        }
        continue;
      }

      const { metrics } = result;
      samples.push(createSample({
        algorithmName: this.algorithmName,
        inputSize: size,
        executionTimeNanos: metrics.executionTimeNanos,
        comparisons: metrics.comparisons,
        arrayAccesses: metrics.arrayAccesses,
        memoryAllocations: metrics.memoryAllocations,
        hasMajority: result.hasMajority,
      }, this.now()));
    }

    this.store.recordAll(
      { algorithmName: this.algorithmName, inputSize: size, majority: wantMajority },
      samples
    );

    return samples;
  }

  /**
   * Summaries per size in the given order; sizes with no successful
   * trial have no entry
   */
  runMatrix(sizes: readonly number[], wantMajority: boolean, runs: number): SizeSummaries {
    const summaries: SizeSummaries = new Map();

    for (const size of sizes) {
      const samples = this.runTrials(size, wantMajority, runs);
      if (samples.length > 0) {
        summaries.set(size, new PerformanceSummary(this.algorithmName, size, samples));
      }
    }

    return summaries;
  }

  compareMajorityVsNone(sizes: readonly number[], runs: number): ComparisonResult {
    const withMajority = this.runMatrix(sizes, true, runs);
    const withoutMajority = this.runMatrix(sizes, false, runs);
    return {
      with_majority: withMajority,
      without_majority: withoutMajority,
    };
  }

  /**
   * Majority inputs at a tenth, a fifth, half and all of maxSize
   */
  runStressTest(maxSize: number, runs: number): SizeSummaries {
    return this.runMatrix(stressSizes(maxSize), true, runs);
  }
}

export function stressSizes(maxSize: number): number[] {
  return [
    Math.floor(maxSize / 10),
    Math.floor(maxSize / 5),
    Math.floor(maxSize / 2),
    maxSize,
  ];
}

/**
 * Every size in [min, max] reachable from min in steps of `step`
 */
export function sizeRange(min: number, max: number, step: number): number[] {
  if (!Number.isInteger(step) || step <= 0) {
    throw new InvalidInputError('step size', 'must be a positive integer');
  }

  const sizes: number[] = [];
  for (let size = min; size <= max; size += step) {
    sizes.push(size);
  }
  return sizes;
}

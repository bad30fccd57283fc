/**
 * Samples and Summaries
 *
 * A sample is one frozen trial outcome; a summary aggregates the samples
 * of one algorithm at one input size.
 */

import { v4 as uuidv4 } from 'uuid';
import { EmptySampleSetError, MixedSampleSetError } from '../errors.js';
import { PerformanceSample } from './types.js';

export interface SampleFields {
  algorithmName: string;
  inputSize: number;
  executionTimeNanos: number;
  comparisons: number;
  arrayAccesses: number;
  memoryAllocations: number;
  hasMajority: boolean;
}

/**
 * Create an immutable sample
 */
export function createSample(fields: SampleFields, timestamp: number = Date.now()): PerformanceSample {
  return Object.freeze({
    id: uuidv4(),
    ...fields,
    executionTimeMillis: fields.executionTimeNanos / 1_000_000,
    timestamp,
  });
}

/**
 * Arithmetic mean, 0 for no values
 */
export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Population standard deviation
 */
export function stddev(values: number[], valuesMean: number = mean(values)): number {
  if (values.length === 0) return 0;
  const squaredDiffs = values.map(v => (v - valuesMean) ** 2);
  return Math.sqrt(mean(squaredDiffs));
}

/**
 * Statistics over the samples of one algorithm at one input size
 */
export class PerformanceSummary {
  readonly algorithmName: string;
  readonly inputSize: number;
  readonly runCount: number;
  readonly avgExecutionTime: number;     // ms
  readonly minExecutionTime: number;     // ms
  readonly maxExecutionTime: number;     // ms
  readonly stdDevExecutionTime: number;  // ms
  readonly avgComparisons: number;
  readonly avgArrayAccesses: number;
  readonly avgMemoryAllocations: number;
  private readonly samples: readonly PerformanceSample[];

  constructor(algorithmName: string, inputSize: number, samples: readonly PerformanceSample[]) {
    if (samples.length === 0) {
      throw new EmptySampleSetError(algorithmName, inputSize);
    }

    const expected = `${algorithmName}@${inputSize}`;
    for (const sample of samples) {
      if (sample.algorithmName !== algorithmName || sample.inputSize !== inputSize) {
        throw new MixedSampleSetError(expected, `${sample.algorithmName}@${sample.inputSize}`);
      }
    }

    this.algorithmName = algorithmName;
    this.inputSize = inputSize;
    this.runCount = samples.length;
    this.samples = [...samples];

    const times = samples.map(s => s.executionTimeMillis);
    this.avgExecutionTime = mean(times);
    this.minExecutionTime = times.reduce((a, b) => Math.min(a, b));
    this.maxExecutionTime = times.reduce((a, b) => Math.max(a, b));
    this.stdDevExecutionTime = stddev(times, this.avgExecutionTime);

    this.avgComparisons = mean(samples.map(s => s.comparisons));
    this.avgArrayAccesses = mean(samples.map(s => s.arrayAccesses));
    this.avgMemoryAllocations = mean(samples.map(s => s.memoryAllocations));
  }

  getSamples(): PerformanceSample[] {
    return [...this.samples];
  }

  toString(): string {
    return formatSummary(this);
  }
}

/**
 * One-line rendering used by reports and the console
 */
export function formatSummary(summary: PerformanceSummary): string {
  return (
    `${summary.algorithmName}: size=${summary.inputSize}, runs=${summary.runCount}, ` +
    `avgTime=${summary.avgExecutionTime.toFixed(3)}±${summary.stdDevExecutionTime.toFixed(3)} ms, ` +
    `min=${summary.minExecutionTime.toFixed(3)} ms, max=${summary.maxExecutionTime.toFixed(3)} ms, ` +
    `avgComparisons=${summary.avgComparisons.toFixed(1)}, ` +
    `avgAccesses=${summary.avgArrayAccesses.toFixed(1)}, ` +
    `avgAllocations=${summary.avgMemoryAllocations.toFixed(1)}`
  );
}

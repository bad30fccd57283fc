/**
 * Boyer-Moore Majority Vote
 *
 * Instrumented two-pass majority search: a candidate pass followed by a
 * verification pass that stops as soon as the candidate is known to occur
 * more than n/2 times. Every call reports comparisons, element accesses,
 * allocations and elapsed time alongside its answer.
 */

import {
  EmptyInputError,
  NullElementError,
  NullInputError,
  UnexpectedFaultError,
  ValidationFailure,
  VoteError,
  errorMessage,
} from '../errors.js';
import { Clock, Sequence } from '../types.js';

const defaultClock: Clock = () => process.hrtime.bigint();

/**
 * Counters for one algorithm invocation
 */
export class Metrics {
  private comparisonCount = 0;
  private accessCount = 0;
  private allocationCount = 0;
  private startTime: bigint | null = null;
  private endTime: bigint | null = null;
  private readonly clock: Clock;

  constructor(clock: Clock = defaultClock) {
    this.clock = clock;
  }

  incrementComparisons(): void {
    this.comparisonCount++;
  }

  incrementArrayAccesses(): void {
    this.accessCount++;
  }

  incrementMemoryAllocations(): void {
    this.allocationCount++;
  }

  startTimer(): void {
    this.startTime = this.clock();
  }

  endTimer(): void {
    this.endTime = this.clock();
  }

  get comparisons(): number {
    return this.comparisonCount;
  }

  get arrayAccesses(): number {
    return this.accessCount;
  }

  get memoryAllocations(): number {
    return this.allocationCount;
  }

  /**
   * Elapsed time, 0 until both timer ends are set
   */
  get executionTimeNanos(): number {
    if (this.startTime === null || this.endTime === null || this.endTime < this.startTime) {
      return 0;
    }
    return Number(this.endTime - this.startTime);
  }

  get executionTimeMillis(): number {
    return this.executionTimeNanos / 1_000_000;
  }

  reset(): void {
    this.comparisonCount = 0;
    this.accessCount = 0;
    this.allocationCount = 0;
    this.startTime = null;
    this.endTime = null;
  }

  toJSON(): Record<string, number> {
    return {
      comparisons: this.comparisonCount,
      arrayAccesses: this.accessCount,
      memoryAllocations: this.allocationCount,
      executionTimeNanos: this.executionTimeNanos,
    };
  }

  toString(): string {
    return formatMetrics(this);
  }
}

/**
 * Successful run; `candidate` is null only for an empty sequence or an
 * absent winning element
 */
export interface VoteSuccess {
  candidate: number | null;
  hasMajority: boolean;
  metrics: Metrics;
  error?: undefined;
}

/**
 * Failed run
 */
export interface VoteFailure {
  candidate: null;
  hasMajority: false;
  metrics: Metrics;
  error: VoteError;
}

export type VoteResult = VoteSuccess | VoteFailure;

export interface FindMajorityOptions {
  clock?: Clock;
}

/**
 * Signature shared by findMajority and stand-ins used by the harness
 */
export type MajorityFinder = (sequence: Sequence | null | undefined) => VoteResult;

export function hasError(result: VoteResult): result is VoteFailure {
  return result.error !== undefined;
}

function failure(error: VoteError, metrics: Metrics): VoteFailure {
  metrics.endTimer();
  return { candidate: null, hasMajority: false, metrics, error };
}

function success(candidate: number | null, hasMajority: boolean, metrics: Metrics): VoteSuccess {
  metrics.endTimer();
  return { candidate, hasMajority, metrics };
}

/**
 * Find the element occurring more than n/2 times, if any.
 * Never throws: faults come back as a failed VoteResult.
 */
export function findMajority(
  sequence: Sequence | null | undefined,
  options: FindMajorityOptions = {}
): VoteResult {
  const metrics = new Metrics(options.clock);
  metrics.startTimer();
  metrics.incrementMemoryAllocations(); // metrics + result

  try {
    if (sequence === null || sequence === undefined) {
      return failure(new NullInputError(), metrics);
    }

    metrics.incrementArrayAccesses(); // null check

    if (sequence.length === 0) {
      return success(null, false, metrics);
    }

    metrics.incrementArrayAccesses(); // length check

    if (sequence.length === 1) {
      metrics.incrementArrayAccesses();
      return success(sequence[0], true, metrics);
    }

    const candidate = findCandidate(sequence, metrics);
    const isMajority = verifyCandidate(sequence, candidate, metrics);

    return success(candidate, isMajority, metrics);
  } catch (error) {
    return failure(new UnexpectedFaultError(errorMessage(error)), metrics);
  }
}

function findCandidate(sequence: Sequence, metrics: Metrics): number | null {
  let candidate: number | null = null;
  let count = 0;

  for (let i = 0; i < sequence.length; i++) {
    metrics.incrementArrayAccesses();
    const element = sequence[i];

    if (count === 0) {
      candidate = element;
      count = 1;
    } else {
      metrics.incrementComparisons();
      if (element === candidate) {
        count++;
      } else {
        count--;
      }
    }
  }

  return candidate;
}

function verifyCandidate(sequence: Sequence, candidate: number | null, metrics: Metrics): boolean {
  if (candidate === null) {
    return false;
  }

  const threshold = Math.floor(sequence.length / 2) + 1;
  let count = 0;

  for (let i = 0; i < sequence.length; i++) {
    metrics.incrementArrayAccesses();
    metrics.incrementComparisons();

    if (sequence[i] === candidate) {
      count++;
      if (count >= threshold) {
        return true;
      }
    }
  }

  return count > sequence.length / 2;
}

/**
 * Check a sequence before running it; null when it is usable
 */
export function validateInput(sequence: Sequence | null | undefined): ValidationFailure | null {
  if (sequence === null || sequence === undefined) {
    return new NullInputError();
  }

  if (sequence.length === 0) {
    return new EmptyInputError();
  }

  for (let i = 0; i < sequence.length; i++) {
    if (sequence[i] === null || sequence[i] === undefined) {
      return new NullElementError(i);
    }
  }

  return null;
}

export function formatMetrics(metrics: Metrics): string {
  return (
    `Metrics{comparisons=${metrics.comparisons}, arrayAccesses=${metrics.arrayAccesses}, ` +
    `memoryAllocations=${metrics.memoryAllocations}, executionTime=${metrics.executionTimeMillis.toFixed(3)} ms}`
  );
}

export function formatVoteResult(result: VoteResult): string {
  if (hasError(result)) {
    return `Result{error='${result.error.message}', ${formatMetrics(result.metrics)}}`;
  }
  return `Result{majorityElement=${result.candidate}, hasMajority=${result.hasMajority}, ${formatMetrics(result.metrics)}}`;
}

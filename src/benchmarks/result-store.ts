/**
 * Result Store
 *
 * Append-only, in-memory history of benchmark samples keyed by
 * (algorithm, input size, majority flag). Appends are synchronous, so a
 * batch lands in one piece even when several benchmark tasks interleave
 * on the event loop.
 */

import { formatCsv, formatReport } from './exporter.js';
import { PerformanceSummary } from './summary.js';
import { PerformanceSample, ResultKey } from './types.js';

interface StoreEntry {
  key: ResultKey;
  samples: PerformanceSample[];
}

export function resultKeyId(key: ResultKey): string {
  return `${key.algorithmName}_${key.inputSize}_${key.majority}`;
}

export class ResultStore {
  private entries: Map<string, StoreEntry> = new Map();

  /**
   * Append one sample; the majority flag defaults to the sample's outcome
   */
  record(sample: PerformanceSample, majority: boolean = sample.hasMajority): void {
    this.recordAll(
      { algorithmName: sample.algorithmName, inputSize: sample.inputSize, majority },
      [sample]
    );
  }

  /**
   * Append a batch under one key
   */
  recordAll(key: ResultKey, samples: readonly PerformanceSample[]): void {
    const id = resultKeyId(key);
    let entry = this.entries.get(id);
    if (!entry) {
      entry = { key: { ...key }, samples: [] };
      this.entries.set(id, entry);
    }
    entry.samples.push(...samples);
  }

  /**
   * All samples of an algorithm, across sizes and majority flags
   */
  query(algorithmName: string): PerformanceSample[] {
    const results: PerformanceSample[] = [];
    for (const entry of this.entries.values()) {
      if (entry.key.algorithmName === algorithmName) {
        results.push(...entry.samples);
      }
    }
    return results;
  }

  /**
   * Summary of an algorithm at one size, null when nothing was recorded
   */
  summarize(algorithmName: string, inputSize: number): PerformanceSummary | null {
    const sizeResults = this.query(algorithmName).filter(s => s.inputSize === inputSize);
    return sizeResults.length === 0
      ? null
      : new PerformanceSummary(algorithmName, inputSize, sizeResults);
  }

  /**
   * Samples stored under one exact key
   */
  get(key: ResultKey): PerformanceSample[] {
    return [...(this.entries.get(resultKeyId(key))?.samples ?? [])];
  }

  keys(): ResultKey[] {
    return [...this.entries.values()].map(entry => ({ ...entry.key }));
  }

  all(): PerformanceSample[] {
    const results: PerformanceSample[] = [];
    for (const entry of this.entries.values()) {
      results.push(...entry.samples);
    }
    return results;
  }

  /**
   * Total number of stored samples
   */
  get size(): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      count += entry.samples.length;
    }
    return count;
  }

  clear(): void {
    this.entries.clear();
  }

  exportCsv(): string {
    return formatCsv(this.all());
  }

  exportReport(): string {
    return formatReport(this.all());
  }
}

/**
 * CSV and text report rendering for stored samples
 */

import * as fs from 'fs';
import * as path from 'path';
import { ExportError, errorMessage } from '../errors.js';
import { PerformanceSummary, formatSummary } from './summary.js';
import type { ResultStore } from './result-store.js';
import { ExportOptions, ExportPaths, PerformanceSample } from './types.js';

export const CSV_HEADER =
  'Algorithm,InputSize,ExecutionTimeMs,Comparisons,ArrayAccesses,MemoryAllocations,HasMajority,Timestamp';

export const REPORT_TITLE = '=== Performance Analysis Report ===';

export function formatCsvRow(sample: PerformanceSample): string {
  return [
    sample.algorithmName,
    sample.inputSize,
    sample.executionTimeMillis.toFixed(6),
    sample.comparisons,
    sample.arrayAccesses,
    sample.memoryAllocations,
    sample.hasMajority,
    sample.timestamp,
  ].join(',');
}

/**
 * Header plus one row per sample, every line newline-terminated
 */
export function formatCsv(samples: readonly PerformanceSample[]): string {
  const lines = [CSV_HEADER, ...samples.map(formatCsvRow)];
  return lines.map(line => `${line}\n`).join('');
}

/**
 * Group samples by algorithm (first-seen order), then by size ascending
 */
export function formatReport(samples: readonly PerformanceSample[]): string {
  const lines: string[] = [REPORT_TITLE, ''];

  const byAlgorithm = new Map<string, PerformanceSample[]>();
  for (const sample of samples) {
    const existing = byAlgorithm.get(sample.algorithmName) || [];
    existing.push(sample);
    byAlgorithm.set(sample.algorithmName, existing);
  }

  for (const [algorithm, algorithmSamples] of byAlgorithm) {
    lines.push(`Algorithm: ${algorithm}`);
    lines.push(`Total runs: ${algorithmSamples.length}`);

    const bySize = new Map<number, PerformanceSample[]>();
    for (const sample of algorithmSamples) {
      const existing = bySize.get(sample.inputSize) || [];
      existing.push(sample);
      bySize.set(sample.inputSize, existing);
    }

    const sizes = [...bySize.keys()].sort((a, b) => a - b);
    for (const size of sizes) {
      const summary = new PerformanceSummary(algorithm, size, bySize.get(size) || []);
      lines.push(`  Input size ${size}: ${formatSummary(summary)}`);
    }

    lines.push('');
  }

  return lines.map(line => `${line}\n`).join('');
}

/**
 * Write <basename>.csv and <basename>.txt under outputDir
 */
export function saveExports(store: ResultStore, options: ExportOptions): ExportPaths {
  const csvPath = path.join(options.outputDir, `${options.basename}.csv`);
  const reportPath = path.join(options.outputDir, `${options.basename}.txt`);

  try {
    if (!fs.existsSync(options.outputDir)) {
      fs.mkdirSync(options.outputDir, { recursive: true });
    }
    fs.writeFileSync(csvPath, store.exportCsv());
    fs.writeFileSync(reportPath, store.exportReport());
  } catch (error) {
    throw new ExportError(options.outputDir, errorMessage(error));
  }

  return { csvPath, reportPath };
}

/**
 * Console walkthroughs shared by the one-shot commands and the menu
 */

import {
  findMajority,
  formatVoteResult,
  generateTestArray,
  validateInput,
} from '../algorithms/index.js';
import { ComparisonResult, MajorityBenchmark, SizeSummaries, formatSummary } from '../benchmarks/index.js';
import { BenchConfig } from '../types.js';
import { formatSequence } from '../utils/parse.js';

const DEMO_CASES: Array<{ title: string; input: number[] }> = [
  { title: 'Array with majority element', input: [1, 1, 2, 1, 3, 1, 4] },
  { title: 'Array without majority element', input: [1, 2, 3, 4, 5] },
  { title: 'Array with negative numbers', input: [-1, -1, -1, 2, 3] },
  { title: 'Edge case - single element', input: [42] },
  { title: 'Edge case - empty array', input: [] },
];

export function printSummaries(summaries: SizeSummaries, indent: string = ''): void {
  if (summaries.size === 0) {
    console.log(`${indent}No successful trials.`);
    return;
  }
  for (const summary of summaries.values()) {
    console.log(`${indent}${formatSummary(summary)}`);
  }
}

export function printComparison(comparison: ComparisonResult): void {
  for (const [group, summaries] of Object.entries(comparison)) {
    console.log(`\n${group}:`);
    printSummaries(summaries, '  ');
  }
}

/**
 * Run the example arrays through the engine
 */
export function runDemo(): void {
  console.log('\n=== Algorithm Demonstration ===');

  DEMO_CASES.forEach((demoCase, index) => {
    console.log(`\n${index + 1}. ${demoCase.title}:`);
    console.log(`Input: ${formatSequence(demoCase.input)}`);
    console.log(`Result: ${formatVoteResult(findMajority(demoCase.input))}`);
  });
}

/**
 * Validation, generation and per-size metrics printout
 */
export function runBasicTests(config: BenchConfig): void {
  console.log('\n=== Running Basic Tests ===');

  console.log('\n1. Input Validation Tests:');
  console.log(`Null input: ${validateInput(null)?.message ?? 'valid'}`);
  console.log(`Empty input: ${validateInput([])?.message ?? 'valid'}`);
  console.log(`Null element: ${validateInput([1, null, 3])?.message ?? 'valid'}`);
  console.log(`Valid input: ${validateInput([1, 2, 3])?.message ?? 'valid'}`);

  console.log('\n2. Array Generation Tests:');
  console.log(`Array with majority (size 10): ${formatSequence(generateTestArray(10, true))}`);
  console.log(`Array without majority (size 10): ${formatSequence(generateTestArray(10, false))}`);

  console.log('\n3. Performance Tests:');
  for (const size of config.basicTestSizes) {
    const { metrics } = findMajority(generateTestArray(size, true));
    console.log(
      `Size ${size}: ${metrics.comparisons} comparisons, ${metrics.arrayAccesses} accesses, ` +
      `${metrics.executionTimeMillis.toFixed(3)} ms`
    );
  }
}

/**
 * Examples followed by a short performance pass over the demo sizes
 */
export function runQuickDemo(benchmark: MajorityBenchmark, config: BenchConfig): void {
  console.log('=== Running Demo ===');

  console.log('\n1. Basic Functionality Test:');
  const withMajority = DEMO_CASES[0].input;
  console.log(`Array: ${formatSequence(withMajority)}`);
  console.log(`Result: ${formatVoteResult(findMajority(withMajority))}`);

  console.log('\n2. No Majority Test:');
  const withoutMajority = DEMO_CASES[1].input;
  console.log(`Array: ${formatSequence(withoutMajority)}`);
  console.log(`Result: ${formatVoteResult(findMajority(withoutMajority))}`);

  console.log('\n3. Performance Test:');
  printSummaries(benchmark.runMatrix(config.demoSizes, true, config.demoRuns));
}

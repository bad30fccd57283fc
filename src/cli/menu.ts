/**
 * Interactive benchmark menu
 */

import * as p from '@clack/prompts';
import { findMajority, formatVoteResult, validateInput } from '../algorithms/index.js';
import {
  MajorityBenchmark,
  PerformanceSummary,
  formatSummary,
  saveExports,
  sizeRange,
  stressSizes,
} from '../benchmarks/index.js';
import { InvalidInputError, PromptCancelledError, errorMessage } from '../errors.js';
import { BenchConfig } from '../types.js';
import { getMemoryUsageStats } from '../utils/memory.js';
import {
  formatSequence,
  parseInteger,
  parseIntegerList,
  parseYesNo,
} from '../utils/parse.js';
import { printComparison, printSummaries } from './demo.js';

type MenuChoice = '1' | '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | '0';

const MENU_OPTIONS: Array<{ value: MenuChoice; label: string }> = [
  { value: '1', label: '1. Run Single Test' },
  { value: '2', label: '2. Quick Benchmark' },
  { value: '3', label: '3. Comprehensive Benchmark' },
  { value: '4', label: '4. Comparison Test (Majority vs No Majority)' },
  { value: '5', label: '5. Interactive Test' },
  { value: '6', label: '6. Display Results' },
  { value: '7', label: '7. Export Results' },
  { value: '8', label: '8. Memory Statistics' },
  { value: '9', label: '9. Stress Test' },
  { value: '0', label: '0. Exit' },
];

function isMenuChoice(value: unknown): value is MenuChoice {
  return MENU_OPTIONS.some(option => option.value === value);
}

async function ask(message: string, defaultValue?: string): Promise<string> {
  const answer = await p.text({
    message,
    placeholder: defaultValue,
    defaultValue,
  });
  if (p.isCancel(answer)) {
    throw new PromptCancelledError(message);
  }
  return answer;
}

async function askInteger(message: string, min: number = 0): Promise<number> {
  return parseInteger(await ask(message), message, { min });
}

function elapsedSince(start: number): string {
  return `${Date.now() - start} ms`;
}

export class BenchmarkMenu {
  constructor(
    private readonly benchmark: MajorityBenchmark,
    private readonly config: BenchConfig
  ) {}

  /**
   * Loop until the user exits; errors are reported and the loop continues
   */
  async run(): Promise<void> {
    p.intro('Boyer-Moore Majority Vote Benchmark Runner');

    while (true) {
      const choice = await p.select({
        message: 'Main Menu',
        options: MENU_OPTIONS,
      });

      if (p.isCancel(choice) || choice === '0') {
        p.outro('Goodbye!');
        return;
      }
      if (!isMenuChoice(choice)) {
        continue;
      }

      try {
        await this.handle(choice);
      } catch (error) {
        if (error instanceof PromptCancelledError) {
          p.log.info('Cancelled');
        } else {
          p.log.error(`Error: ${errorMessage(error)}`);
          p.log.message('Please try again.');
        }
      }
    }
  }

  private async handle(choice: MenuChoice): Promise<void> {
    switch (choice) {
      case '1':
        return this.runSingleTest();
      case '2':
        return this.runQuickBenchmark();
      case '3':
        return this.runComprehensiveBenchmark();
      case '4':
        return this.runComparisonTest();
      case '5':
        return this.runInteractiveTest();
      case '6':
        return this.displayResults();
      case '7':
        return this.exportResults();
      case '8':
        return this.displayMemoryStats();
      case '9':
        return this.runStressTest();
      case '0':
        return;
    }
  }

  private async runSingleTest(): Promise<void> {
    const size = await askInteger('Enter array size:');
    const hasMajority = parseYesNo(await ask('Should array have majority element? (y/n)', 'y'));
    const runs = await askInteger('Number of runs:', 1);

    const start = Date.now();
    const samples = this.benchmark.runTrials(size, hasMajority, runs);

    console.log(`Test completed in ${elapsedSince(start)}`);
    console.log(`Results for ${samples.length} runs:`);
    if (samples.length > 0) {
      console.log(formatSummary(new PerformanceSummary(this.benchmark.algorithmName, size, samples)));
    }
  }

  private async runQuickBenchmark(): Promise<void> {
    const { quickSizes, quickRuns } = this.config;
    console.log(`Running quick benchmark with sizes: ${formatSequence(quickSizes)}`);
    console.log(`Runs per size: ${quickRuns}`);

    const start = Date.now();
    const summaries = this.benchmark.runMatrix(quickSizes, true, quickRuns);
    console.log(`Benchmark completed in ${elapsedSince(start)}\n\nResults:`);
    printSummaries(summaries);
  }

  private async runComprehensiveBenchmark(): Promise<void> {
    const minSize = await askInteger('Enter minimum size:');
    const maxSize = await askInteger('Enter maximum size:', minSize);
    const step = await askInteger('Enter step size:', 1);
    const runs = await askInteger('Runs per size:', 1);
    const hasMajority = parseYesNo(await ask('Should arrays have majority elements? (y/n)', 'y'));

    const sizes = sizeRange(minSize, maxSize, step);
    console.log(`Sizes: ${formatSequence(sizes)}`);
    console.log(`Runs per size: ${runs}`);

    const start = Date.now();
    const summaries = this.benchmark.runMatrix(sizes, hasMajority, runs);
    console.log(`Benchmark completed in ${elapsedSince(start)}\n\nResults:`);
    printSummaries(summaries);
  }

  private async runComparisonTest(): Promise<void> {
    const sizes = parseIntegerList(await ask('Enter array sizes (comma-separated):'), 'array sizes', { min: 0 });
    const runs = await askInteger('Runs per configuration:', 1);

    const start = Date.now();
    const comparison = this.benchmark.compareMajorityVsNone(sizes, runs);
    console.log(`Comparison completed in ${elapsedSince(start)}\n\nResults:`);
    printComparison(comparison);
  }

  private async runInteractiveTest(): Promise<void> {
    while (true) {
      const input = await ask("Enter array elements (comma-separated, or 'quit' to exit):");
      if (input.trim().toLowerCase() === 'quit') {
        return;
      }

      let array: number[];
      try {
        array = parseIntegerList(input, 'array elements');
      } catch (error) {
        if (!(error instanceof InvalidInputError)) throw error;
        p.log.warn('Invalid input. Please enter comma-separated integers.');
        continue;
      }

      console.log(`Array: ${formatSequence(array)}`);

      const invalid = validateInput(array);
      if (invalid) {
        console.log(`Error: ${invalid.message}`);
        continue;
      }

      const result = findMajority(array);
      if (result.error) {
        console.log(`Error: ${result.error.message}`);
      } else {
        console.log(`Result: ${formatVoteResult(result)}`);
      }
    }
  }

  private displayResults(): void {
    if (this.benchmark.store.size === 0) {
      console.log('No results stored.');
      return;
    }
    console.log(this.benchmark.store.exportReport());
  }

  private async exportResults(): Promise<void> {
    const basename = (await ask('Enter filename (without extension):', '')).trim()
      || `benchmark_results_${Date.now()}`;

    console.log('CSV Data:');
    console.log(this.benchmark.store.exportCsv());
    console.log('\nReport Data:');
    console.log(this.benchmark.store.exportReport());

    const paths = saveExports(this.benchmark.store, { outputDir: this.config.outputDir, basename });
    p.log.success(`Results exported to ${paths.csvPath} and ${paths.reportPath}`);
  }

  private displayMemoryStats(): void {
    console.log(getMemoryUsageStats());
  }

  private async runStressTest(): Promise<void> {
    const maxSize = await askInteger('Enter maximum array size for stress test:');
    const runs = await askInteger('Number of test runs:', 1);

    console.log(`Running stress test with sizes: ${formatSequence(stressSizes(maxSize))}`);
    console.log(`Runs per size: ${runs}`);

    const start = Date.now();
    printSummaries(this.benchmark.runStressTest(maxSize, runs));
    console.log(`Stress test completed in ${elapsedSince(start)}`);
  }
}

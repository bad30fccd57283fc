#!/usr/bin/env node
/**
 * Majority Bench CLI
 * Command-line interface for the majority vote benchmark harness
 */

import * as p from '@clack/prompts';
import { Command } from 'commander';
import { MajorityBenchmark, saveExports } from '../benchmarks/index.js';
import { errorMessage } from '../errors.js';
import { loadConfig, validateConfig } from '../utils/config.js';
import { formatSequence, parseInteger, parseIntegerList } from '../utils/parse.js';
import { printComparison, printSummaries, runBasicTests, runDemo, runQuickDemo } from './demo.js';
import { BenchmarkMenu } from './menu.js';

function createBenchmark(): MajorityBenchmark {
  const config = loadConfig();
  const { valid, errors } = validateConfig();
  if (!valid) {
    for (const error of errors) {
      console.warn(`Config: ${error}`);
    }
  }
  return new MajorityBenchmark({ verbose: config.verbose });
}

async function startMenu(): Promise<void> {
  console.log('\n=== Starting CLI Interface ===');
  await new BenchmarkMenu(createBenchmark(), loadConfig()).run();
}

const program = new Command();

program
  .name('majority-bench')
  .description('Boyer-Moore majority vote with instrumentation and benchmarks')
  .version('1.0.0');

// Demo command
program
  .command('demo')
  .description('Run algorithm demonstration')
  .action(() => {
    runDemo();
  });

// Interactive menu
program
  .command('cli')
  .description('Start interactive CLI interface')
  .action(async () => {
    try {
      await startMenu();
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });

// Basic tests
program
  .command('test')
  .description('Run basic validation, generation and performance checks')
  .action(() => {
    runBasicTests(loadConfig());
  });

// Benchmark command
program
  .command('benchmark')
  .description('Run a benchmark over a list of input sizes')
  .option('-s, --sizes <sizes>', 'Comma-separated input sizes')
  .option('-r, --runs <runs>', 'Runs per size')
  .option('--no-majority', 'Generate inputs without a majority element')
  .option('-c, --compare', 'Compare inputs with and without a majority element')
  .option('-e, --export <basename>', 'Write <basename>.csv and <basename>.txt to the output directory')
  .option('--demo', 'Run the quick demo instead of a custom benchmark')
  .action((options: {
    sizes?: string;
    runs?: string;
    majority: boolean;
    compare?: boolean;
    export?: string;
    demo?: boolean;
  }) => {
    try {
      const config = loadConfig();
      const benchmark = createBenchmark();

      if (options.demo) {
        runQuickDemo(benchmark, config);
        return;
      }

      const sizes = options.sizes
        ? parseIntegerList(options.sizes, 'sizes', { min: 0 })
        : config.quickSizes;
      const runs = options.runs
        ? parseInteger(options.runs, 'runs', { min: 1 })
        : config.quickRuns;

      console.log('\n=== Benchmark ===');
      console.log(`Sizes: ${formatSequence(sizes)}`);
      console.log(`Runs per size: ${runs}`);

      const start = Date.now();
      if (options.compare) {
        printComparison(benchmark.compareMajorityVsNone(sizes, runs));
      } else {
        console.log();
        printSummaries(benchmark.runMatrix(sizes, options.majority, runs));
      }
      console.log(`\nBenchmark completed in ${Date.now() - start} ms`);

      if (options.export) {
        const paths = saveExports(benchmark.store, {
          outputDir: config.outputDir,
          basename: options.export,
        });
        console.log(`Results exported to ${paths.csvPath} and ${paths.reportPath}`);
      }
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });

// Launcher when no command is given
program.action(async () => {
  console.log('=== Boyer-Moore Majority Vote Algorithm Implementation ===\n');

  const choice = await p.select({
    message: 'Choose an option:',
    options: [
      { value: 'demo', label: '1. Run Demo' },
      { value: 'cli', label: '2. Start CLI Interface' },
      { value: 'test', label: '3. Run Basic Tests' },
      { value: 'benchmark', label: '4. Run Quick Benchmark' },
      { value: 'exit', label: '5. Exit' },
    ],
  });

  if (p.isCancel(choice) || choice === 'exit') {
    console.log('Goodbye!');
    return;
  }

  try {
    switch (choice) {
      case 'demo':
        runDemo();
        break;
      case 'cli':
        await startMenu();
        break;
      case 'test':
        runBasicTests(loadConfig());
        break;
      case 'benchmark':
        runQuickDemo(createBenchmark(), loadConfig());
        break;
    }
  } catch (error) {
    console.error('Error:', errorMessage(error));
    process.exit(1);
  }
});

program.parseAsync().catch(error => {
  console.error('Error:', errorMessage(error));
  process.exit(1);
});

/**
 * Configuration Management for Majority Bench
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { BenchConfig } from '../types.js';

const DEFAULT_CONFIG: BenchConfig = {
  algorithmName: 'BoyerMooreMajorityVote',

  quickSizes: [100, 1000, 10000, 100000],
  quickRuns: 10,

  demoSizes: [1000, 10000, 100000],
  demoRuns: 5,

  basicTestSizes: [100, 1000, 10000],

  outputDir: path.join('.', 'benchmark-results'),

  verbose: false,
};

/**
 * Shape accepted from a config file; every field is optional
 */
const ConfigFileSchema = z
  .object({
    algorithmName: z.string().min(1),
    quickSizes: z.array(z.number().int().nonnegative()),
    quickRuns: z.number().int().positive(),
    demoSizes: z.array(z.number().int().nonnegative()),
    demoRuns: z.number().int().positive(),
    basicTestSizes: z.array(z.number().int().nonnegative()),
    outputDir: z.string().min(1),
    verbose: z.boolean(),
  })
  .partial();

const EnvRunsSchema = z.coerce.number().int().positive();

let currentConfig: BenchConfig = cloneConfig(DEFAULT_CONFIG);
let configLoaded = false;

function cloneConfig(config: BenchConfig): BenchConfig {
  return {
    ...config,
    quickSizes: [...config.quickSizes],
    demoSizes: [...config.demoSizes],
    basicTestSizes: [...config.basicTestSizes],
  };
}

/**
 * Default config file location
 */
export function getDefaultConfigPath(): string {
  return path.join(
    process.env.HOME || process.env.USERPROFILE || '',
    '.majority-bench',
    'config.json'
  );
}

/**
 * Load configuration from file and environment
 * Idempotent - only loads once unless a specific configPath is provided
 */
export function loadConfig(configPath?: string): BenchConfig {
  if (configLoaded && !configPath) {
    return currentConfig;
  }

  const filePath = configPath || getDefaultConfigPath();

  currentConfig = cloneConfig(DEFAULT_CONFIG);

  if (fs.existsSync(filePath)) {
    try {
      const fileContent = fs.readFileSync(filePath, 'utf-8');
      const parsed = ConfigFileSchema.safeParse(JSON.parse(fileContent));
      if (parsed.success) {
        currentConfig = { ...currentConfig, ...parsed.data };
      } else {
        const issues = parsed.error.issues
          .map(issue => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ');
        console.warn(`Ignoring invalid config in ${filePath}: ${issues}`);
      }
    } catch (error) {
      console.warn(`Failed to load config from ${filePath}:`, error);
    }
  }

  // Override with environment variables
  if (process.env.MAJORITY_BENCH_ALGORITHM) {
    currentConfig.algorithmName = process.env.MAJORITY_BENCH_ALGORITHM;
  }
  if (process.env.MAJORITY_BENCH_RUNS) {
    const runs = EnvRunsSchema.safeParse(process.env.MAJORITY_BENCH_RUNS);
    if (runs.success) {
      currentConfig.quickRuns = runs.data;
    } else {
      console.warn(`Ignoring MAJORITY_BENCH_RUNS='${process.env.MAJORITY_BENCH_RUNS}': expected a positive integer`);
    }
  }
  if (process.env.MAJORITY_BENCH_OUTPUT_DIR) {
    currentConfig.outputDir = process.env.MAJORITY_BENCH_OUTPUT_DIR;
  }
  if (process.env.MAJORITY_BENCH_VERBOSE === 'true') {
    currentConfig.verbose = true;
  }

  configLoaded = true;
  return currentConfig;
}

/**
 * Get current configuration
 */
export function getConfig(): BenchConfig {
  return currentConfig;
}

/**
 * Update configuration (marks config as loaded to prevent reset)
 */
export function updateConfig(updates: Partial<BenchConfig>): BenchConfig {
  currentConfig = { ...currentConfig, ...updates };
  configLoaded = true;
  return currentConfig;
}

/**
 * Reset configuration to defaults (for testing)
 */
export function resetConfig(): void {
  currentConfig = cloneConfig(DEFAULT_CONFIG);
  configLoaded = false;
}

/**
 * Save configuration to file
 */
export function saveConfig(configPath?: string): void {
  const filePath = configPath || getDefaultConfigPath();

  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  fs.writeFileSync(filePath, JSON.stringify(currentConfig, null, 2));
}

/**
 * Validate configuration
 */
export function validateConfig(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!currentConfig.algorithmName.trim()) {
    errors.push('algorithmName must not be empty');
  }

  if (!Number.isInteger(currentConfig.quickRuns) || currentConfig.quickRuns < 1) {
    errors.push('quickRuns must be a positive integer');
  }

  if (!Number.isInteger(currentConfig.demoRuns) || currentConfig.demoRuns < 1) {
    errors.push('demoRuns must be a positive integer');
  }

  const sizeLists: Array<[string, number[]]> = [
    ['quickSizes', currentConfig.quickSizes],
    ['demoSizes', currentConfig.demoSizes],
    ['basicTestSizes', currentConfig.basicTestSizes],
  ];
  for (const [name, sizes] of sizeLists) {
    if (sizes.some(size => !Number.isInteger(size) || size < 0)) {
      errors.push(`${name} must contain non-negative integers`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

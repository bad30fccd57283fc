/**
 * Tests for configuration management
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  loadConfig,
  getConfig,
  getDefaultConfigPath,
  updateConfig,
  saveConfig,
  validateConfig,
  resetConfig,
} from '../src/utils/config.js';

describe('Configuration', () => {
  let testDir: string;
  let originalEnv: NodeJS.ProcessEnv;

  beforeAll(() => {
    testDir = path.join(os.tmpdir(), `majority-bench-config-test-${Date.now()}`);
    fs.mkdirSync(testDir, { recursive: true });
    originalEnv = { ...process.env };
  });

  afterAll(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
    process.env = originalEnv;
    resetConfig();
  });

  beforeEach(() => {
    // Reset config state for test isolation
    resetConfig();
    delete process.env.MAJORITY_BENCH_ALGORITHM;
    delete process.env.MAJORITY_BENCH_RUNS;
    delete process.env.MAJORITY_BENCH_OUTPUT_DIR;
    delete process.env.MAJORITY_BENCH_VERBOSE;
  });

  describe('loadConfig', () => {
    it('should load default config', () => {
      const config = loadConfig(path.join(testDir, 'nonexistent.json'));

      expect(config.algorithmName).toBe('BoyerMooreMajorityVote');
      expect(config.quickSizes).toEqual([100, 1000, 10000, 100000]);
      expect(config.quickRuns).toBe(10);
      expect(config.demoSizes).toEqual([1000, 10000, 100000]);
      expect(config.demoRuns).toBe(5);
      expect(config.basicTestSizes).toEqual([100, 1000, 10000]);
      expect(config.outputDir).toBe('benchmark-results');
      expect(config.verbose).toBe(false);
    });

    it('should merge file config with defaults', () => {
      const configPath = path.join(testDir, 'test-config.json');
      fs.writeFileSync(configPath, JSON.stringify({
        quickRuns: 3,
        demoSizes: [10, 20],
      }));

      const config = loadConfig(configPath);

      expect(config.quickRuns).toBe(3);
      expect(config.demoSizes).toEqual([10, 20]);
      expect(config.demoRuns).toBe(5); // Default
    });

    it('should ignore a file that fails validation', () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const configPath = path.join(testDir, 'invalid-config.json');
      fs.writeFileSync(configPath, JSON.stringify({ quickRuns: 0 }));

      try {
        const config = loadConfig(configPath);

        expect(config.quickRuns).toBe(10);
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn.mock.calls[0][0]).toMatch(/^Ignoring invalid config in .*invalid-config\.json: quickRuns: /);
      } finally {
        warn.mockRestore();
      }
    });

    it('should ignore a file that is not JSON', () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const configPath = path.join(testDir, 'broken-config.json');
      fs.writeFileSync(configPath, '{ not json');

      try {
        const config = loadConfig(configPath);

        expect(config.quickRuns).toBe(10);
        expect(warn).toHaveBeenCalledWith(`Failed to load config from ${configPath}:`, expect.any(SyntaxError));
      } finally {
        warn.mockRestore();
      }
    });

    it('should override with environment variables', () => {
      process.env.MAJORITY_BENCH_ALGORITHM = 'EnvAlgorithm';
      process.env.MAJORITY_BENCH_RUNS = '7';
      process.env.MAJORITY_BENCH_OUTPUT_DIR = '/tmp/bench-out';
      process.env.MAJORITY_BENCH_VERBOSE = 'true';

      const config = loadConfig(path.join(testDir, 'nonexistent.json'));

      expect(config.algorithmName).toBe('EnvAlgorithm');
      expect(config.quickRuns).toBe(7);
      expect(config.outputDir).toBe('/tmp/bench-out');
      expect(config.verbose).toBe(true);
    });

    it('should only load once without an explicit path', () => {
      const first = loadConfig(path.join(testDir, 'nonexistent.json'));
      process.env.MAJORITY_BENCH_ALGORITHM = 'Later';

      expect(loadConfig()).toBe(first);
      expect(loadConfig().algorithmName).toBe('BoyerMooreMajorityVote');
    });

    it('should not leak file values into the defaults', () => {
      const configPath = path.join(testDir, 'sizes-config.json');
      fs.writeFileSync(configPath, JSON.stringify({ quickRuns: 2 }));
      loadConfig(configPath).quickSizes.push(5);

      resetConfig();

      expect(getConfig().quickSizes).toEqual([100, 1000, 10000, 100000]);
    });
  });

  describe('getDefaultConfigPath', () => {
    it('should live under the home directory', () => {
      expect(getDefaultConfigPath().endsWith(path.join('.majority-bench', 'config.json'))).toBe(true);
    });
  });

  describe('updateConfig', () => {
    it('should update config values', () => {
      loadConfig(path.join(testDir, 'nonexistent.json'));

      const updated = updateConfig({ demoRuns: 2 });

      expect(updated.demoRuns).toBe(2);
      expect(getConfig().demoRuns).toBe(2);
    });

    it('should survive a later implicit load', () => {
      updateConfig({ algorithmName: 'Pinned' });
      expect(loadConfig().algorithmName).toBe('Pinned');
    });
  });

  describe('saveConfig', () => {
    it('should save config to file', () => {
      const configPath = path.join(testDir, 'saved', 'config.json');
      loadConfig(path.join(testDir, 'nonexistent.json'));
      updateConfig({ quickRuns: 4 });

      saveConfig(configPath);

      const saved = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      expect(saved.quickRuns).toBe(4);
      expect(saved.algorithmName).toBe('BoyerMooreMajorityVote');
    });

    it('should round-trip through loadConfig', () => {
      const configPath = path.join(testDir, 'roundtrip.json');
      updateConfig({ basicTestSizes: [1, 2, 3] });
      saveConfig(configPath);

      resetConfig();

      expect(loadConfig(configPath).basicTestSizes).toEqual([1, 2, 3]);
    });
  });

  describe('validateConfig', () => {
    it('should accept the defaults', () => {
      loadConfig(path.join(testDir, 'nonexistent.json'));
      expect(validateConfig()).toEqual({ valid: true, errors: [] });
    });

    it('should report every invalid field', () => {
      updateConfig({
        algorithmName: '  ',
        quickRuns: 0,
        demoRuns: 1.5,
        demoSizes: [10, -1],
      });

      expect(validateConfig()).toEqual({
        valid: false,
        errors: [
          'algorithmName must not be empty',
          'quickRuns must be a positive integer',
          'demoRuns must be a positive integer',
          'demoSizes must contain non-negative integers',
        ],
      });
    });

  });

  describe('MAJORITY_BENCH_RUNS', () => {
    it.each(['abc', '0', '-3', '2.5'])('should keep the default run count for %p', (value) => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      process.env.MAJORITY_BENCH_RUNS = value;

      try {
        const config = loadConfig(path.join(testDir, 'nonexistent.json'));

        expect(config.quickRuns).toBe(10);
        expect(validateConfig()).toEqual({ valid: true, errors: [] });
        expect(warn).toHaveBeenCalledWith(
          `Ignoring MAJORITY_BENCH_RUNS='${value}': expected a positive integer`
        );
      } finally {
        warn.mockRestore();
      }
    });
  });
});

/**
 * Tests for error hierarchy
 */

import {
  MajorityBenchError,
  ValidationError,
  NullInputError,
  EmptyInputError,
  NullElementError,
  InvalidInputError,
  UnexpectedFaultError,
  BenchmarkError,
  EmptySampleSetError,
  MixedSampleSetError,
  ExportError,
  PromptCancelledError,
  isMajorityBenchError,
  isRecoverable,
  errorMessage,
  createError,
} from '../src/errors.js';

describe('Error Hierarchy', () => {
  describe('MajorityBenchError (base class)', () => {
    it('should create error with all properties', () => {
      const error = new MajorityBenchError('Test error', 'TEST_CODE', true, { key: 'value' });
      expect(error.message).toBe('Test error');
      expect(error.code).toBe('TEST_CODE');
      expect(error.recoverable).toBe(true);
      expect(error.context).toEqual({ key: 'value' });
      expect(error.name).toBe('MajorityBenchError');
    });

    it('should have proper stack trace', () => {
      const error = new MajorityBenchError('Test error', 'TEST');
      expect(error.stack).toBeDefined();
    });

    it('should serialize to JSON', () => {
      const error = new MajorityBenchError('Test error', 'TEST_CODE', false, { key: 'value' });
      expect(error.toJSON()).toEqual({
        name: 'MajorityBenchError',
        message: 'Test error',
        code: 'TEST_CODE',
        recoverable: false,
        context: { key: 'value' },
      });
    });
  });

  describe('Validation Errors', () => {
    it('NullInputError should have correct properties', () => {
      const error = new NullInputError();
      expect(error.message).toBe('Input array cannot be null');
      expect(error.code).toBe('NULL_INPUT');
      expect(error.name).toBe('NullInputError');
      expect(error).toBeInstanceOf(ValidationError);
      expect(error.recoverable).toBe(true);
    });

    it('EmptyInputError should have correct properties', () => {
      const error = new EmptyInputError();
      expect(error.message).toBe('Input array is empty');
      expect(error.code).toBe('EMPTY_INPUT');
      expect(error).toBeInstanceOf(ValidationError);
    });

    it('NullElementError should carry the index', () => {
      const error = new NullElementError(4);
      expect(error.message).toBe('Array contains null element at index 4');
      expect(error.code).toBe('NULL_ELEMENT');
      expect(error.index).toBe(4);
      expect(error.context).toEqual({ index: 4 });
    });

    it('InvalidInputError should name the field and reason', () => {
      const error = new InvalidInputError('array size', 'must be at least 1');
      expect(error.message).toBe('Invalid array size: must be at least 1');
      expect(error.code).toBe('INVALID_INPUT');
      expect(error.context).toEqual({ field: 'array size', reason: 'must be at least 1' });
    });
  });

  describe('Engine Errors', () => {
    it('UnexpectedFaultError should not be recoverable', () => {
      const error = new UnexpectedFaultError('boom');
      expect(error.message).toBe('Unexpected error: boom');
      expect(error.code).toBe('UNEXPECTED_FAULT');
      expect(error.recoverable).toBe(false);
    });
  });

  describe('Benchmark Errors', () => {
    it('EmptySampleSetError should have correct properties', () => {
      const error = new EmptySampleSetError('Alg', 100);
      expect(error.message).toBe('No samples to summarize for Alg at size 100');
      expect(error.code).toBe('EMPTY_SAMPLE_SET');
      expect(error).toBeInstanceOf(BenchmarkError);
    });

    it('MixedSampleSetError should have correct properties', () => {
      const error = new MixedSampleSetError('Alg@100', 'Alg@200');
      expect(error.message).toBe('Sample Alg@200 does not belong to summary Alg@100');
      expect(error.code).toBe('MIXED_SAMPLE_SET');
    });

    it('ExportError should include the reason when given', () => {
      expect(new ExportError('out/run.csv', 'ENOTDIR').message)
        .toBe('Failed to export results to out/run.csv: ENOTDIR');
      expect(new ExportError('out/run.csv').message)
        .toBe('Failed to export results to out/run.csv');
      expect(new ExportError('x').code).toBe('EXPORT_FAILED');
    });
  });

  describe('CLI Errors', () => {
    it('PromptCancelledError should name the prompt', () => {
      const error = new PromptCancelledError('Array size');
      expect(error.message).toBe('Prompt cancelled: Array size');
      expect(error.code).toBe('PROMPT_CANCELLED');
    });
  });

  describe('Type Guards', () => {
    it('isMajorityBenchError should identify errors', () => {
      expect(isMajorityBenchError(new NullInputError())).toBe(true);
      expect(isMajorityBenchError(new Error('plain'))).toBe(false);
      expect(isMajorityBenchError('string')).toBe(false);
      expect(isMajorityBenchError(null)).toBe(false);
    });

    it('isRecoverable should check recoverability', () => {
      expect(isRecoverable(new InvalidInputError('x', 'y'))).toBe(true);
      expect(isRecoverable(new UnexpectedFaultError('boom'))).toBe(false);
      expect(isRecoverable(new Error('plain'))).toBe(false);
    });

    it('errorMessage should read any thrown value', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage('text')).toBe('text');
      expect(errorMessage(42)).toBe('42');
    });
  });

  describe('Error Factory', () => {
    it('should create the matching error type', () => {
      expect(createError('NULL_INPUT', 'ignored')).toBeInstanceOf(NullInputError);
      expect(createError('EMPTY_INPUT', 'ignored')).toBeInstanceOf(EmptyInputError);
      expect(createError('UNEXPECTED_FAULT', 'ignored', { reason: 'boom' }).message)
        .toBe('Unexpected error: boom');
      expect(createError('PROMPT_CANCELLED', 'ignored', { prompt: 'Menu' }))
        .toBeInstanceOf(PromptCancelledError);
    });

    it('should read typed context values', () => {
      const error = createError('NULL_ELEMENT', 'ignored', { index: 7 });
      expect(error).toBeInstanceOf(NullElementError);
      expect(error.message).toBe('Array contains null element at index 7');

      const summary = createError('EMPTY_SAMPLE_SET', 'ignored', { algorithmName: 'Alg', inputSize: 10 });
      expect(summary.message).toBe('No samples to summarize for Alg at size 10');
    });

    it('should fall back on missing context', () => {
      expect(createError('INVALID_INPUT', 'ignored').message).toBe('Invalid Unknown: Unknown');
      expect(createError('EXPORT_FAILED', 'ignored', { target: 'out' }).message)
        .toBe('Failed to export results to out');
    });

    it('should create base error for unknown codes', () => {
      const error = createError('SOMETHING_ELSE', 'Custom message', { a: 1 });
      expect(error).toBeInstanceOf(MajorityBenchError);
      expect(error.message).toBe('Custom message');
      expect(error.code).toBe('SOMETHING_ELSE');
      expect(error.context).toEqual({ a: 1 });
    });
  });
});

/**
 * Majority Bench Error Hierarchy
 * Structured error types shared by the engine, the benchmark harness and the CLI
 */

/**
 * Base error class for all majority-bench errors
 */
export class MajorityBenchError extends Error {
  public readonly code: string;
  public readonly recoverable: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    recoverable: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MajorityBenchError';
    this.code = code;
    this.recoverable = recoverable;
    this.context = context;
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      recoverable: this.recoverable,
      context: this.context,
    };
  }
}

// ==================== Validation Errors ====================

/**
 * Base validation error
 */
export class ValidationError extends MajorityBenchError {
  constructor(
    message: string,
    code: string = 'VALIDATION_ERROR',
    context?: Record<string, unknown>
  ) {
    super(message, code, true, context);
    this.name = 'ValidationError';
  }
}

/**
 * Error when the input sequence itself is absent
 */
export class NullInputError extends ValidationError {
  constructor() {
    super('Input array cannot be null', 'NULL_INPUT');
    this.name = 'NullInputError';
  }
}

/**
 * Error when the input sequence has no elements
 */
export class EmptyInputError extends ValidationError {
  constructor() {
    super('Input array is empty', 'EMPTY_INPUT');
    this.name = 'EmptyInputError';
  }
}

/**
 * Error when the input sequence holds an absent element
 */
export class NullElementError extends ValidationError {
  public readonly index: number;

  constructor(index: number) {
    super(
      `Array contains null element at index ${index}`,
      'NULL_ELEMENT',
      { index }
    );
    this.name = 'NullElementError';
    this.index = index;
  }
}

/**
 * Error when user-supplied input cannot be parsed
 */
export class InvalidInputError extends ValidationError {
  constructor(field: string, reason: string) {
    super(
      `Invalid ${field}: ${reason}`,
      'INVALID_INPUT',
      { field, reason }
    );
    this.name = 'InvalidInputError';
  }
}

// ==================== Engine Errors ====================

/**
 * Catch-all for faults raised while scanning a sequence
 */
export class UnexpectedFaultError extends MajorityBenchError {
  constructor(reason: string) {
    super(`Unexpected error: ${reason}`, 'UNEXPECTED_FAULT', false, { reason });
    this.name = 'UnexpectedFaultError';
  }
}

// ==================== Benchmark Errors ====================

/**
 * Base benchmark error
 */
export class BenchmarkError extends MajorityBenchError {
  constructor(
    message: string,
    code: string = 'BENCHMARK_ERROR',
    context?: Record<string, unknown>
  ) {
    super(message, code, true, context);
    this.name = 'BenchmarkError';
  }
}

/**
 * Error when a summary is requested over zero samples
 */
export class EmptySampleSetError extends BenchmarkError {
  constructor(algorithmName: string, inputSize: number) {
    super(
      `No samples to summarize for ${algorithmName} at size ${inputSize}`,
      'EMPTY_SAMPLE_SET',
      { algorithmName, inputSize }
    );
    this.name = 'EmptySampleSetError';
  }
}

/**
 * Error when samples of different algorithms or sizes are summarized together
 */
export class MixedSampleSetError extends BenchmarkError {
  constructor(expected: string, actual: string) {
    super(
      `Sample ${actual} does not belong to summary ${expected}`,
      'MIXED_SAMPLE_SET',
      { expected, actual }
    );
    this.name = 'MixedSampleSetError';
  }
}

/**
 * Error when exported results cannot be written
 */
export class ExportError extends BenchmarkError {
  constructor(target: string, reason?: string) {
    super(
      `Failed to export results to ${target}${reason ? `: ${reason}` : ''}`,
      'EXPORT_FAILED',
      { target, reason }
    );
    this.name = 'ExportError';
  }
}

// ==================== CLI Errors ====================

/**
 * Error when the user backs out of an interactive prompt
 */
export class PromptCancelledError extends MajorityBenchError {
  constructor(prompt: string) {
    super(`Prompt cancelled: ${prompt}`, 'PROMPT_CANCELLED', true, { prompt });
    this.name = 'PromptCancelledError';
  }
}

/**
 * Errors surfaced by findMajority
 */
export type VoteError = NullInputError | UnexpectedFaultError;

/**
 * Errors surfaced by validateInput
 */
export type ValidationFailure = NullInputError | EmptyInputError | NullElementError;

// ==================== Type Guards ====================

export function isMajorityBenchError(error: unknown): error is MajorityBenchError {
  return error instanceof MajorityBenchError;
}

export function isRecoverable(error: unknown): boolean {
  if (isMajorityBenchError(error)) {
    return error.recoverable;
  }
  return false;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ==================== Error Factory ====================

function contextString(context: Record<string, unknown> | undefined, key: string): string {
  const value = context?.[key];
  return typeof value === 'string' ? value : 'Unknown';
}

function contextNumber(context: Record<string, unknown> | undefined, key: string): number {
  const value = context?.[key];
  return typeof value === 'number' ? value : 0;
}

/**
 * Create appropriate error from code
 */
export function createError(
  code: string,
  message: string,
  context?: Record<string, unknown>
): MajorityBenchError {
  switch (code) {
    case 'NULL_INPUT':
      return new NullInputError();
    case 'EMPTY_INPUT':
      return new EmptyInputError();
    case 'NULL_ELEMENT':
      return new NullElementError(contextNumber(context, 'index'));
    case 'INVALID_INPUT':
      return new InvalidInputError(contextString(context, 'field'), contextString(context, 'reason'));
    case 'UNEXPECTED_FAULT':
      return new UnexpectedFaultError(contextString(context, 'reason'));
    case 'EMPTY_SAMPLE_SET':
      return new EmptySampleSetError(contextString(context, 'algorithmName'), contextNumber(context, 'inputSize'));
    case 'MIXED_SAMPLE_SET':
      return new MixedSampleSetError(contextString(context, 'expected'), contextString(context, 'actual'));
    case 'PROMPT_CANCELLED':
      return new PromptCancelledError(contextString(context, 'prompt'));
    case 'EXPORT_FAILED':
      return new ExportError(contextString(context, 'target'), context?.reason === undefined ? undefined : contextString(context, 'reason'));
    default:
      return new MajorityBenchError(message, code, true, context);
  }
}

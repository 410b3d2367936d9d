/**
 * Error Handling Utilities
 *
 * Centralized error handling patterns so that recoverable failures
 * (unreadable bundle files, corrupt settings, engines lacking a capability)
 * are handled the same way everywhere.
 */
import type { OperationOutcome } from '../types';

// =============================================================================
// Types
// =============================================================================

/**
 * Context information for error reporting
 */
export interface ErrorContext {
  /** Name of the operation being performed */
  operation: string;
  /** Component/module where the error occurred */
  component: string;
  /** Additional context information */
  additionalInfo?: Record<string, unknown>;
}

/**
 * Options for error handling behavior
 */
export interface ErrorHandlingOptions<T> {
  /** Fallback value to return on error (if set, won't throw) */
  fallback?: T;
  /** Custom logger (default: no-op) */
  logger?: (message: string, meta?: Record<string, unknown>) => void;
}

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Base error class with additional context
 */
export class ContextualError extends Error {
  public readonly context: ErrorContext;
  public readonly originalError?: Error;
  public readonly timestamp: number;

  constructor(message: string, context: ErrorContext, originalError?: Error) {
    super(message);
    this.name = 'ContextualError';
    this.context = context;
    this.originalError = originalError;
    this.timestamp = Date.now();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ContextualError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      context: this.context,
      originalError: this.originalError?.message,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown by engine adapters when the embedding engine cannot perform an
 * operation at all (as opposed to failing while performing it).
 */
export class UnsupportedOperationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedOperationError';
  }
}

// =============================================================================
// Main Error Handling Functions
// =============================================================================

/**
 * Execute an async operation, logging failures and either returning the
 * fallback or rethrowing as a ContextualError.
 *
 * @example
 * ```typescript
 * const text = await withErrorHandling(
 *   () => fs.readFile(file, 'utf-8'),
 *   { operation: 'readBundleFile', component: 'ExtensionRegistry' },
 *   { fallback: null }
 * );
 * ```
 */
export async function withErrorHandling<T>(
  operation: () => Promise<T>,
  context: ErrorContext,
  options: ErrorHandlingOptions<T> = {}
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    return recover(error, context, options);
  }
}

/**
 * Execute a sync operation with error handling
 */
export function withErrorHandlingSync<T>(
  operation: () => T,
  context: ErrorContext,
  options: ErrorHandlingOptions<T> = {}
): T {
  try {
    return operation();
  } catch (error) {
    return recover(error, context, options);
  }
}

function recover<T>(error: unknown, context: ErrorContext, options: ErrorHandlingOptions<T>): T {
  const err = toError(error);
  const { fallback, logger } = options;

  logger?.(`[${context.component}] ${context.operation} failed`, {
    error: err.message,
    ...context.additionalInfo,
  });

  if (fallback !== undefined) {
    return fallback;
  }

  throw new ContextualError(`${context.operation} failed: ${err.message}`, context, err);
}

// =============================================================================
// Engine Operations
// =============================================================================

/**
 * Run an engine call and classify the result. A missing capability or an
 * UnsupportedOperationError reports `unsupported`; any other error reports
 * `failed`. Nothing is thrown.
 */
export function attemptEngineOperation(
  operation: (() => void) | undefined,
  unsupportedReason: string
): OperationOutcome {
  if (!operation) {
    return { status: 'unsupported', reason: unsupportedReason };
  }
  try {
    operation();
    return { status: 'succeeded' };
  } catch (error) {
    if (error instanceof UnsupportedOperationError) {
      return { status: 'unsupported', reason: error.message };
    }
    return { status: 'failed', error: toError(error) };
  }
}

export function isSucceeded(outcome: OperationOutcome): boolean {
  return outcome.status === 'succeeded';
}

export function describeOutcome(outcome: OperationOutcome): string {
  switch (outcome.status) {
    case 'succeeded':
      return 'succeeded';
    case 'unsupported':
      return `unsupported: ${outcome.reason}`;
    case 'failed':
      return `failed: ${outcome.error.message}`;
  }
}

// =============================================================================
// Utility Functions
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}

/**
 * Serialize an Error object to a plain object that can be JSON stringified.
 * Error objects don't serialize properly because their properties aren't enumerable.
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const serialized: Record<string, unknown> = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
    // Include any additional properties that might have been added (e.g., code, errno)
    for (const [key, value] of Object.entries(error)) {
      if (key !== 'name' && key !== 'message' && key !== 'stack') {
        serialized[key] = value;
      }
    }
    return serialized;
  }
  if (error && typeof error === 'object') {
    try {
      const parsed: unknown = JSON.parse(JSON.stringify(error));
      return isRecord(parsed) ? parsed : { value: parsed };
    } catch (serializationError) {
      // Cyclic structures cannot be stringified
      return { value: String(error), serializationError: getErrorMessage(serializationError) };
    }
  }
  return { value: String(error) };
}

/**
 * Safely extract error message from any error type.
 * Handles Error objects, strings, and unknown types.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

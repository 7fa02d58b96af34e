/**
 * Error taxonomy for the reconciliation pipeline
 *
 * Parse and validation errors abort before any remote call. Dependency,
 * fetch and execution errors abort the remaining plan. Update conflicts
 * are not errors; see ConflictSkip in plan/types.ts.
 */

import type { ResourceKind } from './reconcilers/types.js';
import { formatResourceRef } from './reconcilers/types.js';

export type ReconcileErrorCode =
  | 'PARSE_ERROR'
  | 'VALIDATION_ERROR'
  | 'DEPENDENCY_ERROR'
  | 'FETCH_ERROR'
  | 'EXECUTION_ERROR'
  | 'CONFIG_ERROR';

/**
 * Base class for errors raised by the pipeline and the commands around it
 */
export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly code: ReconcileErrorCode,
    public readonly suggestion?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ReconcileError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = this.message;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * The document is not YAML/JSON, or no acceptable shape was recognized
 */
export class ParseError extends ReconcileError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(
      message,
      'PARSE_ERROR',
      'Provide a top-level object with upstreams/services/routes, a list of routes, or a single route object',
      options
    );
    this.name = 'ParseError';
  }
}

/**
 * A required field is missing or a value is out of its allowed range
 */
export class ValidationError extends ReconcileError {
  constructor(
    message: string,
    public readonly path?: string
  ) {
    super(path ? `${path}: ${message}` : message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/**
 * A referenced resource neither exists remotely nor is created earlier in the run
 */
export class DependencyError extends ReconcileError {
  constructor(
    public readonly kind: ResourceKind,
    public readonly resourceName: string,
    public readonly dependency: { kind: ResourceKind; name: string }
  ) {
    super(
      `${formatResourceRef(kind, resourceName)} references ${formatResourceRef(dependency.kind, dependency.name)}, which does not exist`,
      'DEPENDENCY_ERROR',
      `Declare the ${dependency.kind} in the document (before anything that references it) or create it first`
    );
    this.name = 'DependencyError';
  }
}

/**
 * A remote lookup failed for a reason other than "not found"
 */
export class FetchError extends ReconcileError {
  constructor(
    public readonly kind: ResourceKind,
    public readonly resourceName: string,
    cause: unknown
  ) {
    super(
      `Failed to fetch ${formatResourceRef(kind, resourceName)}: ${describeCause(cause)}`,
      'FETCH_ERROR',
      'Check that the admin URL points at the gateway Admin API and that it is reachable',
      { cause }
    );
    this.name = 'FetchError';
  }
}

/**
 * A mutating call failed; remaining plan execution was aborted
 */
export class ExecutionError extends ReconcileError {
  constructor(
    public readonly kind: ResourceKind,
    public readonly resourceName: string,
    public readonly action: 'create' | 'update',
    cause: unknown
  ) {
    super(
      `Failed to ${action} ${formatResourceRef(kind, resourceName)}: ${describeCause(cause)}`,
      'EXECUTION_ERROR',
      undefined,
      { cause }
    );
    this.name = 'ExecutionError';
  }
}

/**
 * Missing or unreadable local configuration
 */
export class ConfigError extends ReconcileError {
  constructor(message: string, suggestion?: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG_ERROR', suggestion, options);
    this.name = 'ConfigError';
  }
}

export function isReconcileError(error: unknown): error is ReconcileError {
  return error instanceof ReconcileError;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

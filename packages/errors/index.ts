/**
* Unified Error Handling Package
*
* Error codes and classes raised by the experiment router itself. Errors
* thrown by trial implementations are never wrapped: callers see them exactly
* as the active error policy lets them through.
*
* Serialized Error Format:
* {
*   error: string;       // Human-readable error message
*   code: string;        // Machine-readable error code
*   details?: unknown;   // Issue list, identifiers, etc.
* }
*/

// ============================================================================
// Error Code Constants
// ============================================================================

export const ErrorCodes = Object.freeze({
  // Registry build
  EXPERIMENT_CONFIGURATION_ERROR: 'EXPERIMENT_CONFIGURATION_ERROR',
  EXPERIMENT_NOT_REGISTERED: 'EXPERIMENT_NOT_REGISTERED',

  // Dispatch
  SELECTION_FAILED: 'SELECTION_FAILED',
  TRIAL_TIMEOUT: 'TRIAL_TIMEOUT',
  TRIAL_METHOD_NOT_FOUND: 'TRIAL_METHOD_NOT_FOUND',

  // Kill switch
  KILL_SWITCH_PERSISTENCE_FAILED: 'KILL_SWITCH_PERSISTENCE_FAILED',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const);

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export interface ErrorResponse {
  error: string;
  code: string;
  details?: unknown;
}

// ============================================================================
// Base Application Error Class
// ============================================================================

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): ErrorResponse {
    return {
      error: this.message,
      code: this.code,
      ...(this.details !== undefined && { details: this.details }),
    };
  }
}

// ============================================================================
// Registry Errors
// ============================================================================

/**
* One problem found while validating experiment definitions
*/
export interface ConfigurationIssue {
  /** Dotted location, e.g. `checkout-v2.trials[1].key` */
  path: string;
  message: string;
  code: string;
}

/**
* Raised once per registry build, listing every problem found.
* The process should not start with an invalid registry.
*/
export class ExperimentConfigurationError extends AppError {
  public readonly issues: readonly ConfigurationIssue[];

  constructor(issues: readonly ConfigurationIssue[]) {
    const summary = issues.map(i => `${i.path}: ${i.message}`).join('; ');
    super(
      `Invalid experiment configuration (${issues.length} issue${issues.length === 1 ? '' : 's'}): ${summary}`,
      ErrorCodes.EXPERIMENT_CONFIGURATION_ERROR,
      issues
    );
    this.issues = issues;
  }

  /**
  * Create from Zod issues, prefixing each path with the experiment name
  */
  static fromZodIssues(
    prefix: string,
    issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string; code: string }>
  ): ConfigurationIssue[] {
    return issues.map(issue => ({
      path: formatIssuePath(prefix, issue.path),
      message: issue.message,
      code: issue.code,
    }));
  }
}

function formatIssuePath(prefix: string, path: ReadonlyArray<string | number>): string {
  return path.reduce<string>(
    (acc, segment) => (typeof segment === 'number' ? `${acc}[${segment}]` : `${acc}.${segment}`),
    prefix
  );
}

export class ExperimentNotRegisteredError extends AppError {
  constructor(service: string) {
    super(`No experiment is registered for service '${service}'`, ErrorCodes.EXPERIMENT_NOT_REGISTERED, { service });
  }
}

// ============================================================================
// Dispatch Errors
// ============================================================================

/**
* Selection provider failure. Recovered inside the dispatcher (default trial);
* only ever logged.
*/
export class SelectionError extends AppError {
  constructor(service: string, mode: string, cause: unknown) {
    super(
      `Trial selection failed for '${service}' (${mode}): ${getErrorMessage(cause)}`,
      ErrorCodes.SELECTION_FAILED,
      { service, mode },
      { cause }
    );
  }
}

export class TrialTimeoutError extends AppError {
  constructor(service: string, trialKey: string, timeoutMs: number) {
    super(
      `Trial '${trialKey}' of '${service}' timed out after ${timeoutMs}ms`,
      ErrorCodes.TRIAL_TIMEOUT,
      { service, trialKey, timeoutMs }
    );
  }
}

export class TrialMethodNotFoundError extends AppError {
  constructor(service: string, trialKey: string, methodName: string) {
    super(
      `Trial '${trialKey}' of '${service}' has no method '${methodName}'`,
      ErrorCodes.TRIAL_METHOD_NOT_FOUND,
      { service, trialKey, methodName }
    );
  }
}

// ============================================================================
// Kill Switch Errors
// ============================================================================

export class KillSwitchPersistenceError extends AppError {
  constructor(operation: 'load' | 'save', cause: unknown) {
    super(
      `Kill switch ${operation} failed: ${getErrorMessage(cause)}`,
      ErrorCodes.KILL_SWITCH_PERSISTENCE_FAILED,
      { operation },
      { cause }
    );
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Extract error message from unknown catch parameter.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

// Failure policy - decides what a repository failure means for the caller
//
// Repositories never abort on their own. They log every failure, then hand it
// to a FailurePolicy. Under the default policy, count and delete failures
// escalate; listing and lookup failures degrade to empty results.

import { IdentifierStaleError, type RepositoryError } from './errors.js';

export type RepositoryOperation =
  | 'allObjects'
  | 'countObjects'
  | 'firstObject'
  | 'deleteObject'
  | 'deleteAllObjects'
  | 'loadObject';

export type FailureSeverity = 'fatal' | 'recoverable';

/**
 * Severity of a store failure, per operation
 */
export const DEFAULT_FAILURE_SEVERITY: Readonly<Record<RepositoryOperation, FailureSeverity>> = {
  allObjects: 'recoverable',
  firstObject: 'recoverable',
  loadObject: 'recoverable',
  countObjects: 'fatal',
  deleteObject: 'fatal',
  deleteAllObjects: 'fatal',
};

/**
 * A failure as reported to a FailurePolicy
 */
export type RepositoryFailure = {
  operation: RepositoryOperation;
  severity: FailureSeverity;
  error: RepositoryError;
};

export type FailurePolicy = {
  readonly name: string;

  /**
   * Called after the failure has been logged. Throwing escalates the failure
   * to the repository's caller; returning lets the operation finish with its
   * fallback result.
   */
  handle(failure: RepositoryFailure): void;
};

/**
 * Classify a failure. Stale identifiers are always recoverable.
 */
export function severityOf(operation: RepositoryOperation, error: RepositoryError): FailureSeverity {
  if (error instanceof IdentifierStaleError) return 'recoverable';
  return DEFAULT_FAILURE_SEVERITY[operation];
}

/**
 * Default policy: rethrow fatal failures, let recoverable ones degrade.
 */
export const escalatingFailurePolicy: FailurePolicy = {
  name: 'escalate',
  handle(failure) {
    if (failure.severity === 'fatal') {
      throw failure.error;
    }
  },
};

/**
 * Never escalate; the logged diagnostic is the only trace.
 */
export const loggingFailurePolicy: FailurePolicy = {
  name: 'log',
  handle() {},
};

/**
 * Record every failure for inspection, then delegate to another policy.
 */
export function createRecordingFailurePolicy(
  inner: FailurePolicy = loggingFailurePolicy
): FailurePolicy & { failures: RepositoryFailure[] } {
  const failures: RepositoryFailure[] = [];

  return {
    name: `record(${inner.name})`,
    failures,
    handle(failure) {
      failures.push(failure);
      inner.handle(failure);
    },
  };
}

export type FailurePolicyName = 'escalate' | 'log';

export function failurePolicyNamed(name: FailurePolicyName): FailurePolicy {
  return name === 'escalate' ? escalatingFailurePolicy : loggingFailurePolicy;
}

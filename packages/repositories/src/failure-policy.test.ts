import { describe, it, expect } from 'vitest';
import { CommitFailureError, IdentifierStaleError, QueryFailureError } from './errors.js';
import {
  DEFAULT_FAILURE_SEVERITY,
  createRecordingFailurePolicy,
  escalatingFailurePolicy,
  failurePolicyNamed,
  loggingFailurePolicy,
  severityOf,
  type RepositoryFailure,
} from './failure-policy.js';

const queryFailure = new QueryFailureError('Note', 'Error loading Objects [Note]');
const staleIdentifier = new IdentifierStaleError(
  'Note',
  { storeId: 'test-store', entityName: 'Note', key: 'note-1' },
  'Error loading Object [Note]'
);

const fatal: RepositoryFailure = { operation: 'countObjects', severity: 'fatal', error: queryFailure };
const recoverable: RepositoryFailure = { operation: 'allObjects', severity: 'recoverable', error: queryFailure };

describe('severityOf', () => {
  it('treats counts and deletes as fatal', () => {
    expect(severityOf('countObjects', queryFailure)).toBe('fatal');
    expect(severityOf('deleteObject', new CommitFailureError('Note', 'Error deleting entity [Note]'))).toBe('fatal');
    expect(severityOf('deleteAllObjects', queryFailure)).toBe('fatal');
  });

  it('treats listing and lookup as recoverable', () => {
    expect(severityOf('allObjects', queryFailure)).toBe('recoverable');
    expect(severityOf('firstObject', queryFailure)).toBe('recoverable');
    expect(severityOf('loadObject', queryFailure)).toBe('recoverable');
  });

  it('covers exactly the operations that reach the store', () => {
    expect(Object.keys(DEFAULT_FAILURE_SEVERITY).sort()).toEqual([
      'allObjects',
      'countObjects',
      'deleteAllObjects',
      'deleteObject',
      'firstObject',
      'loadObject',
    ]);
  });

  it('always treats stale identifiers as recoverable', () => {
    expect(severityOf('deleteAllObjects', staleIdentifier)).toBe('recoverable');
  });
});

describe('escalatingFailurePolicy', () => {
  it('throws fatal failures', () => {
    expect(() => escalatingFailurePolicy.handle(fatal)).toThrow(queryFailure);
  });

  it('lets recoverable failures pass', () => {
    expect(() => escalatingFailurePolicy.handle(recoverable)).not.toThrow();
  });
});

describe('loggingFailurePolicy', () => {
  it('never throws', () => {
    expect(() => loggingFailurePolicy.handle(fatal)).not.toThrow();
  });
});

describe('createRecordingFailurePolicy', () => {
  it('records failures and delegates to the logging policy by default', () => {
    const policy = createRecordingFailurePolicy();

    policy.handle(fatal);
    policy.handle(recoverable);

    expect(policy.name).toBe('record(log)');
    expect(policy.failures).toEqual([fatal, recoverable]);
  });

  it('records before the inner policy escalates', () => {
    const policy = createRecordingFailurePolicy(escalatingFailurePolicy);

    expect(() => policy.handle(fatal)).toThrow(QueryFailureError);
    expect(policy.failures).toEqual([fatal]);
  });
});

describe('failurePolicyNamed', () => {
  it('resolves configured policy names', () => {
    expect(failurePolicyNamed('escalate')).toBe(escalatingFailurePolicy);
    expect(failurePolicyNamed('log')).toBe(loggingFailurePolicy);
  });
});

import { describe, it, expect } from 'vitest';
import {
  FAILED_EXECUTION_STATUSES,
  INCOMPLETE_EXECUTION_STATUSES,
  classifyExecutionStatus,
  isFailedStatus,
  isIncompleteStatus,
  isSuccessStatus,
} from '../src/types/status.js';

describe('Execution status', () => {
  it('should keep the three buckets disjoint', () => {
    const all = [...INCOMPLETE_EXECUTION_STATUSES, ...FAILED_EXECUTION_STATUSES, 'complete'];
    expect(new Set(all).size).toBe(all.length);
  });

  it.each(INCOMPLETE_EXECUTION_STATUSES)('should classify %s as incomplete', (status) => {
    expect(classifyExecutionStatus(status)).toEqual({ kind: 'incomplete', status });
  });

  it.each(FAILED_EXECUTION_STATUSES)('should classify %s as failed', (status) => {
    expect(classifyExecutionStatus(status)).toEqual({ kind: 'failed', status });
  });

  it('should classify complete as success', () => {
    expect(classifyExecutionStatus('complete')).toEqual({ kind: 'success', status: 'complete' });
  });

  it('should keep unknown statuses verbatim', () => {
    expect(classifyExecutionStatus('Complete')).toEqual({ kind: 'unrecognized', status: 'Complete' });
    expect(classifyExecutionStatus('')).toEqual({ kind: 'unrecognized', status: '' });
  });

  it('should narrow with the type guards', () => {
    expect(isIncompleteStatus('stopping')).toBe(true);
    expect(isFailedStatus('stopping')).toBe(false);
    expect(isFailedStatus('stopped')).toBe(true);
    expect(isSuccessStatus('stopped')).toBe(false);
  });
});

import { describe, it, expect } from 'vitest';
import {
  FatalEngineError,
  OutputValidationError,
  RoutingError,
  WorkerExecutionError,
  WorkerTimeoutError,
  toTaskFailure,
} from '../src/errors';

describe('engine errors', () => {
  it('carry their kind and class name', () => {
    const error = new RoutingError('no route');
    expect(error.kind).toBe('RoutingError');
    expect(error.name).toBe('RoutingError');
    expect(error).toBeInstanceOf(Error);
  });

  it('format worker messages', () => {
    expect(new OutputValidationError('style', ['findings: Required', 'x: bad']).message).toBe(
      'style returned an invalid result: findings: Required; x: bad'
    );
    expect(new WorkerTimeoutError('logic', 500).message).toBe('logic exceeded 500ms');
    expect(new WorkerExecutionError('report', new Error('socket hang up')).message).toBe(
      'report failed: socket hang up'
    );
    expect(new WorkerExecutionError('report', 'plain string').message).toBe('report failed: plain string');
  });

  it('map to task failures', () => {
    expect(toTaskFailure(new FatalEngineError('merge conflict'))).toEqual({
      kind: 'FatalEngineError',
      message: 'merge conflict',
    });
  });

  it('treat unknown errors as fatal', () => {
    expect(toTaskFailure(new TypeError('boom'))).toEqual({ kind: 'FatalEngineError', message: 'boom' });
    expect(toTaskFailure(42)).toEqual({ kind: 'FatalEngineError', message: '42' });
  });
});

/**
 * Routing Policy Tests
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ROUTING_POLICY,
  classifyTask,
  decideRoute,
} from '../src/orchestrator/routing-policy';
import {
  createInitialState,
  mergeTaskState,
  type TaskState,
  type TaskStateUpdate,
} from '../src/orchestrator/state';
import { RoutingError } from '../src/errors';

function stateFor(task: string, update: TaskStateUpdate = {}): TaskState {
  return mergeTaskState(createInitialState({ task }), update);
}

function dispatched(state: TaskState, worker: 'logic' | 'style' | 'diagram' | 'report' | 'formatter'): TaskState {
  return mergeTaskState(state, {
    routeHistory: [
      {
        step: state.step,
        decision: { type: 'dispatch', worker, taskKind: 'review', attempt: 1, reason: 'test' },
      },
    ],
  });
}

describe('classifyTask', () => {
  it.each([
    ['Please review this diff', 'review'],
    ['format this code snippet', 'format'],
    ['Pretty-print the JSON', 'format'],
    ['draw an architecture diagram', 'diagram'],
    ['lint the naming in this module', 'style-check'],
    ['find bugs in this function', 'logic-analysis'],
    ['check for security vulnerabilities', 'logic-analysis'],
  ])('classifies "%s" as %s', (task, kind) => {
    expect(classifyTask({ task, prUrl: null })).toBe(kind);
  });

  it('only reads the first line', () => {
    expect(classifyTask({ task: 'hello\nformat this', prUrl: null })).toBeUndefined();
  });

  it('applies rules in order', () => {
    expect(classifyTask({ task: 'review the formatting', prUrl: null })).toBe('review');
  });

  it('treats a pull request as a review', () => {
    expect(classifyTask({ task: 'format', prUrl: 'https://github.com/o/r/pull/2' })).toBe('review');
  });
});

describe('decideRoute', () => {
  it('dispatches the first plan step', () => {
    expect(decideRoute(stateFor('review this'), DEFAULT_ROUTING_POLICY)).toEqual({
      type: 'dispatch',
      worker: 'logic',
      taskKind: 'review',
      attempt: 1,
      reason: 'next step of review plan',
    });
  });

  it('skips steps that already have results', () => {
    const state = stateFor('review this', {
      results: { logic: { findings: [] }, style: { findings: [] } },
    });
    expect(decideRoute(state, DEFAULT_ROUTING_POLICY)).toMatchObject({ worker: 'diagram' });
  });

  it('retries a faulted worker with the fault kind as reason', () => {
    const state = mergeTaskState(dispatched(stateFor('review this'), 'logic'), {
      faults: [
        { step: 0, worker: 'logic', kind: 'WorkerTimeoutError', message: 'logic exceeded 5ms', issues: [] },
      ],
    });

    expect(decideRoute(state, DEFAULT_ROUTING_POLICY)).toEqual({
      type: 'dispatch',
      worker: 'logic',
      taskKind: 'review',
      attempt: 2,
      reason: 'retry after WorkerTimeoutError',
    });
  });

  it('skips an optional step whose attempts are exhausted', () => {
    let state = stateFor('review this', {
      results: { logic: { findings: [] }, style: { findings: [] } },
    });
    state = dispatched(dispatched(state, 'diagram'), 'diagram');

    expect(decideRoute(state, DEFAULT_ROUTING_POLICY)).toMatchObject({
      type: 'dispatch',
      worker: 'report',
    });
  });

  it('fails once a required step runs out of attempts', () => {
    const state = mergeTaskState(dispatched(dispatched(stateFor('format it'), 'formatter'), 'formatter'), {
      faults: [
        { step: 1, worker: 'formatter', kind: 'OutputValidationError', message: 'bad output', issues: [] },
      ],
    });

    expect(decideRoute(state, DEFAULT_ROUTING_POLICY)).toEqual({
      type: 'terminate',
      status: 'failed',
      taskKind: 'format',
      reason: 'formatter failed after 2 attempts: bad output',
    });
  });

  it('honors a custom attempt limit', () => {
    const state = dispatched(stateFor('format it'), 'formatter');
    expect(
      decideRoute(state, { ...DEFAULT_ROUTING_POLICY, maxAttemptsPerWorker: 1 })
    ).toMatchObject({ type: 'terminate', status: 'failed' });
  });

  it('terminates successfully when every step has a result', () => {
    const state = stateFor('find bugs', {
      results: { logic: { findings: [] }, report: { report: 'ok' } },
    });
    expect(decideRoute(state, DEFAULT_ROUTING_POLICY)).toEqual({
      type: 'terminate',
      status: 'succeeded',
      taskKind: 'logic-analysis',
      reason: 'logic-analysis plan complete',
    });
  });

  it('throws RoutingError for an unclassifiable task', () => {
    expect(() => decideRoute(stateFor('hello there'), DEFAULT_ROUTING_POLICY)).toThrow(RoutingError);
  });

  it('truncates long task text in the RoutingError message', () => {
    const task = 'x'.repeat(100);
    expect(() => decideRoute(stateFor(task), DEFAULT_ROUTING_POLICY)).toThrow(
      `No worker can handle task "${'x'.repeat(80)}..."`
    );
  });

  it('is deterministic for identical state', () => {
    const state = stateFor('review this');
    expect(decideRoute(state, DEFAULT_ROUTING_POLICY)).toEqual(
      decideRoute(structuredClone(state), DEFAULT_ROUTING_POLICY)
    );
  });
});

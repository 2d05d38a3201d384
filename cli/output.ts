/**
 * Result formatting for stdout. Only the JSON result goes to stdout; logs
 * are written to stderr.
 */

import { describeOutcome, toStateSnapshot, type TaskState } from '@routegraph/agent-core';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

export function exitCodeFor(state: TaskState): number {
  return state.phase === 'terminated' ? EXIT_OK : EXIT_FAILED;
}

/**
 * Snapshot of a terminated task, or a failure report with the trace up to
 * the failure
 */
export function formatResult(state: TaskState): string {
  const snapshot = toStateSnapshot(state);
  const outcome = describeOutcome(state);

  if (outcome.status === 'terminated') {
    return JSON.stringify(snapshot, null, 2);
  }

  return JSON.stringify(
    {
      status: 'failed',
      errorKind: outcome.errorKind,
      message: outcome.message,
      trace: outcome.trace,
      state: snapshot,
    },
    null,
    2
  );
}

/**
 * Task State
 *
 * The record threaded through every node of the engine graph. Nodes receive
 * the current state and return partial updates; LangGraph folds them in with
 * the reducers below. `mergeTaskState` applies the same reducers outside the
 * graph.
 */

import { Annotation } from '@langchain/langgraph';
import type { RecoverableErrorKind, TaskFailure } from '../errors';
import { FatalEngineError } from '../errors';
import type { WorkerKind, WorkerOutputs, WorkerUpdate } from '../workers/types';
import type { TaskKind } from './routing-policy';

// ============================================================
// Types
// ============================================================

/**
 * Engine phases
 */
export type EnginePhase =
    | 'routing'
    | 'dispatching'
    | 'merging'
    | 'terminated'
    | 'failed';

/**
 * Decision produced by the orchestrator
 */
export type RouteDecision =
    | {
          type: 'dispatch';
          worker: WorkerKind;
          taskKind: TaskKind;
          /** 1-based attempt number for this worker */
          attempt: number;
          reason: string;
      }
    | {
          type: 'terminate';
          status: 'succeeded' | 'failed';
          taskKind: TaskKind;
          reason: string;
      };

export interface RouteRecord {
    step: number;
    decision: RouteDecision;
}

/**
 * A recoverable worker error, kept in state for the orchestrator
 */
export interface WorkerFault {
    step: number;
    worker: WorkerKind;
    kind: RecoverableErrorKind;
    message: string;
    /** Schema issues (OutputValidationError only) */
    issues: string[];
}

/**
 * What a dispatch produced, waiting to be merged
 */
export type WorkerOutcome =
    | {
          status: 'completed';
          worker: WorkerKind;
          results: Partial<WorkerOutputs>;
          update: WorkerUpdate;
      }
    | {
          status: 'faulted';
          worker: WorkerKind;
          fault: Omit<WorkerFault, 'step' | 'worker'>;
      };

export interface TraceEntry {
    step: number;
    phase: EnginePhase;
    event: string;
}

// ============================================================
// Reducer Functions
// ============================================================

export function lastWriteWins<T>(_existing: T, update: T): T {
    return update;
}

/**
 * Append-only reducer for arrays
 */
export function appendReducer<T>(existing: T[], update: T[]): T[] {
    if (update.length === 0) return existing;
    return [...existing, ...update];
}

/**
 * Merge reducer for records (last write wins per key)
 */
export function mergeReducer<T extends object>(existing: T, update: T): T {
    return { ...existing, ...update };
}

// ============================================================
// State Annotation
// ============================================================

export const TaskStateAnnotation = Annotation.Root({
    // ============ Input ============
    /** Task description as given by the caller */
    task: Annotation<string>({ reducer: lastWriteWins, default: () => '' }),

    /** Code or diff the workers operate on */
    subject: Annotation<string>({ reducer: lastWriteWins, default: () => '' }),

    /** Pull request the subject was fetched from */
    prUrl: Annotation<string | null>({ reducer: lastWriteWins, default: () => null }),

    // ============ Engine ============
    phase: Annotation<EnginePhase>({ reducer: lastWriteWins, default: () => 'routing' }),

    /** Completed orchestrator/worker round-trips */
    step: Annotation<number>({ reducer: lastWriteWins, default: () => 0 }),

    /** Set by routing, cleared by dispatch */
    pendingRoute: Annotation<RouteDecision | null>({
        reducer: lastWriteWins,
        default: () => null,
    }),

    /** Set by dispatch, cleared by merge */
    pendingOutcome: Annotation<WorkerOutcome | null>({
        reducer: lastWriteWins,
        default: () => null,
    }),

    // ============ Worker Outputs ============
    /** Validated worker results keyed by worker */
    results: Annotation<Partial<WorkerOutputs>>({
        reducer: mergeReducer,
        default: () => ({}),
    }),

    logicFindings: Annotation<string[]>({ reducer: appendReducer, default: () => [] }),

    styleFindings: Annotation<string[]>({ reducer: appendReducer, default: () => [] }),

    /** Mermaid diagram in a markdown fence */
    diagram: Annotation<string>({ reducer: lastWriteWins, default: () => '' }),

    /** Final output of the task */
    result: Annotation<string | null>({ reducer: lastWriteWins, default: () => null }),

    // ============ History ============
    routeHistory: Annotation<RouteRecord[]>({ reducer: appendReducer, default: () => [] }),

    faults: Annotation<WorkerFault[]>({ reducer: appendReducer, default: () => [] }),

    trace: Annotation<TraceEntry[]>({ reducer: appendReducer, default: () => [] }),

    /** Set when the engine reaches Failed */
    failure: Annotation<TaskFailure | null>({ reducer: lastWriteWins, default: () => null }),
});

export type TaskState = typeof TaskStateAnnotation.State;

export type TaskStateUpdate = Partial<TaskState>;

// ============================================================
// State Helpers
// ============================================================

export interface TaskInput {
    task: string;
    /** Defaults to the code extracted from the task text */
    subject?: string;
    prUrl?: string;
}

/**
 * Pull the code a task refers to out of its description: the first fenced
 * block, else everything after the first line.
 */
export function extractSubject(task: string): string {
    const fenced = task.match(/```[\w-]*\n([\s\S]*?)\n?```/);
    if (fenced) {
        return fenced[1];
    }
    const newline = task.indexOf('\n');
    return newline === -1 ? '' : task.slice(newline + 1).trim();
}

/**
 * Create the seed state for a task
 */
export function createInitialState(input: TaskInput): TaskState {
    if (input.task.trim() === '' && !input.prUrl) {
        throw new FatalEngineError('A task description is required');
    }
    return seedState(input);
}

/**
 * Seed state for an input that never ran, already in Failed
 */
export function createFailedState(input: TaskInput, failure: TaskFailure): TaskState {
    return {
        ...seedState(input),
        phase: 'failed',
        failure,
        trace: [{ step: 0, phase: 'failed', event: `${failure.kind}: ${failure.message}` }],
    };
}

function seedState(input: TaskInput): TaskState {
    return {
        task: input.task,
        subject: input.subject ?? extractSubject(input.task),
        prUrl: input.prUrl ?? null,
        phase: 'routing',
        step: 0,
        pendingRoute: null,
        pendingOutcome: null,
        results: {},
        logicFindings: [],
        styleFindings: [],
        diagram: '',
        result: null,
        routeHistory: [],
        faults: [],
        trace: [],
        failure: null,
    };
}

function fold<T>(current: T, next: T | undefined, reducer: (a: T, b: T) => T): T {
    return next === undefined ? current : reducer(current, next);
}

/**
 * Apply an update with the graph's reducers. Pure.
 */
export function mergeTaskState(state: TaskState, update: TaskStateUpdate): TaskState {
    return {
        task: fold(state.task, update.task, lastWriteWins),
        subject: fold(state.subject, update.subject, lastWriteWins),
        prUrl: fold(state.prUrl, update.prUrl, lastWriteWins),
        phase: fold(state.phase, update.phase, lastWriteWins),
        step: fold(state.step, update.step, lastWriteWins),
        pendingRoute: fold(state.pendingRoute, update.pendingRoute, lastWriteWins),
        pendingOutcome: fold(state.pendingOutcome, update.pendingOutcome, lastWriteWins),
        results: fold(state.results, update.results, mergeReducer),
        logicFindings: fold(state.logicFindings, update.logicFindings, appendReducer),
        styleFindings: fold(state.styleFindings, update.styleFindings, appendReducer),
        diagram: fold(state.diagram, update.diagram, lastWriteWins),
        result: fold(state.result, update.result, lastWriteWins),
        routeHistory: fold(state.routeHistory, update.routeHistory, appendReducer),
        faults: fold(state.faults, update.faults, appendReducer),
        trace: fold(state.trace, update.trace, appendReducer),
        failure: fold(state.failure, update.failure, lastWriteWins),
    };
}

export function isTerminal(state: TaskState): boolean {
    return state.phase === 'terminated' || state.phase === 'failed';
}

/**
 * Number of times the orchestrator has dispatched a worker
 */
export function attemptsFor(state: TaskState, worker: WorkerKind): number {
    return state.routeHistory.filter(
        (record) => record.decision.type === 'dispatch' && record.decision.worker === worker
    ).length;
}

export function lastFault(state: TaskState, worker?: WorkerKind): WorkerFault | undefined {
    const faults = worker
        ? state.faults.filter((fault) => fault.worker === worker)
        : state.faults;
    return faults[faults.length - 1];
}

/**
 * Get a summary of the current state
 */
export function getStateSummary(state: TaskState): {
    phase: EnginePhase;
    step: number;
    completedWorkers: WorkerKind[];
    faultCount: number;
    hasResult: boolean;
    failure: TaskFailure | null;
} {
    return {
        phase: state.phase,
        step: state.step,
        completedWorkers: completedWorkers(state),
        faultCount: state.faults.length,
        hasResult: state.result !== null,
        failure: state.failure,
    };
}

const WORKER_ORDER: readonly WorkerKind[] = ['formatter', 'logic', 'style', 'diagram', 'report'];

function completedWorkers(state: TaskState): WorkerKind[] {
    return WORKER_ORDER.filter((worker) => state.results[worker] !== undefined);
}

/**
 * JSON-ready copy of the state with a fixed field order and no
 * transient engine fields.
 */
export function toStateSnapshot(state: TaskState) {
    const results: Partial<WorkerOutputs> = {};
    for (const worker of completedWorkers(state)) {
        Object.assign(results, { [worker]: state.results[worker] });
    }

    return {
        task: state.task,
        subject: state.subject,
        prUrl: state.prUrl,
        phase: state.phase,
        step: state.step,
        result: state.result,
        results,
        logicFindings: state.logicFindings,
        styleFindings: state.styleFindings,
        diagram: state.diagram,
        routeHistory: state.routeHistory,
        faults: state.faults,
        failure: state.failure,
        trace: state.trace,
    };
}

export type StateSnapshot = ReturnType<typeof toStateSnapshot>;

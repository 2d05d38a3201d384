/**
 * Worker Executor Nodes
 *
 * Dispatch runs the worker the route node selected, bounded by a timeout.
 * Merge folds the settled outcome back into TaskState.
 */

import _ from 'lodash';
import type { IInferenceAdapter } from '@routegraph/inference-adapter';
import {
    FatalEngineError,
    OutputValidationError,
    WorkerExecutionError,
    WorkerTimeoutError,
} from '../errors';
import { createAgentLogger, createChildSpan, startTimer, type TraceContext } from '../tracing';
import type { WorkerContext, WorkerHandler, WorkerTable } from '../workers/types';
import type { EngineNode } from './orchestrator-node';
import { failedUpdate, getTraceContext } from './orchestrator-node';
import type { TaskState, WorkerOutcome } from './state';
import { isTerminal } from './state';

const log = createAgentLogger('ExecutorNode');

// ============================================================
// Types
// ============================================================

/**
 * Configuration for the dispatch node
 */
export interface DispatchNodeConfig {
    workers: WorkerTable;
    inference: IInferenceAdapter;
    /** Bound on a single worker invocation in ms */
    workerTimeoutMs: number;
}

// ============================================================
// Dispatch
// ============================================================

function freezeDeep<T>(value: T): T {
    if (value !== null && typeof value === 'object') {
        for (const child of Object.values(value)) {
            freezeDeep(child);
        }
        Object.freeze(value);
    }
    return value;
}

/**
 * Detached, deep-frozen copy of the state for a worker to read
 */
export function workerView(state: TaskState): Readonly<TaskState> {
    return freezeDeep(_.cloneDeep(state));
}

/**
 * Run a worker, aborting it when the timeout fires
 */
async function runWithTimeout(
    handler: WorkerHandler,
    state: Readonly<TaskState>,
    context: Omit<WorkerContext, 'signal'>,
    timeoutMs: number
): Promise<unknown> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new WorkerTimeoutError(handler.kind, timeoutMs));
            controller.abort();
        }, timeoutMs);
    });

    try {
        return await Promise.race([
            handler.run(state, { ...context, signal: controller.signal }),
            timeoutPromise,
        ]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Invoke a worker and settle whatever it produced into an outcome.
 * Recoverable errors become faults; nothing here throws for them.
 */
export async function invokeWorker(
    handler: WorkerHandler,
    state: Readonly<TaskState>,
    context: Omit<WorkerContext, 'signal'>,
    timeoutMs: number
): Promise<WorkerOutcome> {
    const worker = handler.kind;

    let raw: unknown;
    try {
        raw = await runWithTimeout(handler, state, context, timeoutMs);
    } catch (error) {
        const wrapped =
            error instanceof WorkerTimeoutError ? error : new WorkerExecutionError(worker, error);
        return {
            status: 'faulted',
            worker,
            fault: { kind: wrapped.kind, message: wrapped.message, issues: [] },
        };
    }

    const settlement = handler.settle(raw);
    if (!settlement.ok) {
        const error = new OutputValidationError(worker, settlement.issues);
        return {
            status: 'faulted',
            worker,
            fault: { kind: error.kind, message: error.message, issues: settlement.issues },
        };
    }

    return { status: 'completed', worker, results: settlement.results, update: settlement.update };
}

/**
 * Create the dispatch node
 */
export function createDispatchNode(config: DispatchNodeConfig): EngineNode {
    const { workers, inference, workerTimeoutMs } = config;

    return async (state, runnableConfig) => {
        const traceContext = getTraceContext(runnableConfig);
        const decision = state.pendingRoute;

        if (!decision || decision.type !== 'dispatch') {
            log.errorWithTrace(traceContext, '[DISPATCH] No pending dispatch');
            return failedUpdate(
                state,
                new FatalEngineError('Dispatch reached without a pending worker route').toFailure()
            );
        }

        const handler = workers[decision.worker];
        const workerTrace: TraceContext | undefined = traceContext
            ? createChildSpan(traceContext, `worker:${handler.kind}`, { attempt: decision.attempt })
            : undefined;
        const timer = startTimer(log, `worker ${handler.kind}`, workerTrace);

        log.infoWithTrace(workerTrace, '[DISPATCH] Running worker', {
            worker: handler.kind,
            attempt: decision.attempt,
            tier: handler.tier,
        });

        const outcome = await invokeWorker(
            handler,
            workerView(state),
            { inference, attempt: decision.attempt, traceContext: workerTrace },
            workerTimeoutMs
        );

        if (outcome.status === 'faulted') {
            timer.end(`[DISPATCH] ${handler.kind} faulted`, { kind: outcome.fault.kind });
        } else {
            timer.end(`[DISPATCH] ${handler.kind} completed`);
        }

        return {
            phase: 'merging',
            pendingRoute: null,
            pendingOutcome: outcome,
            trace: [
                {
                    step: state.step,
                    phase: 'dispatching',
                    event:
                        outcome.status === 'completed'
                            ? `${handler.kind} completed`
                            : `${handler.kind} ${outcome.fault.kind}`,
                },
            ],
        };
    };
}

// ============================================================
// Merge
// ============================================================

/**
 * Create the merge node
 */
export function createMergeNode(workers: WorkerTable): EngineNode {
    return async (state, runnableConfig) => {
        const traceContext = getTraceContext(runnableConfig);
        const outcome = state.pendingOutcome;

        if (!outcome) {
            return failedUpdate(
                state,
                new FatalEngineError('Merge reached without a worker outcome').toFailure()
            );
        }

        const nextStep = state.step + 1;

        if (outcome.status === 'faulted') {
            log.warnWithTrace(traceContext, '[MERGE] Recording fault', {
                worker: outcome.worker,
                kind: outcome.fault.kind,
                error: outcome.fault.message,
            });
            return {
                phase: 'routing',
                step: nextStep,
                pendingOutcome: null,
                faults: [{ step: state.step, worker: outcome.worker, ...outcome.fault }],
                trace: [
                    {
                        step: state.step,
                        phase: 'merging',
                        event: `recorded ${outcome.fault.kind} from ${outcome.worker}`,
                    },
                ],
            };
        }

        const declared = workers[outcome.worker].writes;
        const undeclared = Object.keys(outcome.update).filter(
            (key) => !declared.some((field) => field === key)
        );
        const foreignResults = Object.keys(outcome.results).filter((key) => key !== outcome.worker);

        if (undeclared.length > 0 || foreignResults.length > 0) {
            const error = new FatalEngineError(
                `${outcome.worker} wrote fields it does not own: ${[...undeclared, ...foreignResults].join(', ')}`
            );
            log.errorWithTrace(traceContext, '[MERGE] Merge conflict', { error: error.message });
            return failedUpdate(state, error.toFailure());
        }

        log.debugWithTrace(traceContext, '[MERGE] Applying update', {
            worker: outcome.worker,
            fields: Object.keys(outcome.update),
        });

        return {
            ...outcome.update,
            results: outcome.results,
            phase: 'routing',
            step: nextStep,
            pendingOutcome: null,
            trace: [{ step: state.step, phase: 'merging', event: `merged ${outcome.worker}` }],
        };
    };
}

// ============================================================
// Routing Functions
// ============================================================

/**
 * Route after dispatch: merge unless dispatch itself failed
 */
export function routeAfterDispatch(state: TaskState): 'merge' | 'end' {
    return state.phase === 'failed' ? 'end' : 'merge';
}

/**
 * Route after merge: back to the orchestrator unless the merge failed
 */
export function routeAfterMerge(state: TaskState): 'route' | 'end' {
    return isTerminal(state) ? 'end' : 'route';
}

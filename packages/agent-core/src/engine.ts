/**
 * Execution Engine
 *
 * Drives a task through the route / dispatch / merge loop until it reaches
 * Terminated or Failed.
 *
 * Architecture:
 *
 *    START ──► route ──► dispatch ──► merge ──┐
 *                ▲  │                          │
 *                │  └──► END (terminated /     │
 *                │        failed)              │
 *                └─────────────────────────────┘
 *
 * Each run owns its TaskState; nothing is shared between runs except the
 * read-only worker table and inference adapter.
 */

import { END, GraphRecursionError, START, StateGraph } from '@langchain/langgraph';
import _ from 'lodash';
import type { IInferenceAdapter } from '@routegraph/inference-adapter';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config/engine-config';
import { FatalEngineError, toTaskFailure, type ErrorKind, type TaskFailure } from './errors';
import {
    TaskStateAnnotation,
    createDispatchNode,
    createFailedState,
    createInitialState,
    createMergeNode,
    createRouteNode,
    guardNode,
    routeAfterDispatch,
    routeAfterMerge,
    routeAfterRoute,
    type EngineNode,
    type TaskInput,
    type TaskState,
    type TaskStateUpdate,
    type TraceEntry,
} from './orchestrator';
import { createAgentLogger, createTraceContext, type TraceContext } from './tracing';
import { createWorkerTable } from './workers';
import type { WorkerHandler, WorkerKind, WorkerTable } from './workers/types';

const log = createAgentLogger('Engine');

// ============================================================
// Configuration
// ============================================================

export type EngineNodeName = 'route' | 'dispatch' | 'merge';

/**
 * Receives every node's partial update as it is produced
 */
export type TransitionListener = (node: EngineNodeName, update: TaskStateUpdate) => void;

export interface CreateEngineOptions {
    /** Adapter handed to workers that need inference */
    inference: IInferenceAdapter;
    /** Replacement handlers for individual worker kinds */
    workers?: Partial<Record<WorkerKind, WorkerHandler>>;
    /** Engine bounds; unset fields take the defaults */
    config?: Partial<EngineConfig>;
}

export interface RunOptions {
    traceContext?: TraceContext;
    onTransition?: TransitionListener;
}

export interface Engine {
    readonly config: EngineConfig;
    readonly workers: WorkerTable;
    /** Run one task to a terminal phase and return its final state */
    run(input: TaskInput, options?: RunOptions): Promise<TaskState>;
    /** Run independent tasks in parallel, one state each */
    runMany(inputs: readonly TaskInput[], options?: Omit<RunOptions, 'traceContext'>): Promise<TaskState[]>;
}

/**
 * Reporting view of a finished task
 */
export interface TaskOutcome {
    status: 'terminated' | 'failed';
    errorKind?: ErrorKind;
    message?: string;
    trace: TraceEntry[];
}

// ============================================================
// Graph Builder
// ============================================================

interface GraphNodes {
    route: EngineNode;
    dispatch: EngineNode;
    merge: EngineNode;
}

function buildGraph(nodes: GraphNodes, onTransition?: TransitionListener) {
    const observe = (name: EngineNodeName): EngineNode => {
        const guarded = guardNode(name, nodes[name]);
        if (!onTransition) {
            return guarded;
        }
        return async (state, config) => {
            const update = await guarded(state, config);
            onTransition(name, update);
            return update;
        };
    };

    return new StateGraph(TaskStateAnnotation)
        .addNode('route', observe('route'))
        .addNode('dispatch', observe('dispatch'))
        .addNode('merge', observe('merge'))
        .addEdge(START, 'route')
        .addConditionalEdges('route', routeAfterRoute, {
            dispatch: 'dispatch',
            end: END,
        })
        .addConditionalEdges('dispatch', routeAfterDispatch, {
            merge: 'merge',
            end: END,
        })
        .addConditionalEdges('merge', routeAfterMerge, {
            route: 'route',
            end: END,
        });
}

/**
 * Supersteps needed for maxSteps round-trips plus the final routing pass
 */
export function recursionLimitFor(maxSteps: number): number {
    return maxSteps * 3 + 4;
}

// ============================================================
// Engine
// ============================================================

/**
 * Create an execution engine
 */
export function createEngine(options: CreateEngineOptions): Engine {
    const config: EngineConfig = {
        ...DEFAULT_ENGINE_CONFIG,
        ..._.omitBy<Partial<EngineConfig>>(options.config ?? {}, _.isNil),
    };
    const workers = createWorkerTable(options.workers);

    const nodes: GraphNodes = {
        route: createRouteNode({
            policy: {
                maxAttemptsPerWorker: config.maxAttemptsPerWorker,
                maxSubjectChars: config.maxSubjectChars,
            },
            maxSteps: config.maxSteps,
        }),
        dispatch: createDispatchNode({
            workers,
            inference: options.inference,
            workerTimeoutMs: config.workerTimeoutMs,
        }),
        merge: createMergeNode(workers),
    };

    const compiled = buildGraph(nodes).compile();

    async function run(input: TaskInput, runOptions: RunOptions = {}): Promise<TaskState> {
        const initialState = createInitialState(input);
        const traceContext =
            runOptions.traceContext ||
            createTraceContext(input.task || input.prUrl || 'task', { prUrl: input.prUrl });

        // Listeners are bound at build time, so observed runs get their own graph
        const graph = runOptions.onTransition
            ? buildGraph(nodes, runOptions.onTransition).compile()
            : compiled;

        log.infoWithTrace(traceContext, '[ENGINE] Starting task', {
            task: input.task.split('\n', 1)[0].substring(0, 100),
            subjectLength: initialState.subject.length,
            maxSteps: config.maxSteps,
        });

        let finalState: TaskState;
        try {
            finalState = await graph.invoke(initialState, {
                recursionLimit: recursionLimitFor(config.maxSteps),
                configurable: { traceContext },
            });
        } catch (error) {
            if (error instanceof GraphRecursionError) {
                throw new FatalEngineError(`Engine exceeded ${config.maxSteps} steps`);
            }
            throw error;
        }

        log.infoWithTrace(traceContext, '[ENGINE] Task finished', {
            phase: finalState.phase,
            step: finalState.step,
            faults: finalState.faults.length,
            failure: finalState.failure?.kind,
        });

        return finalState;
    }

    // A task that cannot run fails on its own; the rest of the batch still completes
    async function runIsolated(input: TaskInput, runOptions?: RunOptions): Promise<TaskState> {
        try {
            return await run(input, runOptions);
        } catch (error) {
            const failure = toTaskFailure(error);
            log.error('[ENGINE] Task aborted', { kind: failure.kind, error: failure.message });
            return createFailedState(input, failure);
        }
    }

    return {
        config,
        workers,
        run,
        runMany: (inputs, runOptions) =>
            Promise.all(inputs.map((input) => runIsolated(input, runOptions))),
    };
}

/**
 * Summarize a finished task for reporting
 */
export function describeOutcome(state: TaskState): TaskOutcome {
    if (state.phase === 'terminated') {
        return { status: 'terminated', trace: state.trace };
    }

    const failure: TaskFailure = state.failure ?? {
        kind: 'FatalEngineError',
        message: `Engine stopped in phase ${state.phase}`,
    };
    return {
        status: 'failed',
        errorKind: failure.kind,
        message: failure.message,
        trace: state.trace,
    };
}

/**
 * Orchestrator Node
 *
 * Routing phase of the engine. Asks the routing policy for the next step and
 * records the decision; never calls a worker or a model itself.
 */

import type { RunnableConfig } from '@langchain/core/runnables';
import { FatalEngineError, RoutingError, toTaskFailure, type TaskFailure } from '../errors';
import { createAgentLogger, isTraceContext, type TraceContext } from '../tracing';
import type { RoutingPolicy } from './routing-policy';
import { decideRoute } from './routing-policy';
import type { RouteDecision, TaskState, TaskStateUpdate } from './state';
import { lastFault } from './state';

const log = createAgentLogger('OrchestratorNode');

// ============================================================
// Types
// ============================================================

/**
 * Configuration for the route node
 */
export interface RouteNodeConfig {
    policy: RoutingPolicy;
    /** Round-trips allowed before the task is failed */
    maxSteps: number;
}

export type EngineNode = (state: TaskState, config?: RunnableConfig) => Promise<TaskStateUpdate>;

// ============================================================
// Shared Node Helpers
// ============================================================

/**
 * Trace context travels in the runnable config, not in TaskState
 */
export function getTraceContext(config?: RunnableConfig): TraceContext | undefined {
    const candidate: unknown = config?.configurable?.traceContext;
    return isTraceContext(candidate) ? candidate : undefined;
}

/**
 * Update that moves the engine to Failed
 */
export function failedUpdate(state: TaskState, failure: TaskFailure): TaskStateUpdate {
    return {
        phase: 'failed',
        failure,
        pendingRoute: null,
        pendingOutcome: null,
        trace: [{ step: state.step, phase: 'failed', event: `${failure.kind}: ${failure.message}` }],
    };
}

/**
 * Convert anything a node throws into a Failed update
 */
export function guardNode(name: string, node: EngineNode): EngineNode {
    return async (state, config) => {
        try {
            return await node(state, config);
        } catch (error) {
            const failure = toTaskFailure(error);
            log.errorWithTrace(getTraceContext(config), `[${name.toUpperCase()}] Unexpected error`, {
                kind: failure.kind,
                error: failure.message,
            });
            return failedUpdate(state, failure);
        }
    };
}

function describeDecision(decision: RouteDecision): string {
    if (decision.type === 'dispatch') {
        return `dispatch ${decision.worker} (attempt ${decision.attempt}): ${decision.reason}`;
    }
    return `terminate ${decision.status}: ${decision.reason}`;
}

// ============================================================
// Implementation
// ============================================================

/**
 * Create the route node
 */
export function createRouteNode(config: RouteNodeConfig): EngineNode {
    const { policy, maxSteps } = config;

    return async (state, runnableConfig) => {
        const traceContext = getTraceContext(runnableConfig);

        let decision: RouteDecision;
        try {
            decision = decideRoute(state, policy);
        } catch (error) {
            if (error instanceof RoutingError) {
                log.warnWithTrace(traceContext, '[ROUTE] No route', { error: error.message });
                return failedUpdate(state, error.toFailure());
            }
            throw error;
        }

        // Only another dispatch is bounded; a terminate decision always goes through
        if (decision.type === 'dispatch' && state.step >= maxSteps) {
            const error = new FatalEngineError(`Step limit of ${maxSteps} reached`);
            log.errorWithTrace(traceContext, '[ROUTE] Step limit reached', {
                step: state.step,
                worker: decision.worker,
            });
            return failedUpdate(state, error.toFailure());
        }

        log.infoWithTrace(traceContext, '[ROUTE] Decision', {
            step: state.step,
            decision: describeDecision(decision),
        });

        const routeHistory = [{ step: state.step, decision }];

        if (decision.type === 'dispatch') {
            return {
                phase: 'dispatching',
                pendingRoute: decision,
                routeHistory,
                trace: [{ step: state.step, phase: 'routing', event: describeDecision(decision) }],
            };
        }

        if (decision.status === 'succeeded') {
            return {
                phase: 'terminated',
                routeHistory,
                trace: [{ step: state.step, phase: 'terminated', event: decision.reason }],
            };
        }

        // Exhausted retries report the error that caused them
        const fault = lastFault(state);
        const failure: TaskFailure = {
            kind: fault?.kind ?? 'RoutingError',
            message: decision.reason,
        };
        return { ...failedUpdate(state, failure), routeHistory };
    };
}

/**
 * Route after the route node
 * - A pending dispatch goes to the dispatch node
 * - Terminated and Failed end the run
 */
export function routeAfterRoute(state: TaskState): 'dispatch' | 'end' {
    return state.phase === 'dispatching' && state.pendingRoute !== null ? 'dispatch' : 'end';
}

/**
 * Orchestrator Module
 *
 * Task state, routing policy and the engine's graph nodes.
 */

// State
export type {
    EnginePhase,
    RouteDecision,
    RouteRecord,
    WorkerFault,
    WorkerOutcome,
    TraceEntry,
    TaskState,
    TaskStateUpdate,
    TaskInput,
    StateSnapshot,
} from './state';
export {
    TaskStateAnnotation,
    lastWriteWins,
    appendReducer,
    mergeReducer,
    extractSubject,
    createInitialState,
    createFailedState,
    mergeTaskState,
    isTerminal,
    attemptsFor,
    lastFault,
    getStateSummary,
    toStateSnapshot,
} from './state';

// Routing Policy
export type { TaskKind, PlanStep, RoutingPolicy } from './routing-policy';
export { DEFAULT_ROUTING_POLICY, TASK_PLANS, classifyTask, decideRoute } from './routing-policy';

// Route Node
export type { RouteNodeConfig, EngineNode } from './orchestrator-node';
export {
    createRouteNode,
    routeAfterRoute,
    getTraceContext,
    failedUpdate,
    guardNode,
} from './orchestrator-node';

// Dispatch / Merge Nodes
export type { DispatchNodeConfig } from './executor-node';
export {
    createDispatchNode,
    createMergeNode,
    invokeWorker,
    workerView,
    routeAfterDispatch,
    routeAfterMerge,
} from './executor-node';

/**
 * Engine Errors
 *
 * Recoverable kinds (OutputValidationError, WorkerTimeoutError,
 * WorkerExecutionError) are recorded in TaskState for the orchestrator to
 * route around. RoutingError and FatalEngineError drive the engine to Failed.
 */

import type { WorkerKind } from './workers/types';

export type ErrorKind =
    | 'RoutingError'
    | 'OutputValidationError'
    | 'WorkerTimeoutError'
    | 'WorkerExecutionError'
    | 'FatalEngineError';

export type RecoverableErrorKind =
    | 'OutputValidationError'
    | 'WorkerTimeoutError'
    | 'WorkerExecutionError';

/**
 * Failure reported on a Failed task
 */
export interface TaskFailure {
    kind: ErrorKind;
    message: string;
}

export abstract class RouteGraphError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }

    toFailure(): TaskFailure {
        return { kind: this.kind, message: this.message };
    }
}

export class RoutingError extends RouteGraphError {
    readonly kind = 'RoutingError';
}

export class OutputValidationError extends RouteGraphError {
    readonly kind = 'OutputValidationError';

    constructor(
        readonly worker: WorkerKind,
        readonly issues: string[]
    ) {
        super(`${worker} returned an invalid result: ${issues.join('; ')}`);
    }
}

export class WorkerTimeoutError extends RouteGraphError {
    readonly kind = 'WorkerTimeoutError';

    constructor(
        readonly worker: WorkerKind,
        readonly timeoutMs: number
    ) {
        super(`${worker} exceeded ${timeoutMs}ms`);
    }
}

export class WorkerExecutionError extends RouteGraphError {
    readonly kind = 'WorkerExecutionError';

    constructor(
        readonly worker: WorkerKind,
        cause: unknown
    ) {
        super(`${worker} failed: ${cause instanceof Error ? cause.message : String(cause)}`);
    }
}

export class FatalEngineError extends RouteGraphError {
    readonly kind = 'FatalEngineError';
}

/**
 * Map any thrown value to a task failure. Unknown errors are fatal.
 */
export function toTaskFailure(error: unknown): TaskFailure {
    if (error instanceof RouteGraphError) {
        return error.toFailure();
    }
    return {
        kind: 'FatalEngineError',
        message: error instanceof Error ? error.message : String(error),
    };
}

/**
 * Worker Types
 *
 * Workers form a closed set. Each kind maps to exactly one handler through
 * the worker table; there is no lookup by arbitrary name.
 */

import type { z } from 'zod';
import type { IInferenceAdapter, ModelTier } from '@routegraph/inference-adapter';
import type { TaskState } from '../orchestrator/state';
import type { TraceContext } from '../tracing';
import type {
    DiagramOutput,
    FindingsOutput,
    FormatterOutput,
    ReportOutput,
} from './schemas';

export type WorkerKind = 'formatter' | 'logic' | 'style' | 'diagram' | 'report';

export const WORKER_KINDS: readonly WorkerKind[] = ['formatter', 'logic', 'style', 'diagram', 'report'];

/**
 * Validated output per worker kind
 */
export interface WorkerOutputs {
    formatter: FormatterOutput;
    logic: FindingsOutput;
    style: FindingsOutput;
    diagram: DiagramOutput;
    report: ReportOutput;
}

/**
 * TaskState fields a worker may propose values for
 */
export type WorkerField = 'logicFindings' | 'styleFindings' | 'diagram' | 'result';

export type WorkerUpdate = Partial<Pick<TaskState, WorkerField>>;

/**
 * Read-only collaborators handed to a worker for one invocation
 */
export interface WorkerContext {
    inference: IInferenceAdapter;
    /** Aborted when the invocation times out */
    signal: AbortSignal;
    attempt: number;
    traceContext?: TraceContext;
}

export type WorkerSettlement =
    | { ok: true; results: Partial<WorkerOutputs>; update: WorkerUpdate }
    | { ok: false; issues: string[] };

/**
 * Handler as the engine sees it
 */
export interface WorkerHandler {
    readonly kind: WorkerKind;
    readonly description: string;
    /** Inference tier used, null for workers that never call a model */
    readonly tier: ModelTier | null;
    /** Fields this worker's update may touch */
    readonly writes: readonly WorkerField[];
    run(state: Readonly<TaskState>, context: WorkerContext): Promise<unknown>;
    /** Validate raw output and turn it into a state update */
    settle(raw: unknown): WorkerSettlement;
}

/**
 * Typed definition a handler is built from
 */
export interface WorkerDefinition<K extends WorkerKind> {
    kind: K;
    description: string;
    tier: ModelTier | null;
    writes: readonly WorkerField[];
    schema: z.ZodType<WorkerOutputs[K]>;
    run(state: Readonly<TaskState>, context: WorkerContext): Promise<unknown>;
    toUpdate(output: WorkerOutputs[K]): WorkerUpdate;
}

export type WorkerTable = Readonly<Record<WorkerKind, WorkerHandler>>;

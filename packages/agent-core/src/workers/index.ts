/**
 * Workers Module
 *
 * The closed worker set and its lookup table.
 */

import { createDiagramWorker } from './diagram-worker';
import { createLogicWorker, createStyleWorker } from './findings-workers';
import { createFormatterWorker } from './formatter-worker';
import { createReportWorker } from './report-worker';
import type { WorkerHandler, WorkerKind, WorkerTable } from './types';
import { WORKER_KINDS } from './types';
import { FatalEngineError } from '../errors';

/**
 * Build the worker table. Overrides replace individual handlers (stubs in
 * tests, alternative implementations in deployments) but cannot add kinds.
 */
export function createWorkerTable(
    overrides: Partial<Record<WorkerKind, WorkerHandler>> = {}
): WorkerTable {
    const table: WorkerTable = {
        formatter: overrides.formatter ?? createFormatterWorker(),
        logic: overrides.logic ?? createLogicWorker(),
        style: overrides.style ?? createStyleWorker(),
        diagram: overrides.diagram ?? createDiagramWorker(),
        report: overrides.report ?? createReportWorker(),
    };

    for (const kind of WORKER_KINDS) {
        if (table[kind].kind !== kind) {
            throw new FatalEngineError(
                `Handler registered as ${kind} declares kind ${table[kind].kind}`
            );
        }
    }

    return table;
}

export type {
    WorkerKind,
    WorkerOutputs,
    WorkerField,
    WorkerUpdate,
    WorkerContext,
    WorkerSettlement,
    WorkerHandler,
    WorkerDefinition,
    WorkerTable,
} from './types';
export { WORKER_KINDS } from './types';
export { defineWorker, parseJsonReply, truncateContext } from './define-worker';
export {
    formatterOutputSchema,
    findingsOutputSchema,
    diagramOutputSchema,
    reportOutputSchema,
    describeIssues,
    type FormatterOutput,
    type FindingsOutput,
    type DiagramOutput,
    type ReportOutput,
} from './schemas';
export { isValidMermaid, sanitizeDiagram, formatDiagramSection, toMermaidFence } from './mermaid';
export { createFormatterWorker } from './formatter-worker';
export { createLogicWorker, createStyleWorker } from './findings-workers';
export { createDiagramWorker } from './diagram-worker';
export { createReportWorker, CLEAN_REVIEW_REPORT } from './report-worker';

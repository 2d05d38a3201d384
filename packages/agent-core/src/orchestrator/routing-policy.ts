/**
 * Routing Policy
 *
 * Deterministic task classification and plan walking. Everything here reads
 * TaskState only; identical states produce identical decisions.
 */

import { RoutingError } from '../errors';
import type { WorkerKind } from '../workers/types';
import type { RouteDecision, TaskState } from './state';
import { attemptsFor, lastFault } from './state';

export type TaskKind = 'format' | 'review' | 'logic-analysis' | 'style-check' | 'diagram';

export interface PlanStep {
    worker: WorkerKind;
    /** Skipped instead of failing the task once its attempts run out */
    optional?: boolean;
}

export interface RoutingPolicy {
    /** Dispatches allowed per worker, first attempt included */
    maxAttemptsPerWorker: number;
    /** Largest subject the orchestrator will route */
    maxSubjectChars: number;
}

export const DEFAULT_ROUTING_POLICY: RoutingPolicy = {
    maxAttemptsPerWorker: 2,
    maxSubjectChars: 60000,
};

/**
 * Worker sequence for each task kind
 */
export const TASK_PLANS: Readonly<Record<TaskKind, readonly PlanStep[]>> = {
    format: [{ worker: 'formatter' }],
    review: [
        { worker: 'logic' },
        { worker: 'style' },
        { worker: 'diagram', optional: true },
        { worker: 'report' },
    ],
    'logic-analysis': [{ worker: 'logic' }, { worker: 'report' }],
    'style-check': [{ worker: 'style' }, { worker: 'report' }],
    diagram: [{ worker: 'diagram' }, { worker: 'report' }],
};

/**
 * Keyword rules, first match wins
 */
const CLASSIFICATION_RULES: ReadonlyArray<{ kind: TaskKind; pattern: RegExp }> = [
    { kind: 'review', pattern: /\b(review|pull request|diff)\b/i },
    { kind: 'format', pattern: /\b(format|reformat|prettify|pretty-print|indent)\b/i },
    { kind: 'diagram', pattern: /\b(diagram|visuali[sz]e|architecture)\b/i },
    { kind: 'style-check', pattern: /\b(style|lint|naming|readability)\b/i },
    { kind: 'logic-analysis', pattern: /\b(logic|bugs?|security|vulnerabilit(y|ies)|analy[sz]e)\b/i },
];

export function classifyTask(state: Pick<TaskState, 'task' | 'prUrl'>): TaskKind | undefined {
    if (state.prUrl) {
        return 'review';
    }
    const firstLine = state.task.split('\n', 1)[0];
    return CLASSIFICATION_RULES.find((rule) => rule.pattern.test(firstLine))?.kind;
}

function preview(text: string, length = 80): string {
    const line = text.split('\n', 1)[0];
    return line.length > length ? `${line.substring(0, length)}...` : line;
}

/**
 * Decide the next step for a task.
 *
 * @throws RoutingError when the task cannot be classified or its subject is
 *   over the size limit
 */
export function decideRoute(state: TaskState, policy: RoutingPolicy): RouteDecision {
    const taskKind = classifyTask(state);
    if (!taskKind) {
        throw new RoutingError(`No worker can handle task "${preview(state.task)}"`);
    }

    if (state.subject.length > policy.maxSubjectChars) {
        throw new RoutingError(
            `Subject is ${state.subject.length} characters; the limit is ${policy.maxSubjectChars}`
        );
    }

    for (const step of TASK_PLANS[taskKind]) {
        if (state.results[step.worker] !== undefined) {
            continue;
        }

        const attempts = attemptsFor(state, step.worker);
        const fault = lastFault(state, step.worker);

        if (attempts < policy.maxAttemptsPerWorker) {
            return {
                type: 'dispatch',
                worker: step.worker,
                taskKind,
                attempt: attempts + 1,
                reason: fault ? `retry after ${fault.kind}` : `next step of ${taskKind} plan`,
            };
        }

        if (step.optional) {
            continue;
        }

        return {
            type: 'terminate',
            status: 'failed',
            taskKind,
            reason: `${step.worker} failed after ${attempts} attempts${fault ? `: ${fault.message}` : ''}`,
        };
    }

    return {
        type: 'terminate',
        status: 'succeeded',
        taskKind,
        reason: `${taskKind} plan complete`,
    };
}

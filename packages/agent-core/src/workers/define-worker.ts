/**
 * Worker definition helpers
 */

import type {
    WorkerDefinition,
    WorkerHandler,
    WorkerKind,
    WorkerOutputs,
} from './types';
import { describeIssues } from './schemas';

/**
 * Build an engine-facing handler from a typed definition. The schema check
 * and the output-to-update mapping stay behind `settle`.
 */
export function defineWorker<K extends WorkerKind>(definition: WorkerDefinition<K>): WorkerHandler {
    return {
        kind: definition.kind,
        description: definition.description,
        tier: definition.tier,
        writes: definition.writes,
        run: (state, context) => definition.run(state, context),
        settle(raw) {
            const parsed = definition.schema.safeParse(raw);
            if (!parsed.success) {
                return { ok: false, issues: describeIssues(parsed.error) };
            }

            const results: Partial<WorkerOutputs> = {};
            results[definition.kind] = parsed.data;
            return { ok: true, results, update: definition.toUpdate(parsed.data) };
        },
    };
}

/**
 * Pull the first JSON object out of a model reply. Text that holds no
 * parseable object comes back unchanged so schema validation rejects it.
 */
export function parseJsonReply(reply: string): unknown {
    const jsonMatch = reply.match(/\{[\s\S]*\}/);
    if (!jsonMatch) {
        return reply;
    }

    try {
        const parsed: unknown = JSON.parse(jsonMatch[0]);
        return parsed;
    } catch {
        return reply;
    }
}

const CONTEXT_LIMIT = 10000;

/**
 * Keep prompt context bounded
 */
export function truncateContext(text: string, limit = CONTEXT_LIMIT): string {
    return text.length > limit ? `${text.substring(0, limit)}\n...(truncated for context)` : text;
}

/**
 * Formatter Worker
 *
 * Reformats the task subject on the fast tier.
 */

import { defineWorker, parseJsonReply } from './define-worker';
import { FORMATTER_PROMPT } from './prompts';
import { formatterOutputSchema } from './schemas';
import type { WorkerHandler } from './types';

export function createFormatterWorker(): WorkerHandler {
    return defineWorker({
        kind: 'formatter',
        description: 'Reformats a code snippet without changing behavior',
        tier: 'fast',
        writes: ['result'],
        schema: formatterOutputSchema,
        async run(state, { inference, signal }) {
            const { text } = await inference.complete({
                tier: 'fast',
                system: FORMATTER_PROMPT,
                prompt: `## Task\n${state.task.split('\n', 1)[0]}\n\n## Code\n${state.subject}`,
                signal,
            });
            return parseJsonReply(text);
        },
        toUpdate: (output) => ({ result: output.formatted }),
    });
}

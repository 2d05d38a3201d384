/**
 * Logic and style review workers. Both return a list of findings that is
 * appended to its own TaskState field.
 */

import { defineWorker, parseJsonReply, truncateContext } from './define-worker';
import { LOGIC_PROMPT, STYLE_PROMPT } from './prompts';
import { findingsOutputSchema } from './schemas';
import type { WorkerHandler } from './types';

function reviewPrompt(task: string, subject: string): string {
    return `## Task\n${task.split('\n', 1)[0]}\n\n## Code\n${truncateContext(subject)}`;
}

export function createLogicWorker(): WorkerHandler {
    return defineWorker({
        kind: 'logic',
        description: 'Finds logic errors, bugs and security problems',
        tier: 'heavy',
        writes: ['logicFindings'],
        schema: findingsOutputSchema,
        async run(state, { inference, signal }) {
            const { text } = await inference.complete({
                tier: 'heavy',
                system: LOGIC_PROMPT,
                prompt: reviewPrompt(state.task, state.subject),
                signal,
            });
            return parseJsonReply(text);
        },
        toUpdate: (output) => ({ logicFindings: output.findings }),
    });
}

export function createStyleWorker(): WorkerHandler {
    return defineWorker({
        kind: 'style',
        description: 'Checks naming, readability and formatting conventions',
        tier: 'fast',
        writes: ['styleFindings'],
        schema: findingsOutputSchema,
        async run(state, { inference, signal }) {
            const { text } = await inference.complete({
                tier: 'fast',
                system: STYLE_PROMPT,
                prompt: reviewPrompt(state.task, state.subject),
                signal,
            });
            return parseJsonReply(text);
        },
        toUpdate: (output) => ({ styleFindings: output.findings }),
    });
}

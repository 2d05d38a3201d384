/**
 * Diagram Worker
 *
 * Generates a Mermaid class diagram of the structural changes in the subject
 * on the heavy tier. The reply is sanitized before validation; a reply with
 * no usable diagram fails the schema.
 */

import { defineWorker, truncateContext } from './define-worker';
import { sanitizeDiagram, toMermaidFence } from './mermaid';
import { DIAGRAM_PROMPT } from './prompts';
import { diagramOutputSchema } from './schemas';
import type { WorkerHandler } from './types';

const DIAGRAM_CONTEXT_LIMIT = 8000;

export function createDiagramWorker(): WorkerHandler {
    return defineWorker({
        kind: 'diagram',
        description: 'Draws a Mermaid class diagram of structural changes',
        tier: 'heavy',
        writes: ['diagram'],
        schema: diagramOutputSchema,
        async run(state, { inference, signal }) {
            if (!state.subject) {
                return { diagram: '' };
            }

            const { text } = await inference.complete({
                tier: 'heavy',
                system: DIAGRAM_PROMPT,
                prompt:
                    'Analyze the following code changes and generate a Mermaid class diagram ' +
                    `that visualizes the architectural modifications:\n\n${truncateContext(state.subject, DIAGRAM_CONTEXT_LIMIT)}\n\n` +
                    'Generate ONLY valid Mermaid classDiagram code.',
                signal,
            });
            return { diagram: sanitizeDiagram(text) };
        },
        toUpdate: (output) => ({ diagram: toMermaidFence(output.diagram) }),
    });
}

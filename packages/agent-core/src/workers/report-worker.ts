/**
 * Report Worker
 *
 * Assembles the final review from the findings collected so far. The
 * architecture diagram, when present and valid, always comes first. With no
 * findings and no diagram the report is written without calling a model.
 */

import { defineWorker, truncateContext } from './define-worker';
import { formatDiagramSection } from './mermaid';
import { REPORT_PROMPT } from './prompts';
import { reportOutputSchema } from './schemas';
import type { WorkerHandler } from './types';

export const CLEAN_REVIEW_REPORT =
    '## Automated Review\n\nNo critical issues or style suggestions detected.';

function bulletList(items: string[]): string {
    return items.map((item) => `- ${item}`).join('\n');
}

export function createReportWorker(): WorkerHandler {
    return defineWorker({
        kind: 'report',
        description: 'Writes the final review report from collected findings',
        tier: 'heavy',
        writes: ['result'],
        schema: reportOutputSchema,
        async run(state, { inference, signal }) {
            const diagramSection = formatDiagramSection(state.diagram);

            if (
                state.logicFindings.length === 0 &&
                state.styleFindings.length === 0 &&
                !diagramSection
            ) {
                return { report: CLEAN_REVIEW_REPORT };
            }

            const prompt =
                `CONTEXT:\n${truncateContext(state.subject)}\n\n` +
                `LOGIC FINDINGS:\n${bulletList(state.logicFindings)}\n\n` +
                `STYLE FINDINGS:\n${bulletList(state.styleFindings)}\n\n` +
                'Write the report.';

            const { text } = await inference.complete({
                tier: 'heavy',
                system: REPORT_PROMPT,
                prompt,
                signal,
            });
            return { report: diagramSection + text };
        },
        toUpdate: (output) => ({ result: output.report }),
    });
}

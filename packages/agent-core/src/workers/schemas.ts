/**
 * Worker output schemas. A worker's raw output must parse against its
 * schema before anything reaches TaskState.
 */

import { z } from 'zod';
import { isValidMermaid } from './mermaid';

export const formatterOutputSchema = z.object({
    formatted: z.string().min(1, 'formatted output is empty'),
    language: z.string(),
    notes: z.array(z.string()),
});

export const findingsOutputSchema = z.object({
    findings: z.array(z.string()),
});

export const diagramOutputSchema = z.object({
    diagram: z.string().refine(isValidMermaid, 'not a valid Mermaid diagram'),
});

export const reportOutputSchema = z.object({
    report: z.string().min(1, 'report is empty'),
});

export type FormatterOutput = z.infer<typeof formatterOutputSchema>;
export type FindingsOutput = z.infer<typeof findingsOutputSchema>;
export type DiagramOutput = z.infer<typeof diagramOutputSchema>;
export type ReportOutput = z.infer<typeof reportOutputSchema>;

/**
 * Render zod issues as "path: message" lines
 */
export function describeIssues(error: z.ZodError): string[] {
    return error.issues.map(
        (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
}

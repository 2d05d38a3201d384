/**
 * Mermaid helpers for the diagram and report workers
 */

const REFUSAL_PATTERNS = [/^Error:/im, /^I apologize/im, /^I cannot/im, /^I don't/im];

/**
 * Loose syntax check: a diagram keyword, balanced braces, and no
 * refusal or error text from the model.
 */
export function isValidMermaid(diagram: string): boolean {
    if (!diagram) {
        return false;
    }

    const hasDiagramType = diagram.includes('classDiagram') || diagram.includes('graph');
    const openBraces = diagram.split('{').length - 1;
    const closeBraces = diagram.split('}').length - 1;

    if (!hasDiagramType || openBraces !== closeBraces) {
        return false;
    }

    return !REFUSAL_PATTERNS.some((pattern) => pattern.test(diagram));
}

/**
 * Extract the diagram body from a model reply. Returns '' when nothing
 * valid is left.
 */
export function sanitizeDiagram(reply: string): string {
    if (!reply) {
        return '';
    }

    let cleaned: string;
    const fenced = reply.match(/```(?:mermaid)?\s*\n?([\s\S]*?)\n?```/i);
    if (fenced) {
        cleaned = fenced[1].trim();
    } else {
        const bare = reply.match(/(classDiagram[\s\S]*?)(?:\n```|$)/i);
        cleaned = bare ? bare[1].trim() : reply.trim();
    }

    // drop prose before the diagram keyword
    const lines: string[] = [];
    let inDiagram = false;
    for (const line of cleaned.split('\n')) {
        if (/^\s*(classDiagram|graph)/.test(line)) {
            inDiagram = true;
        }
        if (inDiagram) {
            lines.push(line);
        }
    }

    const result = lines.join('\n').trim();
    return isValidMermaid(result) ? result : '';
}

export function toMermaidFence(diagram: string): string {
    return diagram.startsWith('```') ? diagram : `\`\`\`mermaid\n${diagram}\n\`\`\``;
}

/**
 * Diagram section placed at the top of a review report; '' when the
 * diagram is missing or invalid.
 */
export function formatDiagramSection(diagram: string): string {
    if (!isValidMermaid(diagram)) {
        return '';
    }

    return (
        '## Architecture Visualization\n\n' +
        'This diagram shows the structural changes introduced in this change set:\n\n' +
        `${toMermaidFence(diagram)}\n\n` +
        '---\n\n'
    );
}

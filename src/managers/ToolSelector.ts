import type { ToolDescriptor } from '../types/toolTypes.js';

/**
 * Terms that mark a remote tool as useful for looking up design standards:
 * searching, finding, retrieving, summarizing, and reading fact sheets or records.
 */
export const DEFAULT_VOCABULARY: readonly string[] = Object.freeze([
    'search',
    'find',
    'get',
    'retrieve',
    'overview',
    'summary',
    'fact sheet',
    'record',
]);

/**
 * Returns the tools whose name or description contains any vocabulary term,
 * compared case-insensitively as substrings.
 *
 * Input order is kept and a repeated name keeps only its first occurrence.
 * When nothing matches the result is empty; the agent then answers without tools.
 */
export function selectRelevant<T extends ToolDescriptor>(
    tools: readonly T[],
    vocabulary: Iterable<string> = DEFAULT_VOCABULARY,
): T[] {
    const terms = [...vocabulary].map(term => term.toLowerCase()).filter(term => term.length > 0);
    const seen = new Set<string>();
    const selected: T[] = [];

    for (const tool of tools) {
        if (seen.has(tool.name)) {
            continue;
        }
        const name = tool.name.toLowerCase();
        const description = tool.description.toLowerCase();
        if (terms.some(term => name.includes(term) || description.includes(term))) {
            seen.add(tool.name);
            selected.push(tool);
        }
    }
    return selected;
}

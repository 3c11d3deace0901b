/**
 * Citation markers and the References block
 */

import type { SearchResult } from './types.js';

const PREVIEW_LENGTH = 100;
const MARKER = /\[(\d+)\]/g;
const REFERENCES_HEADING =
    /(?:^|\n)[ \t]*(?:#{1,6}[ \t]*)?(?:\*\*)?(?:references|sources|참고[ \t]*자료|출처)(?:\*\*)?[ \t]*:?[ \t]*(?:\*\*)?[ \t]*(?:\n[\s\S]*)?$/i;

export function preview(content: string, length = PREVIEW_LENGTH): string {
    const collapsed = content.replace(/\s+/g, ' ').trim();
    return collapsed.length > length ? `${collapsed.slice(0, length)}...` : collapsed;
}

export function citedIds(text: string): number[] {
    const ids = new Set<number>();
    for (const match of text.matchAll(MARKER)) {
        ids.add(Number(match[1]));
    }
    return [...ids].sort((a, b) => a - b);
}

/**
 * "(Based on [1], [2])" for replies that cite nothing on their own
 */
export function attribution(results: SearchResult[]): string {
    const ids = [...new Set(results.map((r) => r.citationId))].sort((a, b) => a - b);
    return `(Based on ${ids.map((id) => `[${id}]`).join(', ')})`;
}

/**
 * Drop markers that point at nothing and rebuild the References block from what remains
 */
export function finalizeCitations(
    text: string,
    results: SearchResult[]
): { text: string; citationsUsed: number[] } {
    const byId = new Map<number, SearchResult>();
    for (const result of results) byId.set(result.citationId, result);

    const body = text
        .replace(REFERENCES_HEADING, '')
        .replace(/[ \t]*\[(\d+)\]/g, (marker: string, id: string) => (byId.has(Number(id)) ? marker : ''))
        .trimEnd();

    const citationsUsed = citedIds(body);
    if (citationsUsed.length === 0) {
        return { text: body, citationsUsed };
    }

    const lines = citationsUsed.flatMap((id) => {
        const result = byId.get(id);
        return result ? [`[${id}] ${result.source}: ${preview(result.content)}`] : [];
    });

    return {
        text: `${body}\n\n**References:**\n${lines.join('\n')}`,
        citationsUsed,
    };
}

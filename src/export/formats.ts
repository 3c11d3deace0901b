/**
 * Export Formats - Write a chat transcript to disk
 */

import { writeFile } from 'fs/promises';
import path from 'path';
import { marked } from 'marked';
import type { SessionTurn } from '../agent/session.js';

export type ExportFormat = 'markdown' | 'html' | 'txt' | 'json';

export interface ExportOptions {
    title?: string;
    format: ExportFormat;
    outputPath: string;
}

const DEFAULT_TITLE = 'ragchat transcript';

/**
 * Get file extension for a format
 */
export function getExtension(format: ExportFormat): string {
    switch (format) {
        case 'markdown': return '.md';
        case 'html': return '.html';
        case 'txt': return '.txt';
        case 'json': return '.json';
    }
}

/**
 * Guess the format from a file name, markdown when unsure
 */
export function formatFromPath(outputPath: string): ExportFormat {
    switch (path.extname(outputPath).toLowerCase()) {
        case '.html':
        case '.htm':
            return 'html';
        case '.txt':
            return 'txt';
        case '.json':
            return 'json';
        default:
            return 'markdown';
    }
}

function metaLine(turn: SessionTurn): string | undefined {
    if (!turn.meta) return undefined;
    const seconds = (turn.meta.executionTime / 1000).toFixed(1);
    const plural = turn.meta.iterationsUsed === 1 ? '' : 's';
    return `${turn.meta.iterationsUsed} iteration${plural} · ${turn.meta.terminationReason} · ${seconds}s`;
}

export function toMarkdown(turns: readonly SessionTurn[], title = DEFAULT_TITLE): string {
    const sections = [`# ${title}`];
    for (const turn of turns) {
        const heading = turn.role === 'user' ? '## You' : '## Assistant';
        const meta = metaLine(turn);
        sections.push(meta ? `${heading}\n\n${turn.content}\n\n_${meta}_` : `${heading}\n\n${turn.content}`);
    }
    return `${sections.join('\n\n')}\n`;
}

/**
 * Simple markdown stripping
 */
export function stripMarkdown(content: string): string {
    return content
        .replace(/^#{1,6}\s+/gm, '')
        .replace(/\*\*(.+?)\*\*/g, '$1')
        .replace(/\*(.+?)\*/g, '$1')
        .replace(/__(.+?)__/g, '$1')
        .replace(/(^|\s)_(.+?)_(?=\s|$)/gm, '$1$2')
        .replace(/!\[([^\]]*)\]\([^)]+\)/g, '$1')
        .replace(/\[([^\]]+)\]\([^)]+\)/g, '$1')
        .replace(/```[\s\S]*?```/g, '')
        .replace(/`([^`]+)`/g, '$1')
        .replace(/^>\s+/gm, '')
        .replace(/^---+$/gm, '')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}

export function toPlainText(turns: readonly SessionTurn[], title = DEFAULT_TITLE): string {
    return `${stripMarkdown(toMarkdown(turns, title))}\n`;
}

export function toJson(turns: readonly SessionTurn[], title = DEFAULT_TITLE): string {
    return `${JSON.stringify({ title, turns }, null, 2)}\n`;
}

export async function toHtml(turns: readonly SessionTurn[], title = DEFAULT_TITLE): Promise<string> {
    const body = await marked.parse(toMarkdown(turns, title));
    return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${title}</title>
    <style>
        body {
            font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Oxygen, Ubuntu, sans-serif;
            max-width: 800px;
            margin: 0 auto;
            padding: 2rem;
            line-height: 1.6;
            color: #333;
        }
        h2 { border-bottom: 1px solid #e2e8f0; padding-bottom: 0.3rem; }
        em { color: #666; }
    </style>
</head>
<body>
${body}
</body>
</html>`;
}

export async function renderTranscript(
    turns: readonly SessionTurn[],
    format: ExportFormat,
    title?: string
): Promise<string> {
    switch (format) {
        case 'markdown': return toMarkdown(turns, title);
        case 'txt': return toPlainText(turns, title);
        case 'json': return toJson(turns, title);
        case 'html': return toHtml(turns, title);
    }
}

/**
 * Export a transcript to the requested format
 */
export async function exportTranscript(turns: readonly SessionTurn[], options: ExportOptions): Promise<void> {
    const content = await renderTranscript(turns, options.format, options.title);
    await writeFile(options.outputPath, content, 'utf-8');
}

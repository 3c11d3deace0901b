/**
 * In-process stand-ins for the model and search clients
 */

import { vi } from 'vitest';
import type { SearchClient, SearchOptions } from '../clients/knowledge-base.js';
import type { ModelClient, ModelRequest } from '../clients/model.js';
import type { AgentSettings } from '../agent/settings.js';
import type {
    ActionResult,
    ConversationTurn,
    LoopContext,
    OrchestrationResult,
    SearchOutcome,
    SearchResult,
    StepRecord,
} from '../agent/types.js';

export function testSettings(overrides: Partial<AgentSettings> = {}): AgentSettings {
    return {
        indexId: 'KB-TEST',
        kbDescription: 'Company HR policies',
        systemPrompt: '',
        models: { orchestration: 'test-orchestrator', action: 'test-search', observation: 'test-writer' },
        temperature: 0.1,
        maxTokens: 4000,
        maxIterations: 5,
        maxErrors: 3,
        historyWindow: 10,
        ...overrides,
    };
}

export function testContext(overrides: Partial<LoopContext> = {}): LoopContext {
    return {
        originalQuery: 'What is the approval process?',
        conversationHistory: [],
        accumulatedSearchResults: [],
        iteration: 1,
        nextCitationId: 1,
        ...overrides,
    };
}

export const pastTurns: ConversationTurn[] = [
    { role: 'user', content: 'How many vacation days do I get?', timestamp: '2026-01-05T09:00:00.000Z' },
    { role: 'assistant', content: 'Fifteen days per year [1].', timestamp: '2026-01-05T09:00:03.000Z' },
];

/**
 * Model that answers from a queue, in call order
 */
export function scriptedModel(...replies: Array<string | Error>) {
    const queue = [...replies];
    const invoke = vi.fn(async (_request: ModelRequest): Promise<string> => {
        const next = queue.shift();
        if (next === undefined) throw new Error('No scripted model reply left');
        if (next instanceof Error) throw next;
        return next;
    });
    const client: ModelClient = { provider: 'openrouter', invoke };
    return { client, invoke };
}

export function fakeSearch(
    handler: (queries: string[], options: SearchOptions) => SearchOutcome | Promise<SearchOutcome>
) {
    const searchMultiple = vi.fn(async (_indexId: string, queries: string[], options: SearchOptions = {}) =>
        handler(queries, options)
    );
    const client: SearchClient = { searchMultiple };
    return { client, searchMultiple };
}

/**
 * One result per score, numbered from the requested first id
 */
export function hits(scores: number[], options: SearchOptions, content = 'x'.repeat(60), query = 'approval'): SearchOutcome {
    const first = options.firstCitationId ?? 1;
    return {
        results: scores.map((score, i) => result(first + i, score, `${content} (${first + i})`, query)),
        errors: [],
    };
}

export function result(citationId: number, score: number, content: string, query = 'approval'): SearchResult {
    return {
        content,
        score,
        source: `S3: s3://docs/doc-${citationId}.pdf`,
        query,
        citationId,
    };
}

export function planStep(iteration: number, plan: Partial<OrchestrationResult>): StepRecord {
    return {
        type: 'orchestration',
        iteration,
        modelUsed: 'test-orchestrator',
        content: '',
        error: false,
        parsedResult: {
            needsSearch: true,
            searchKeywords: [],
            intent: 'search',
            confidence: 0.95,
            reasoning: '',
            ...plan,
        },
    };
}

export function actionStep(iteration: number, action: Partial<ActionResult>): StepRecord {
    const parsedResult: ActionResult = {
        searchResults: [],
        searchKeywords: [],
        content: '',
        error: false,
        ...action,
    };
    return {
        type: 'action',
        iteration,
        modelUsed: 'test-search',
        content: parsedResult.content,
        error: parsedResult.error,
        parsedResult,
    };
}

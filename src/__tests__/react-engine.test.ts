/**
 * End-to-end runs of the ReAct loop with in-process model and search stand-ins
 */

import { describe, it, expect } from 'vitest';
import { ReactEngine } from '../agent/react-engine.js';
import type { ObservationRecord } from '../agent/observation.js';
import type { OrchestrationRecord } from '../agent/orchestration.js';
import type { SearchOptions } from '../clients/knowledge-base.js';
import type { ConversationTurn, LoopContext, SearchOutcome } from '../agent/types.js';
import { fakeSearch, hits, scriptedModel, testSettings } from './helpers.js';

const PASSAGE = 'x'.repeat(60);
const passage = (id: number) => `${PASSAGE} (${id})`;
const reference = (id: number) => `[${id}] S3: s3://docs/doc-${id}.pdf: ${passage(id)}`;

interface Adversary {
    search: (queries: string[], options: SearchOptions) => SearchOutcome;
    replies: Array<string | Error>;
}

function retryingObservation(keywordsFor: (iteration: number) => string[]) {
    return {
        observe: async (context: LoopContext): Promise<ObservationRecord> => ({
            type: 'observation',
            iteration: context.iteration,
            modelUsed: 'test-writer',
            content: 'retry',
            error: false,
            parsedResult: {
                isFinalAnswer: false,
                needsRetry: true,
                retryKeywords: keywordsFor(context.iteration),
                qualityScore: 0.1,
                citations: [],
                reasoning: 'weak evidence',
            },
        }),
    };
}

describe('ReactEngine', () => {
    it('should greet in one iteration without searching', async () => {
        const model = scriptedModel();
        const search = fakeSearch(() => ({ results: [], errors: [] }));
        let clock = 0;
        const engine = new ReactEngine(testSettings({ indexId: '' }), {
            modelClient: model.client,
            searchClient: search.client,
            now: () => (clock += 250),
        });

        const result = await engine.run('hello');

        expect(result.content).toBe('Hello! How can I help you?');
        expect(result.iterationsUsed).toBe(1);
        expect(result.terminationReason).toBe('goal achieved');
        expect(result.safetyTriggered).toBe(false);
        expect(result.executionTime).toBe(250);
        expect(result.trace.map((s) => s.type)).toEqual(['orchestration', 'observation']);
        expect(search.searchMultiple).not.toHaveBeenCalled();
        expect(model.invoke).not.toHaveBeenCalled();
    });

    it('should answer in one iteration when the first search is strong', async () => {
        const model = scriptedModel(
            '["approval process", "approval"]',
            'Managers approve small purchases [1]. Directors approve the rest [2]. See also [9].'
        );
        const search = fakeSearch((_queries, options) => hits([0.7, 0.6, 0.5, 0.5, 0.45], options, PASSAGE));
        const engine = new ReactEngine(testSettings(), { modelClient: model.client, searchClient: search.client });

        const result = await engine.run('What is the approval process?');

        expect(result.iterationsUsed).toBe(1);
        expect(result.terminationReason).toBe('goal achieved');
        expect(result.trace.map((s) => s.type)).toEqual(['orchestration', 'action', 'observation']);
        expect(result.citationsUsed).toEqual([1, 2]);
        expect(result.content).toBe([
            'Managers approve small purchases [1]. Directors approve the rest [2]. See also.',
            '',
            '**References:**',
            reference(1),
            reference(2),
        ].join('\n'));
    });

    it('should keep retrying until the relaxed gate on the last iteration', async () => {
        const model = scriptedModel(
            '["approval process"]',
            '["approval form"]',
            '["sign-off"]',
            '["workflow"]',
            '["authorization"]',
            'Fill in the approval form [5] and send it to finance [6].'
        );
        let calls = 0;
        const search = fakeSearch((_queries, options) => {
            calls += 1;
            return calls < 5 ? hits([0.1], options, PASSAGE) : hits([0.25, 0.25], options, PASSAGE);
        });
        const engine = new ReactEngine(testSettings(), { modelClient: model.client, searchClient: search.client });

        const result = await engine.run('What is the approval process?');

        expect(result.iterationsUsed).toBe(5);
        expect(result.terminationReason).toBe('goal achieved');
        expect(result.trace).toHaveLength(15);
        expect(search.searchMultiple).toHaveBeenCalledTimes(5);
        expect(search.searchMultiple).toHaveBeenLastCalledWith('KB-TEST', ['authorization'], {
            maxResultsPerQuery: 3,
            firstCitationId: 5,
        });
        expect(result.citationsUsed).toEqual([5, 6]);
        expect(result.content).toBe([
            'Fill in the approval form [5] and send it to finance [6].',
            '',
            '**References:**',
            reference(5),
            reference(6),
        ].join('\n'));
    });

    it('should stop when Observation proposes the same keyword set again', async () => {
        const model = scriptedModel(
            '["approval", "process", "policy"]',
            '["policy", "approval", "process"]',
            '["something else"]'
        );
        const search = fakeSearch((_queries, options) => hits([0.1], options, PASSAGE));
        const engine = new ReactEngine(testSettings(), { modelClient: model.client, searchClient: search.client });

        const result = await engine.run('What is the approval process?');

        expect(result.iterationsUsed).toBe(2);
        expect(result.terminationReason).toBe('keyword repetition');
        expect(result.safetyTriggered).toBe(true);
        expect(result.citationsUsed).toEqual([1, 2]);
        expect(result.content).toBe([
            'The search kept returning to the same keywords, so I stopped early.',
            '',
            'Here is the most relevant information I found:',
            `• ${passage(1)} [1]`,
            `• ${passage(2)} [2]`,
            '',
            '**References:**',
            reference(1),
            reference(2),
        ].join('\n'));
    });

    it('should stop at the iteration budget with a best-effort answer', async () => {
        const search = fakeSearch((_queries, options) => hits([0.1], options, PASSAGE));
        const engine = new ReactEngine(testSettings(), {
            modelClient: scriptedModel('["approval"]').client,
            searchClient: search.client,
            steps: { observation: retryingObservation((i) => [`keyword ${i}`]) },
        });

        const result = await engine.run('What is the approval process?');

        expect(result.iterationsUsed).toBe(5);
        expect(result.terminationReason).toBe('max iterations reached');
        expect(result.citationsUsed).toEqual([1, 2, 3]);
        expect(result.content.split('\n').slice(0, 6)).toEqual([
            'I reached the search limit before finding a complete answer.',
            '',
            'Here is the most relevant information I found:',
            `• ${passage(1)} [1]`,
            `• ${passage(2)} [2]`,
            `• ${passage(3)} [3]`,
        ]);
    });

    it('should stop when Observation has no keywords left to try', async () => {
        const engine = new ReactEngine(testSettings(), {
            modelClient: scriptedModel('["approval"]').client,
            searchClient: fakeSearch(() => ({ results: [], errors: [] })).client,
            steps: { observation: retryingObservation(() => []) },
        });

        const result = await engine.run('What is the approval process?');

        expect(result.iterationsUsed).toBe(1);
        expect(result.terminationReason).toBe('no retry keywords');
        expect(result.content).toBe([
            'I could not come up with better search terms for this question.',
            '',
            'I could not find relevant information for this question. Please try rephrasing it or asking about a related topic.',
        ].join('\n'));
    });

    it('should stop after consecutive step failures', async () => {
        const engine = new ReactEngine(testSettings(), {
            modelClient: scriptedModel().client,
            searchClient: fakeSearch(() => ({ results: [], errors: [] })).client,
            steps: {
                orchestration: {
                    orchestrate: async (): Promise<OrchestrationRecord> => {
                        throw new Error('planner down');
                    },
                },
            },
        });

        const result = await engine.run('What is the approval process?');

        expect(result.iterationsUsed).toBe(3);
        expect(result.terminationReason).toBe('too many consecutive errors');
        expect(result.trace.map((s) => s.type)).toEqual(['error', 'error', 'error']);
        expect(result.trace[0]).toMatchObject({
            error: true,
            parsedResult: { failedStep: 'orchestration', message: 'planner down' },
        });
    });

    it('should reset the error budget after every successful step', async () => {
        const engine = new ReactEngine(testSettings({ maxIterations: 7, maxErrors: 2 }), {
            modelClient: scriptedModel().client,
            searchClient: fakeSearch(() => ({ results: [], errors: [] })).client,
            steps: {
                orchestration: {
                    orchestrate: async (context: LoopContext): Promise<OrchestrationRecord> => {
                        if (context.iteration % 2 === 0) throw new Error('planner hiccup');
                        return {
                            type: 'orchestration',
                            iteration: context.iteration,
                            modelUsed: 'test-orchestrator',
                            content: 'no search needed',
                            error: false,
                            parsedResult: {
                                needsSearch: false,
                                searchKeywords: [],
                                intent: 'general',
                                confidence: 0.9,
                                reasoning: 'general question',
                            },
                        };
                    },
                },
                observation: retryingObservation((i) => [`keyword ${i}`]),
            },
        });

        const result = await engine.run('What is the approval process?');

        expect(result.iterationsUsed).toBe(7);
        expect(result.terminationReason).toBe('max iterations reached');
        expect(result.trace.filter((s) => s.type === 'error')).toHaveLength(3);
        expect(result.trace.map((s) => s.type).slice(0, 5)).toEqual([
            'orchestration',
            'observation',
            'error',
            'orchestration',
            'observation',
        ]);
    });

    it('should stop at once when a blank query leaves no keywords to search', async () => {
        const search = fakeSearch(() => ({ results: [], errors: [] }));
        const engine = new ReactEngine(testSettings(), {
            modelClient: scriptedModel().client,
            searchClient: search.client,
        });

        const result = await engine.run('   ');

        expect(result.iterationsUsed).toBe(1);
        expect(result.terminationReason).toBe('no retry keywords');
        expect(search.searchMultiple).not.toHaveBeenCalled();
        expect(result.trace.map((s) => s.type)).toEqual(['orchestration', 'action', 'observation']);
    });

    it('should only pass the configured window of history to the steps', async () => {
        const seen: number[] = [];
        const history: ConversationTurn[] = Array.from({ length: 15 }, (_, i): ConversationTurn => ({
            role: i % 2 === 0 ? 'user' : 'assistant',
            content: `turn ${i}`,
            timestamp: '2026-01-05T09:00:00.000Z',
        }));
        const engine = new ReactEngine(testSettings({ historyWindow: 4 }), {
            modelClient: scriptedModel().client,
            searchClient: fakeSearch(() => ({ results: [], errors: [] })).client,
            steps: {
                orchestration: {
                    orchestrate: async (context: LoopContext): Promise<OrchestrationRecord> => {
                        seen.push(context.conversationHistory.length);
                        throw new Error(`stop after ${context.conversationHistory[0].content}`);
                    },
                },
            },
        });

        await engine.run('What is the approval process?', history);

        expect(seen).toEqual([4, 4, 4]);
    });

    it('should freeze the trace it returns', async () => {
        const engine = new ReactEngine(testSettings({ indexId: '' }), {
            modelClient: scriptedModel().client,
            searchClient: fakeSearch(() => ({ results: [], errors: [] })).client,
        });

        const result = await engine.run('hello');

        expect(Object.isFrozen(result.trace)).toBe(true);
        expect(Object.isFrozen(result.trace[0])).toBe(true);
        expect(Object.isFrozen(result.trace[0].parsedResult)).toBe(true);
    });

    describe('termination', () => {
        const adversaries: Record<string, Adversary> = {
            'empty search and a failing model': {
                search: () => ({ results: [], errors: [] }),
                replies: [],
            },
            'failing search and a failing model': {
                search: () => ({ results: [], errors: ['Access denied to knowledge base KB-TEST'] }),
                replies: [],
            },
            'weak search and rambling model': {
                search: (_queries, options) => hits([0.05], options, 'tiny'),
                replies: Array.from({ length: 20 }, () => 'no idea'),
            },
        };

        for (const [name, setup] of Object.entries(adversaries)) {
            it(`should finish within the iteration budget with ${name}`, async () => {
                const engine = new ReactEngine(testSettings(), {
                    modelClient: scriptedModel(...setup.replies).client,
                    searchClient: fakeSearch(setup.search).client,
                });

                const result = await engine.run('What is the approval process?');

                expect(result.iterationsUsed).toBeGreaterThanOrEqual(1);
                expect(result.iterationsUsed).toBeLessThanOrEqual(5);
                expect(result.content.trim()).not.toBe('');
                for (const id of result.citationsUsed) {
                    expect(result.content).toContain(`\n[${id}] `);
                }
            });
        }
    });
});

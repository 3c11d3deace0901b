import { describe, it, expect } from 'vitest';
import { OrchestrationStep } from './orchestration.js';
import { KEYWORD_SYSTEM_PROMPT } from './prompts.js';
import { pastTurns, scriptedModel, testContext, testSettings } from '../__tests__/helpers.js';

describe('OrchestrationStep', () => {
    it('should treat a short follow-up as a continuation without calling the model', async () => {
        const { client, invoke } = scriptedModel();
        const step = new OrchestrationStep(client, testSettings());

        const record = await step.orchestrate(testContext({ originalQuery: 'then?', conversationHistory: pastTurns }));

        expect(invoke).not.toHaveBeenCalled();
        expect(record.parsedResult).toMatchObject({ needsSearch: false, intent: 'continuation', confidence: 0.9 });
        expect(record.parsedResult.reasoning).toContain('context_applied');
    });

    it('should treat a bare English interrogative as a continuation', async () => {
        const { client, invoke } = scriptedModel();
        const step = new OrchestrationStep(client, testSettings());

        const record = await step.orchestrate(testContext({ originalQuery: 'Why?', conversationHistory: pastTurns }));

        expect(invoke).not.toHaveBeenCalled();
        expect(record.parsedResult).toMatchObject({ needsSearch: false, searchKeywords: [], intent: 'continuation' });
    });

    it('should answer greetings directly whether or not an index is set', async () => {
        for (const indexId of ['KB-TEST', '']) {
            const { client } = scriptedModel();
            const record = await new OrchestrationStep(client, testSettings({ indexId }))
                .orchestrate(testContext({ originalQuery: 'hello' }));

            expect(record.parsedResult).toMatchObject({ needsSearch: false, intent: 'greeting', confidence: 0.9 });
        }
    });

    it('should skip search when no index is configured', async () => {
        const { client, invoke } = scriptedModel();
        const record = await new OrchestrationStep(client, testSettings({ indexId: '' })).orchestrate(testContext());

        expect(invoke).not.toHaveBeenCalled();
        expect(record.parsedResult).toMatchObject({ needsSearch: false, searchKeywords: [], intent: 'general' });
    });

    it('should reuse retry keywords handed over by Observation', async () => {
        const { client, invoke } = scriptedModel();
        const record = await new OrchestrationStep(client, testSettings()).orchestrate(
            testContext({ iteration: 2, retryKeywords: ['sign-off', 'workflow'], retryReason: 'no search results' })
        );

        expect(invoke).not.toHaveBeenCalled();
        expect(record.iteration).toBe(2);
        expect(record.parsedResult).toEqual({
            needsSearch: true,
            searchKeywords: ['sign-off', 'workflow'],
            intent: 'retry_search',
            confidence: 0.9,
            reasoning: 'retry search: no search results',
        });
    });

    it('should ask the model for keywords', async () => {
        const { client, invoke } = scriptedModel('Sure: ["approval process", "approval", "workflow"]');
        const record = await new OrchestrationStep(client, testSettings()).orchestrate(testContext());

        expect(invoke).toHaveBeenCalledWith({
            modelId: 'test-orchestrator',
            prompt: 'Query: What is the approval process?\nKB: Company HR policies\n\nGive 3 search keywords as a JSON array, e.g. ["a", "b", "c"].',
            systemPrompt: KEYWORD_SYSTEM_PROMPT,
            temperature: 0,
            maxOutputTokens: 100,
        });
        expect(record.modelUsed).toBe('test-orchestrator');
        expect(record.error).toBe(false);
        expect(record.parsedResult).toMatchObject({
            needsSearch: true,
            searchKeywords: ['approval process', 'approval', 'workflow'],
            intent: 'search',
            confidence: 0.95,
        });
    });

    it('should extract keywords itself when the model fails or rambles', async () => {
        for (const reply of [new Error('model offline'), 'I think you should search for approvals.']) {
            const { client } = scriptedModel(reply);
            const record = await new OrchestrationStep(client, testSettings()).orchestrate(testContext());

            expect(record.error).toBe(false);
            expect(record.parsedResult.searchKeywords).toEqual(['What', 'is', 'the']);
            expect(record.parsedResult.reasoning).toBe('keywords extracted from the query');
        }
    });
});

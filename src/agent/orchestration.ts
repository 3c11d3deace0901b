/**
 * Orchestration: decide whether to search and with which keywords
 */

import type { ModelClient } from '../clients/model.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { extractKeywords, parseKeywordArray } from './keywords.js';
import { isContinuation, isGreeting } from './lexicon.js';
import { getKeywordPrompt, KEYWORD_SYSTEM_PROMPT } from './prompts.js';
import type { AgentSettings } from './settings.js';
import type { LoopContext, OrchestrationResult, StepRecord } from './types.js';

const log = createLogger('Orchestration');

export type OrchestrationRecord = Extract<StepRecord, { type: 'orchestration' }>;

const KEYWORD_MAX_TOKENS = 100;

export class OrchestrationStep {
    private model: ModelClient;
    private settings: AgentSettings;

    constructor(model: ModelClient, settings: AgentSettings) {
        this.model = model;
        this.settings = settings;
    }

    async orchestrate(context: LoopContext): Promise<OrchestrationRecord> {
        try {
            return await this.decide(context);
        } catch (error) {
            const message = errorMessage(error);
            log.warn(`Orchestration failed: ${message}`);
            return this.record(context, message, {
                needsSearch: false,
                searchKeywords: [],
                intent: 'error',
                confidence: 0,
                reasoning: `orchestration failed: ${message}`,
                error: true,
            });
        }
    }

    private async decide(context: LoopContext): Promise<OrchestrationRecord> {
        const query = context.originalQuery;
        const history = context.conversationHistory;

        if (isContinuation(query, history)) {
            return this.record(context, 'Follow-up to the previous answer', {
                needsSearch: false,
                searchKeywords: [],
                intent: 'continuation',
                confidence: 0.9,
                reasoning: 'context_applied: short follow-up question',
            });
        }

        if (isGreeting(query)) {
            return this.record(context, 'Greeting', {
                needsSearch: false,
                searchKeywords: [],
                intent: 'greeting',
                confidence: 0.9,
                reasoning: 'simple greeting',
            });
        }

        if (!this.settings.indexId) {
            return this.record(context, 'No knowledge base configured', {
                needsSearch: false,
                searchKeywords: [],
                intent: 'general',
                confidence: 0.9,
                reasoning: history.length > 0
                    ? 'no knowledge base; general answer, context_applied'
                    : 'no knowledge base; general answer',
            });
        }

        if (context.retryKeywords && context.retryKeywords.length > 0) {
            return this.record(context, `Retrying with ${JSON.stringify(context.retryKeywords)}`, {
                needsSearch: true,
                searchKeywords: [...context.retryKeywords],
                intent: 'retry_search',
                confidence: 0.9,
                reasoning: `retry search${context.retryReason ? `: ${context.retryReason}` : ''}`,
            });
        }

        return this.generateKeywords(context);
    }

    private async generateKeywords(context: LoopContext): Promise<OrchestrationRecord> {
        const query = context.originalQuery;
        let reply = '';
        try {
            reply = await this.model.invoke({
                modelId: this.settings.models.orchestration,
                prompt: getKeywordPrompt(query, this.settings.kbDescription, context.conversationHistory),
                systemPrompt: KEYWORD_SYSTEM_PROMPT,
                temperature: 0,
                maxOutputTokens: KEYWORD_MAX_TOKENS,
            });
        } catch (error) {
            log.warn(`Keyword generation failed, extracting from the query: ${errorMessage(error)}`);
        }

        const parsed = parseKeywordArray(reply);
        const keywords = parsed.length > 0 ? parsed : extractKeywords(query);
        if (parsed.length === 0) {
            log.debug(`Fallback keywords for "${query}": ${JSON.stringify(keywords)}`);
        }

        return this.record(context, reply, {
            needsSearch: true,
            searchKeywords: keywords,
            intent: 'search',
            confidence: 0.95,
            reasoning: parsed.length > 0 ? 'keywords from model' : 'keywords extracted from the query',
        });
    }

    private record(context: LoopContext, content: string, result: OrchestrationResult): OrchestrationRecord {
        return {
            type: 'orchestration',
            iteration: context.iteration,
            modelUsed: this.settings.models.orchestration,
            content,
            parsedResult: result,
            error: result.error === true,
        };
    }
}

/**
 * Observation: judge the evidence, then either ask for a retry or write the answer
 */

import type { ModelClient } from '../clients/model.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { attribution, citedIds } from './citations.js';
import { parseKeywordArray, retryKeywordFallback } from './keywords.js';
import { greetingReply } from './lexicon.js';
import {
    getContinuationPrompt,
    getConversationSystemPrompt,
    getGeneralPrompt,
    getRetryKeywordPrompt,
    getSearchFailurePrompt,
    getSynthesisPrompt,
    getSynthesisSystemPrompt,
} from './prompts.js';
import { assessQuality } from './quality.js';
import type { AgentSettings } from './settings.js';
import { latestStep } from './trace.js';
import type { LoopContext, ObservationResult, StepRecord } from './types.js';

const log = createLogger('Observation');

export type ObservationRecord = Extract<StepRecord, { type: 'observation' }>;

export const APOLOGY = 'Sorry, an error occurred while preparing the answer. Please try again.';

const RETRY_KEYWORD_MAX_TOKENS = 100;
const GENERAL_ANSWER_MAX_TOKENS = 1000;
const SEARCH_FAILURE_MAX_TOKENS = 1200;

export class ObservationStep {
    private model: ModelClient;
    private settings: AgentSettings;

    constructor(model: ModelClient, settings: AgentSettings) {
        this.model = model;
        this.settings = settings;
    }

    async observe(context: LoopContext, stepHistory: readonly StepRecord[]): Promise<ObservationRecord> {
        try {
            return await this.evaluate(context, stepHistory);
        } catch (error) {
            const message = errorMessage(error);
            log.warn(`Observation failed: ${message}`);
            return this.record(context, APOLOGY, {
                isFinalAnswer: true,
                finalAnswer: APOLOGY,
                needsRetry: false,
                retryKeywords: [],
                qualityScore: 0,
                citations: [],
                reasoning: `observation failed: ${message}`,
                error: true,
            });
        }
    }

    private async evaluate(context: LoopContext, stepHistory: readonly StepRecord[]): Promise<ObservationRecord> {
        const action = latestStep(stepHistory, 'action', context.iteration);

        if (!action) {
            return this.directAnswer(context, stepHistory);
        }

        const result = action.parsedResult;
        if (result.error && result.errorReason === 'index_not_configured') {
            return this.generalAnswer(context, 'knowledge base not configured');
        }

        // Failed searches count as an empty result set
        const results = result.error ? [] : result.searchResults;
        const quality = assessQuality(results, context.iteration, this.settings.maxIterations);

        if (quality.needsRetry) {
            const retryKeywords = await this.retryKeywords(context.originalQuery, result.searchKeywords, quality.reason);
            return this.record(context, `Retry with ${JSON.stringify(retryKeywords)}: ${quality.reason}`, {
                isFinalAnswer: false,
                needsRetry: true,
                retryKeywords,
                qualityScore: quality.score,
                citations: [],
                reasoning: quality.reason,
            });
        }

        if (context.accumulatedSearchResults.length === 0) {
            return this.searchFailureAnswer(context, result.searchKeywords, quality.score);
        }

        return this.synthesize(context, quality.score, quality.reason);
    }

    private async directAnswer(context: LoopContext, stepHistory: readonly StepRecord[]): Promise<ObservationRecord> {
        const intent = latestStep(stepHistory, 'orchestration', context.iteration)?.parsedResult.intent;
        const query = context.originalQuery;

        if (intent === 'greeting') {
            const reply = greetingReply(query);
            return this.final(context, reply, 1, 'greeting');
        }

        if (intent === 'continuation' && context.conversationHistory.length > 0) {
            const answer = await this.model.invoke({
                modelId: this.settings.models.observation,
                prompt: getContinuationPrompt(query, context.conversationHistory),
                systemPrompt: getConversationSystemPrompt(this.settings.systemPrompt),
                temperature: this.settings.temperature,
                maxOutputTokens: this.settings.maxTokens,
            });
            return this.final(context, answer, 0.9, 'continuation answer from conversation context');
        }

        return this.generalAnswer(context, 'general question');
    }

    private async generalAnswer(context: LoopContext, reason: string): Promise<ObservationRecord> {
        const answer = await this.model.invoke({
            modelId: this.settings.models.observation,
            prompt: getGeneralPrompt(context.originalQuery, context.conversationHistory),
            systemPrompt: getConversationSystemPrompt(this.settings.systemPrompt),
            temperature: this.settings.temperature,
            maxOutputTokens: Math.min(GENERAL_ANSWER_MAX_TOKENS, this.settings.maxTokens),
        });
        return this.final(context, answer, 0.9, `direct answer: ${reason}`);
    }

    private async searchFailureAnswer(context: LoopContext, keywords: string[], score: number): Promise<ObservationRecord> {
        const answer = await this.model.invoke({
            modelId: this.settings.models.observation,
            prompt: getSearchFailurePrompt(context.originalQuery, keywords),
            systemPrompt: this.settings.systemPrompt || undefined,
            temperature: this.settings.temperature,
            maxOutputTokens: Math.min(SEARCH_FAILURE_MAX_TOKENS, this.settings.maxTokens),
        });
        return this.final(context, answer, score, 'nothing found; general guidance');
    }

    private async synthesize(context: LoopContext, score: number, reason: string): Promise<ObservationRecord> {
        const evidence = context.accumulatedSearchResults;
        const reply = await this.model.invoke({
            modelId: this.settings.models.observation,
            prompt: getSynthesisPrompt(context.originalQuery, evidence, context.conversationHistory),
            systemPrompt: getSynthesisSystemPrompt(this.settings.systemPrompt),
            temperature: this.settings.temperature,
            maxOutputTokens: this.settings.maxTokens,
        });

        const answer = citedIds(reply).length > 0 ? reply : `${reply}\n\n${attribution(evidence)}`;
        return this.final(context, answer, score, reason);
    }

    private async retryKeywords(query: string, previous: string[], reason: string): Promise<string[]> {
        try {
            const reply = await this.model.invoke({
                modelId: this.settings.models.observation,
                prompt: getRetryKeywordPrompt(query, previous, reason),
                temperature: 0.3,
                maxOutputTokens: RETRY_KEYWORD_MAX_TOKENS,
            });
            const keywords = parseKeywordArray(reply);
            if (keywords.length > 0) return keywords;
            log.debug('Retry keyword reply had no JSON array, using synonyms');
        } catch (error) {
            log.warn(`Retry keyword generation failed, using synonyms: ${errorMessage(error)}`);
        }
        return retryKeywordFallback(query, previous);
    }

    private final(context: LoopContext, answer: string, score: number, reasoning: string): ObservationRecord {
        return this.record(context, answer, {
            isFinalAnswer: true,
            finalAnswer: answer,
            needsRetry: false,
            retryKeywords: [],
            qualityScore: score,
            citations: citedIds(answer),
            reasoning,
        });
    }

    private record(context: LoopContext, content: string, result: ObservationResult): ObservationRecord {
        return {
            type: 'observation',
            iteration: context.iteration,
            modelUsed: this.settings.models.observation,
            content,
            parsedResult: result,
            error: result.error === true,
        };
    }
}

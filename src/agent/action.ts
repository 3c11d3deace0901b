/**
 * Action: run the search Orchestration asked for
 */

import type { SearchClient } from '../clients/knowledge-base.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { preview } from './citations.js';
import { alternativeKeywords } from './keywords.js';
import { latestStep } from './trace.js';
import type { AgentSettings } from './settings.js';
import type {
    ActionErrorReason,
    ActionResult,
    Intent,
    LoopContext,
    OrchestrationResult,
    SearchResult,
    StepRecord,
} from './types.js';

const log = createLogger('Action');

export type ActionRecord = Extract<StepRecord, { type: 'action' }>;

const RESULTS_PER_KEYWORD = 2;
const RESULTS_PER_KEYWORD_ON_RETRY = 3;
const SUMMARY_TOP_RESULTS = 3;

function directResponse(intent: Intent): string {
    switch (intent) {
        case 'greeting':
            return 'Direct response: greeting, no search needed';
        case 'continuation':
            return 'Direct response: continuing the conversation, no search needed';
        case 'error':
            return 'Direct response: planning failed, answering without search';
        default:
            return 'Direct response: general question, no search needed';
    }
}

export function summarizeResults(keywords: string[], results: SearchResult[]): string {
    const lines = [`Found ${results.length} results for keywords: ${keywords.join(', ')}`];
    for (const keyword of keywords) {
        const count = results.filter((r) => r.query === keyword).length;
        lines.push(`- ${keyword}: ${count}`);
    }
    const top = results.slice(0, SUMMARY_TOP_RESULTS);
    if (top.length > 0) {
        lines.push('Top results:');
        for (const result of top) {
            lines.push(`[${result.citationId}] score ${result.score.toFixed(3)}, ${result.source}: ${preview(result.content)}`);
        }
    }
    return lines.join('\n');
}

export class ActionStep {
    private search: SearchClient;
    private settings: AgentSettings;

    constructor(search: SearchClient, settings: AgentSettings) {
        this.search = search;
        this.settings = settings;
    }

    async act(context: LoopContext, stepHistory: readonly StepRecord[]): Promise<ActionRecord> {
        try {
            const orchestration = latestStep(stepHistory, 'orchestration');
            if (!orchestration) {
                return this.failure(context, [], 'exception', 'No orchestration result to act on');
            }
            return await this.execute(context, stepHistory, orchestration.parsedResult);
        } catch (error) {
            const message = errorMessage(error);
            log.warn(`Action failed: ${message}`);
            return this.failure(context, [], 'exception', `Search failed: ${message}`);
        }
    }

    /**
     * Search again with suggested keywords, or with synonym swaps of the original ones
     */
    async retryWithDifferentKeywords(
        originalKeywords: string[],
        context: LoopContext,
        suggestions?: string[]
    ): Promise<ActionRecord> {
        try {
            const keywords = suggestions && suggestions.length > 0
                ? suggestions
                : alternativeKeywords(originalKeywords);

            if (keywords.length === 0) {
                return this.failure(context, [], 'no_keywords', 'Could not produce alternative keywords');
            }
            if (!this.settings.indexId) {
                return this.failure(context, keywords, 'index_not_configured', 'Knowledge base is not configured');
            }
            return await this.runSearch(context, keywords, RESULTS_PER_KEYWORD_ON_RETRY);
        } catch (error) {
            const message = errorMessage(error);
            log.warn(`Retry search failed: ${message}`);
            return this.failure(context, [], 'exception', `Search failed: ${message}`);
        }
    }

    private async execute(
        context: LoopContext,
        stepHistory: readonly StepRecord[],
        plan: OrchestrationResult
    ): Promise<ActionRecord> {
        if (!plan.needsSearch) {
            return this.record(context, directResponse(plan.intent), {
                searchResults: [],
                searchKeywords: [],
                content: directResponse(plan.intent),
                error: false,
            });
        }

        if (!this.settings.indexId) {
            return this.failure(context, plan.searchKeywords, 'index_not_configured', 'Cannot search: knowledge base is not configured');
        }
        if (plan.searchKeywords.length === 0) {
            return this.failure(context, [], 'no_keywords', 'Cannot search: no keywords were produced');
        }

        if (plan.intent === 'retry_search') {
            const previous = latestStep(stepHistory, 'action');
            return this.retryWithDifferentKeywords(previous?.parsedResult.searchKeywords ?? [], context, plan.searchKeywords);
        }

        return this.runSearch(context, plan.searchKeywords, RESULTS_PER_KEYWORD);
    }

    private async runSearch(context: LoopContext, keywords: string[], perKeyword: number): Promise<ActionRecord> {
        const outcome = await this.search.searchMultiple(this.settings.indexId, keywords, {
            maxResultsPerQuery: perKeyword,
            firstCitationId: context.nextCitationId,
        });

        context.accumulatedSearchResults.push(...outcome.results);
        for (const result of outcome.results) {
            context.nextCitationId = Math.max(context.nextCitationId, result.citationId + 1);
        }

        if (outcome.results.length === 0 && outcome.errors.length > 0) {
            return this.failure(context, keywords, 'search_failed', `Search failed: ${outcome.errors.join('; ')}`);
        }

        const summary = summarizeResults(keywords, outcome.results);
        return this.record(context, summary, {
            searchResults: outcome.results,
            searchKeywords: keywords,
            content: summary,
            error: false,
        });
    }

    private failure(
        context: LoopContext,
        keywords: string[],
        reason: ActionErrorReason,
        message: string
    ): ActionRecord {
        return this.record(context, message, {
            searchResults: [],
            searchKeywords: keywords,
            content: message,
            error: true,
            errorReason: reason,
        });
    }

    private record(context: LoopContext, content: string, result: ActionResult): ActionRecord {
        return {
            type: 'action',
            iteration: context.iteration,
            modelUsed: this.settings.models.action,
            content,
            parsedResult: result,
            error: result.error,
        };
    }
}

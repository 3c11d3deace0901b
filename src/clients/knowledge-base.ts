/**
 * Knowledge base search over the Bedrock Agent Runtime Retrieve API
 */

import {
    BedrockAgentRuntimeClient,
    RetrieveCommand,
    type RetrieveCommandInput,
    type RetrieveCommandOutput,
    type RetrievalResultLocation,
} from '@aws-sdk/client-bedrock-agent-runtime';
import { DEFAULTS, type KbSearchType, type NetworkPolicy } from '../config.js';
import { SearchError, toError } from '../errors.js';
import type { SearchOutcome, SearchResult } from '../agent/types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('KnowledgeBase');

export const MAX_COMBINED_RESULTS = 5;
const FINGERPRINT_LENGTH = 100;
const DEFAULT_RESULTS_PER_QUERY = 2;

export interface RetrieveTransport {
    retrieve(input: RetrieveCommandInput): Promise<RetrieveCommandOutput>;
}

export interface SearchOptions {
    maxResultsPerQuery?: number;
    /** Id given to the best result; later ones count up from here */
    firstCitationId?: number;
}

export interface SearchClient {
    searchMultiple(indexId: string, queries: string[], options?: SearchOptions): Promise<SearchOutcome>;
}

type UncitedResult = Omit<SearchResult, 'citationId'>;

export function sourceLabel(location: RetrievalResultLocation | undefined): string {
    if (!location) return 'Unknown Location';
    switch (location.type) {
        case 'S3':
            return `S3: ${location.s3Location?.uri ?? 'Unknown Location'}`;
        case 'WEB':
            return `Web: ${location.webLocation?.url ?? 'Unknown Location'}`;
        case 'CONFLUENCE':
            return `Confluence: ${location.confluenceLocation?.url ?? 'Unknown Location'}`;
        case 'SHAREPOINT':
            return `SharePoint: ${location.sharePointLocation?.url ?? 'Unknown Location'}`;
        case 'SALESFORCE':
            return `Salesforce: ${location.salesforceLocation?.url ?? 'Unknown Location'}`;
        default:
            return `${location.type ?? 'UNKNOWN'}: Unknown Location`;
    }
}

function clampScore(score: number | undefined): number {
    if (typeof score !== 'number' || Number.isNaN(score)) return 0;
    return Math.min(1, Math.max(0, score));
}

function describeFailure(indexId: string, error: Error): string {
    switch (error.name) {
        case 'ResourceNotFoundException':
            return `Knowledge base ${indexId} was not found`;
        case 'AccessDeniedException':
            return `Access denied to knowledge base ${indexId}`;
        default:
            return error.message;
    }
}

/**
 * Drop results whose first 100 characters match an earlier one, then rank and cap
 */
export function mergeResults(
    results: UncitedResult[],
    firstCitationId = 1,
    limit = MAX_COMBINED_RESULTS
): SearchResult[] {
    const seen = new Set<string>();
    const unique: UncitedResult[] = [];
    for (const result of results) {
        const fingerprint = result.content.slice(0, FINGERPRINT_LENGTH);
        if (seen.has(fingerprint)) continue;
        seen.add(fingerprint);
        unique.push(result);
    }

    return unique
        .sort((a, b) => b.score - a.score)
        .slice(0, limit)
        .map((result, index) => ({ ...result, citationId: firstCitationId + index }));
}

export interface KnowledgeBaseClientOptions {
    region?: string;
    network?: NetworkPolicy;
    searchType?: KbSearchType;
    transport?: RetrieveTransport;
}

export class KnowledgeBaseClient implements SearchClient {
    private transport: RetrieveTransport;
    private searchType: KbSearchType;

    constructor(options: KnowledgeBaseClientOptions = {}) {
        this.searchType = options.searchType ?? DEFAULTS.kbSearchType;
        this.transport = options.transport ?? KnowledgeBaseClient.sdkTransport(
            options.region ?? DEFAULTS.awsRegion,
            options.network
        );
    }

    private static sdkTransport(region: string, network?: NetworkPolicy): RetrieveTransport {
        const client = new BedrockAgentRuntimeClient({
            region,
            maxAttempts: (network?.maxRetries ?? DEFAULTS.maxRetries) + 1,
            requestHandler: {
                connectionTimeout: network?.connectTimeoutMs ?? DEFAULTS.connectTimeoutMs,
                requestTimeout: network?.requestTimeoutMs ?? DEFAULTS.requestTimeoutMs,
            },
        });
        return {
            retrieve: (input) => client.send(new RetrieveCommand(input)),
        };
    }

    /**
     * Run one query; throws SearchError on transport failure
     */
    async search(indexId: string, query: string, maxResults: number): Promise<UncitedResult[]> {
        let output: RetrieveCommandOutput;
        try {
            output = await this.transport.retrieve({
                knowledgeBaseId: indexId,
                retrievalQuery: { text: query },
                retrievalConfiguration: {
                    vectorSearchConfiguration: {
                        numberOfResults: maxResults,
                        overrideSearchType: this.searchType,
                    },
                },
            });
        } catch (error) {
            const err = toError(error);
            throw new SearchError(describeFailure(indexId, err), query, err.name);
        }

        const results: UncitedResult[] = [];
        for (const item of output.retrievalResults ?? []) {
            const content = item.content?.text?.trim();
            if (!content) continue;
            results.push({
                content,
                score: clampScore(item.score),
                source: sourceLabel(item.location),
                query,
            });
        }
        return results;
    }

    async searchMultiple(indexId: string, queries: string[], options: SearchOptions = {}): Promise<SearchOutcome> {
        const perQuery = options.maxResultsPerQuery ?? DEFAULT_RESULTS_PER_QUERY;
        const collected: UncitedResult[] = [];
        const errors: string[] = [];

        for (const raw of queries) {
            const query = raw.trim();
            if (!query) continue;
            try {
                collected.push(...await this.search(indexId, query, perQuery));
            } catch (error) {
                const message = toError(error).message;
                log.warn(`Search for "${query}" failed: ${message}`);
                errors.push(message);
            }
        }

        const results = mergeResults(collected, options.firstCitationId ?? 1);
        log.debug(`${results.length} results for [${queries.join(', ')}]`);
        return { results, errors };
    }

    /**
     * Probe the index with a single query
     */
    async testConnection(indexId: string, probe = 'test'): Promise<{ ok: boolean; resultCount: number; error?: string }> {
        try {
            const results = await this.search(indexId, probe, 1);
            return { ok: true, resultCount: results.length };
        } catch (error) {
            return { ok: false, resultCount: 0, error: toError(error).message };
        }
    }
}

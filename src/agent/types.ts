/**
 * Shared types for the ReAct loop
 */

export interface ConversationTurn {
    role: 'user' | 'assistant';
    content: string;
    timestamp: string;
}

export interface SearchResult {
    content: string;
    /** Relevance in [0, 1] */
    score: number;
    source: string;
    /** Keyword that produced this result */
    query: string;
    /** 1-based, unique within one turn */
    citationId: number;
}

/**
 * Search never throws; per-query failures come back as messages beside whatever was found
 */
export interface SearchOutcome {
    results: SearchResult[];
    errors: string[];
}

export type Intent = 'search' | 'retry_search' | 'continuation' | 'greeting' | 'general' | 'error';

export interface OrchestrationResult {
    needsSearch: boolean;
    searchKeywords: string[];
    intent: Intent;
    confidence: number;
    reasoning: string;
    error?: boolean;
}

export type ActionErrorReason = 'index_not_configured' | 'no_keywords' | 'search_failed' | 'exception';

export interface ActionResult {
    searchResults: SearchResult[];
    searchKeywords: string[];
    content: string;
    error: boolean;
    errorReason?: ActionErrorReason;
}

export interface ObservationResult {
    isFinalAnswer: boolean;
    finalAnswer?: string;
    needsRetry: boolean;
    retryKeywords: string[];
    qualityScore: number;
    citations: number[];
    reasoning: string;
    error?: boolean;
}

export type StepType = 'orchestration' | 'action' | 'observation' | 'error';

interface StepBase {
    iteration: number;
    modelUsed: string;
    content: string;
    error: boolean;
}

export interface ErrorDetail {
    failedStep: Exclude<StepType, 'error'>;
    message: string;
}

export type StepRecord =
    | (StepBase & { type: 'orchestration'; parsedResult: OrchestrationResult })
    | (StepBase & { type: 'action'; parsedResult: ActionResult })
    | (StepBase & { type: 'observation'; parsedResult: ObservationResult })
    | (StepBase & { type: 'error'; parsedResult: ErrorDetail });

/**
 * Mutable state for one turn, owned by the engine
 */
export interface LoopContext {
    originalQuery: string;
    conversationHistory: ConversationTurn[];
    retryKeywords?: string[];
    retryReason?: string;
    accumulatedSearchResults: SearchResult[];
    /** 1-based iteration currently running */
    iteration: number;
    nextCitationId: number;
}

export type TerminationReason =
    | 'goal achieved'
    | 'max iterations reached'
    | 'too many consecutive errors'
    | 'keyword repetition'
    | 'action repeated 3rd time'
    | 'no retry keywords'
    | 'system error';

export interface RunResult {
    content: string;
    trace: readonly StepRecord[];
    iterationsUsed: number;
    terminationReason: TerminationReason;
    /** Milliseconds */
    executionTime: number;
    citationsUsed: number[];
    safetyTriggered: boolean;
}

/**
 * Prompts for the Orchestrate, Act and Observe steps
 */

import type { ConversationTurn, SearchResult } from './types.js';

const EVIDENCE_EXCERPT_LENGTH = 400;
const CONTEXT_SNIPPET_LENGTH = 100;
const CONTINUATION_ANSWER_LENGTH = 500;

const DEFAULT_ASSISTANT_PROMPT = 'You are a helpful assistant.';

function clip(text: string, length: number): string {
    return text.length > length ? `${text.slice(0, length)}...` : text;
}

export function lastUserTurn(history: ConversationTurn[]): ConversationTurn | undefined {
    for (let i = history.length - 1; i >= 0; i--) {
        if (history[i].role === 'user') return history[i];
    }
    return undefined;
}

export function formatEvidence(results: SearchResult[]): string {
    return results
        .map((r) => `[${r.citationId}] ${clip(r.content, EVIDENCE_EXCERPT_LENGTH)}\nSource: ${r.source}`)
        .join('\n\n');
}

export function formatHistory(turns: ConversationTurn[], assistantLimit?: number): string {
    return turns
        .map((turn) => {
            const speaker = turn.role === 'user' ? 'User' : 'Assistant';
            const content = turn.role === 'assistant' && assistantLimit
                ? clip(turn.content, assistantLimit)
                : turn.content;
            return `${speaker}: ${content}`;
        })
        .join('\n');
}

export const KEYWORD_SYSTEM_PROMPT = 'You extract search keywords. Reply with a JSON array of strings only.';

export const getKeywordPrompt = (query: string, kbDescription: string, history: ConversationTurn[]) => {
    const previous = lastUserTurn(history);
    const lines = [`Query: ${query}`];
    if (kbDescription) lines.push(`KB: ${kbDescription.slice(0, CONTEXT_SNIPPET_LENGTH)}`);
    if (previous) lines.push(`Previous: ${previous.content.slice(0, CONTEXT_SNIPPET_LENGTH)}`);
    lines.push('', 'Give 3 search keywords as a JSON array, e.g. ["a", "b", "c"].');
    return lines.join('\n');
};

export const getRetryKeywordPrompt = (query: string, previousKeywords: string[], reason: string) => `The search keywords ${JSON.stringify(previousKeywords)} failed to find good evidence for this question.
Reason: ${reason}

Question: ${query}

Suggest 3 different search keywords. Try synonyms, broader terms or narrower terms, and do not repeat the failed keywords.
Reply with a JSON array of strings only.`;

export const getSynthesisSystemPrompt = (basePrompt: string) => `${basePrompt || DEFAULT_ASSISTANT_PROMPT}

Answer from the provided evidence only.
Rules:
- Cite every fact you use with its evidence number, like [1] or [2].
- Never state information that is not in the evidence.
- If the evidence does not cover part of the question, say so.
- Do not write your own references list; one is added after your answer.`;

export const getSynthesisPrompt = (query: string, results: SearchResult[], history: ConversationTurn[]) => {
    const sections = [`Evidence:\n${formatEvidence(results)}`];
    const recent = history.slice(-2);
    if (recent.length > 0) {
        sections.push(`Recent conversation:\n${formatHistory(recent, CONTINUATION_ANSWER_LENGTH)}`);
    }
    sections.push(`Question: ${query}`);
    sections.push('Answer:');
    return sections.join('\n\n');
};

export const getConversationSystemPrompt = (basePrompt: string) => `${basePrompt || DEFAULT_ASSISTANT_PROMPT}

Keep track of the conversation so far.
- For follow-up questions such as "and then?" continue from your previous answer instead of starting over.
- Expand on what you already said and keep the flow natural.`;

export const getContinuationPrompt = (query: string, history: ConversationTurn[]) => `Conversation so far:
${formatHistory(history.slice(-6), CONTINUATION_ANSWER_LENGTH)}

Follow-up question: ${query}

Continue from your previous answer.`;

export const getGeneralPrompt = (query: string, history: ConversationTurn[]) => {
    const recent = history.slice(-2);
    const context = recent.length > 0 ? `Recent conversation:\n${formatHistory(recent, CONTINUATION_ANSWER_LENGTH)}\n\n` : '';
    return `${context}Question: ${query}

Give a helpful answer.

Answer:`;
};

export const getSearchFailurePrompt = (query: string, keywords: string[]) => `Question: ${query}
Search keywords tried: ${JSON.stringify(keywords)}

No relevant information was found in the knowledge base.
Answer from general knowledge and include:
1. A note that no specific internal documentation was found
2. General guidelines or typical procedures
3. Where the user could look for more information

Answer:`;

/**
 * Word lists used by the rule-based parts of the loop, loaded from data/lexicon.json
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type { ConversationTurn } from './types.js';

const LexiconSchema = z.object({
    continuationPatterns: z.array(z.string().min(1)),
    interrogativeStarters: z.array(z.string().min(1)),
    greetings: z.array(z.string().min(1)),
    greetingReplies: z.array(z.object({
        greeting: z.string().min(1),
        reply: z.string().min(1),
    })),
    defaultGreetingReply: z.object({
        hangul: z.string(),
        latin: z.string(),
    }),
    keywordVariations: z.record(z.array(z.string().min(1))),
    retrySynonyms: z.record(z.array(z.string().min(1))),
    genericAlternatives: z.array(z.string().min(1)),
});

export type Lexicon = z.infer<typeof LexiconSchema>;

export function parseLexicon(raw: unknown): Lexicon {
    return LexiconSchema.parse(raw);
}

function loadLexicon(): Lexicon {
    const file = new URL('../../data/lexicon.json', import.meta.url);
    return parseLexicon(JSON.parse(readFileSync(file, 'utf8')));
}

export const lexicon: Lexicon = loadLexicon();

const CONTINUATION_MAX_LENGTH = 10;
const INTERROGATIVE_MAX_LENGTH = 20;
const GREETING_MAX_LENGTH = 20;
const HANGUL = /[가-힣]/;

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * ASCII terms match whole words; other scripts match as substrings
 */
export function containsTerm(text: string, term: string): boolean {
    const haystack = text.toLowerCase();
    const needle = term.toLowerCase();
    if (/^[\x20-\x7e]+$/.test(needle)) {
        return new RegExp(`\\b${escapeRegExp(needle)}\\b`).test(haystack);
    }
    return haystack.includes(needle);
}

/**
 * Same matching rules as containsTerm, anchored at the start of the text
 */
export function startsWithTerm(text: string, term: string): boolean {
    const haystack = text.toLowerCase();
    const needle = term.toLowerCase();
    if (/^[\x20-\x7e]+$/.test(needle)) {
        return new RegExp(`^${escapeRegExp(needle)}\\b`).test(haystack);
    }
    return haystack.startsWith(needle);
}

export function isContinuation(
    query: string,
    history: ConversationTurn[],
    words: Pick<Lexicon, 'continuationPatterns' | 'interrogativeStarters'> = lexicon
): boolean {
    if (history.length === 0) return false;
    const trimmed = query.trim();

    if (trimmed.length <= CONTINUATION_MAX_LENGTH
        && words.continuationPatterns.some((pattern) => containsTerm(trimmed, pattern))) {
        return true;
    }

    return trimmed.length <= INTERROGATIVE_MAX_LENGTH
        && words.interrogativeStarters.some((starter) => startsWithTerm(trimmed, starter));
}

export function isGreeting(query: string, words: Pick<Lexicon, 'greetings'> = lexicon): boolean {
    const trimmed = query.trim();
    if (trimmed.length >= GREETING_MAX_LENGTH) return false;
    return words.greetings.some((greeting) => containsTerm(trimmed, greeting));
}

/**
 * Longest matching greeting wins, so "안녕하세요" does not fall back to the "안녕" reply
 */
export function greetingReply(
    query: string,
    words: Pick<Lexicon, 'greetingReplies' | 'defaultGreetingReply'> = lexicon
): string {
    const match = words.greetingReplies
        .filter((entry) => containsTerm(query, entry.greeting))
        .sort((a, b) => b.greeting.length - a.greeting.length)[0];
    if (match) return match.reply;
    return HANGUL.test(query) ? words.defaultGreetingReply.hangul : words.defaultGreetingReply.latin;
}

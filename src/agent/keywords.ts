/**
 * Keyword extraction and rewriting without a model
 */

import { z } from 'zod';
import { lexicon } from './lexicon.js';

export const MAX_KEYWORDS = 3;
const FALLBACK_QUERY_LENGTH = 20;
const MIN_TOKEN_LENGTH = 2;

// Digit-bearing runs first so "2024년" stays one token, then one run per script
const TOKEN_PATTERN =
    /\p{L}*\p{Nd}+\p{L}*|\p{Script=Hangul}+|\p{Script=Latin}+|\p{Script=Han}+|\p{Script=Hiragana}+|\p{Script=Katakana}+|\p{Script=Cyrillic}+/gu;

const KeywordArraySchema = z.array(z.string());

export function tokenize(text: string): string[] {
    return text.match(TOKEN_PATTERN) ?? [];
}

/**
 * The query prefix as a last-resort keyword, or nothing when it holds no letters or digits
 */
function queryFallback(query: string): string[] {
    const fallback = query.trim().slice(0, FALLBACK_QUERY_LENGTH);
    return tokenize(fallback).length > 0 ? [fallback] : [];
}

function pushUnique(target: string[], value: string): void {
    if (!target.includes(value)) target.push(value);
}

/**
 * Deterministic keywords straight from the query text
 */
export function extractKeywords(query: string, limit = MAX_KEYWORDS): string[] {
    const keywords: string[] = [];
    for (const token of tokenize(query)) {
        if (token.length < MIN_TOKEN_LENGTH) continue;
        pushUnique(keywords, token);
        if (keywords.length === limit) break;
    }
    if (keywords.length > 0) return keywords;
    return queryFallback(query);
}

/**
 * Pull the first JSON string array out of a model reply
 */
export function parseKeywordArray(text: string, limit = MAX_KEYWORDS): string[] {
    const match = text.match(/\[[\s\S]*?\]/);
    if (!match) return [];

    let raw: unknown;
    try {
        raw = JSON.parse(match[0]);
    } catch {
        return [];
    }

    const parsed = KeywordArraySchema.safeParse(raw);
    if (!parsed.success) return [];

    const keywords: string[] = [];
    for (const item of parsed.data) {
        const keyword = item.trim();
        if (keyword) pushUnique(keywords, keyword);
    }
    return keywords.slice(0, limit);
}

/**
 * Every variation of every matching base word, topped up with generic terms
 */
export function alternativeKeywords(
    keywords: string[],
    limit = 5,
    variations: Record<string, string[]> = lexicon.keywordVariations,
    generic: string[] = lexicon.genericAlternatives
): string[] {
    const alternatives: string[] = [];

    for (const keyword of keywords) {
        for (const [base, replacements] of Object.entries(variations)) {
            if (!keyword.includes(base)) continue;
            for (const replacement of replacements) {
                const candidate = keyword.replace(base, replacement);
                if (candidate !== keyword) pushUnique(alternatives, candidate);
            }
        }
    }

    for (const term of generic) {
        pushUnique(alternatives, term);
    }

    return alternatives.slice(0, limit);
}

/**
 * Replacement keywords after a failed search: one synonym swap per previous keyword,
 * then adjacent word pairs of the query, then single words the previous keywords lacked
 */
export function retryKeywordFallback(
    query: string,
    previous: string[],
    synonyms: Record<string, string[]> = lexicon.retrySynonyms,
    limit = MAX_KEYWORDS
): string[] {
    const candidates: string[] = [];
    const isFresh = (value: string) => !candidates.includes(value) && !previous.includes(value);

    for (const keyword of previous) {
        const entry = Object.entries(synonyms).find(([word]) => keyword.includes(word));
        if (!entry) continue;
        const [word, replacements] = entry;
        const swapped = replacements
            .map((replacement) => keyword.replace(word, replacement))
            .find(isFresh);
        if (swapped) candidates.push(swapped);
    }

    const words = tokenize(query);
    for (let i = 0; i < words.length - 1; i++) {
        const pair = `${words[i]} ${words[i + 1]}`;
        if (isFresh(pair)) candidates.push(pair);
    }

    const previousText = previous.join(' ');
    for (const word of words) {
        if (word.length >= MIN_TOKEN_LENGTH && isFresh(word) && !previousText.includes(word)) {
            candidates.push(word);
        }
    }

    if (candidates.length > 0) return candidates.slice(0, limit);
    return queryFallback(query);
}

import { describe, it, expect } from 'vitest';
import { assessQuality, thresholdsFor } from './quality.js';
import type { SearchResult } from './types.js';

function results(scores: number[], length: number): SearchResult[] {
    return scores.map((score, i) => ({
        content: 'x'.repeat(length),
        score,
        source: `S3: s3://docs/${i}.pdf`,
        query: 'leave',
        citationId: i + 1,
    }));
}

describe('thresholdsFor', () => {
    it('should relax the thresholds as iterations go by', () => {
        expect(thresholdsFor(1)).toEqual({ minAverageScore: 0.5, minMaxScore: 0.6, minContentLength: 200 });
        expect(thresholdsFor(3)).toEqual({ minAverageScore: 0.4, minMaxScore: 0.5, minContentLength: 150 });
        expect(thresholdsFor(5)).toEqual({ minAverageScore: 0.2, minMaxScore: 0.3, minContentLength: 50 });
    });
});

describe('assessQuality', () => {
    it('should ask for a retry when nothing was found and iterations remain', () => {
        expect(assessQuality([], 1)).toEqual({
            sufficient: false,
            needsRetry: true,
            score: 0,
            maxScore: 0,
            totalContentLength: 0,
            reason: 'no search results',
        });
        expect(assessQuality([], 5).needsRetry).toBe(false);
    });

    it('should accept strong evidence on the first iteration', () => {
        const quality = assessQuality(results([0.7, 0.6, 0.5], 80), 1);
        expect(quality.sufficient).toBe(true);
        expect(quality.needsRetry).toBe(false);
        expect(quality.score).toBeCloseTo(0.6);
        expect(quality.maxScore).toBe(0.7);
        expect(quality.totalContentLength).toBe(240);
    });

    it('should list every failed threshold', () => {
        const quality = assessQuality(results([0.3], 50), 1);
        expect(quality.sufficient).toBe(false);
        expect(quality.needsRetry).toBe(true);
        expect(quality.reason).toBe(
            'average score 0.300 < 0.5; best score 0.300 < 0.6; content 50 chars < 200 at iteration 1'
        );
    });

    it('should accept weaker evidence late in the loop', () => {
        expect(assessQuality(results([0.3], 50), 5).sufficient).toBe(true);
    });

    it('should not retry on the last iteration', () => {
        const quality = assessQuality(results([0.1], 50), 5, 5);
        expect(quality.sufficient).toBe(false);
        expect(quality.needsRetry).toBe(false);
    });
});

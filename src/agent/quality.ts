/**
 * Evidence quality gate with thresholds that relax as iterations go by
 */

import type { SearchResult } from './types.js';

export interface QualityThresholds {
    minAverageScore: number;
    minMaxScore: number;
    minContentLength: number;
}

export interface QualityAssessment {
    sufficient: boolean;
    needsRetry: boolean;
    /** Average relevance, 0 when nothing was found */
    score: number;
    maxScore: number;
    totalContentLength: number;
    reason: string;
}

export function thresholdsFor(iteration: number): QualityThresholds {
    if (iteration <= 2) return { minAverageScore: 0.5, minMaxScore: 0.6, minContentLength: 200 };
    if (iteration <= 4) return { minAverageScore: 0.4, minMaxScore: 0.5, minContentLength: 150 };
    return { minAverageScore: 0.2, minMaxScore: 0.3, minContentLength: 50 };
}

export function assessQuality(
    results: SearchResult[],
    iteration: number,
    maxIterations = 5
): QualityAssessment {
    const canRetry = iteration < maxIterations;

    if (results.length === 0) {
        return {
            sufficient: false,
            needsRetry: canRetry,
            score: 0,
            maxScore: 0,
            totalContentLength: 0,
            reason: 'no search results',
        };
    }

    const scores = results.map((r) => r.score);
    const averageScore = scores.reduce((sum, s) => sum + s, 0) / scores.length;
    const maxScore = Math.max(...scores);
    const totalContentLength = results.reduce((sum, r) => sum + r.content.length, 0);
    const limits = thresholdsFor(iteration);

    const failures: string[] = [];
    if (averageScore < limits.minAverageScore) failures.push(`average score ${averageScore.toFixed(3)} < ${limits.minAverageScore}`);
    if (maxScore < limits.minMaxScore) failures.push(`best score ${maxScore.toFixed(3)} < ${limits.minMaxScore}`);
    if (totalContentLength < limits.minContentLength) failures.push(`content ${totalContentLength} chars < ${limits.minContentLength}`);

    const sufficient = failures.length === 0;
    return {
        sufficient,
        needsRetry: !sufficient && canRetry,
        score: averageScore,
        maxScore,
        totalContentLength,
        reason: sufficient
            ? `quality ok at iteration ${iteration} (average ${averageScore.toFixed(3)}, best ${maxScore.toFixed(3)})`
            : `${failures.join('; ')} at iteration ${iteration}`,
    };
}

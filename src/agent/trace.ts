/**
 * Helpers over the append-only step trace
 */

import type { StepRecord } from './types.js';

export function latestStep<T extends StepRecord['type']>(
    history: readonly StepRecord[],
    type: T,
    iteration?: number
): Extract<StepRecord, { type: T }> | undefined {
    for (let i = history.length - 1; i >= 0; i--) {
        const step = history[i];
        if (!isStepOf(step, type)) continue;
        if (iteration === undefined || step.iteration === iteration) return step;
    }
    return undefined;
}

export function isStepOf<T extends StepRecord['type']>(step: StepRecord, type: T): step is Extract<StepRecord, { type: T }> {
    return step.type === type;
}

/**
 * Steps are frozen once they enter the trace
 */
export function appendStep(trace: StepRecord[], step: StepRecord): StepRecord {
    Object.freeze(step.parsedResult);
    const frozen = Object.freeze(step);
    trace.push(frozen);
    return frozen;
}

/**
 * Loop guards: iteration budget, consecutive errors, repeated keywords and repeated actions
 */

import type { TerminationReason } from './types.js';

export interface SafetyDecision {
    continue: boolean;
    reason?: TerminationReason;
}

export interface ActionSnapshot {
    type: string;
    searchKeywords: string[];
}

export interface SafetyState {
    iterationCount: number;
    usedKeywords: ReadonlySet<string>;
    actionSignatures: readonly string[];
    consecutiveErrors: number;
}

const MIN_REPEATED_SET_SIZE = 3;
const MAX_SIGNATURE_REPEATS = 2;

export function actionSignature(action: ActionSnapshot): string {
    return `${action.type}_${JSON.stringify(action.searchKeywords)}`;
}

export class SafetyController {
    private readonly maxIterations: number;
    private readonly maxErrors: number;
    private iterationCount = 0;
    private usedKeywords = new Set<string>();
    private actionSignatures: string[] = [];
    private consecutiveErrors = 0;

    constructor(maxIterations = 5, maxErrors = 3) {
        this.maxIterations = maxIterations;
        this.maxErrors = maxErrors;
    }

    /**
     * First matching rule wins; rules past the error budget only apply when an action ran
     */
    shouldContinue(iteration: number, lastAction?: ActionSnapshot): SafetyDecision {
        this.iterationCount = iteration;

        if (iteration >= this.maxIterations) {
            return { continue: false, reason: 'max iterations reached' };
        }

        if (this.consecutiveErrors >= this.maxErrors) {
            return { continue: false, reason: 'too many consecutive errors' };
        }

        if (!lastAction) {
            return { continue: true };
        }

        const keywords = new Set(lastAction.searchKeywords);
        if (keywords.size > 0) {
            const alreadyUsed = [...keywords].every((keyword) => this.usedKeywords.has(keyword));
            if (keywords.size >= MIN_REPEATED_SET_SIZE && alreadyUsed) {
                return { continue: false, reason: 'keyword repetition' };
            }
            for (const keyword of keywords) this.usedKeywords.add(keyword);
        }

        const signature = actionSignature(lastAction);
        const seen = this.actionSignatures.filter((s) => s === signature).length;
        if (seen >= MAX_SIGNATURE_REPEATS) {
            return { continue: false, reason: 'action repeated 3rd time' };
        }
        this.actionSignatures.push(signature);

        return { continue: true };
    }

    recordError(): void {
        this.consecutiveErrors += 1;
    }

    resetErrorCount(): void {
        this.consecutiveErrors = 0;
    }

    get state(): SafetyState {
        return {
            iterationCount: this.iterationCount,
            usedKeywords: new Set(this.usedKeywords),
            actionSignatures: [...this.actionSignatures],
            consecutiveErrors: this.consecutiveErrors,
        };
    }
}

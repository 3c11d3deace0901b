/**
 * Conversation log for an interactive session
 */

import type { ConversationTurn, RunResult, TerminationReason } from './types.js';

export interface TurnMeta {
    iterationsUsed: number;
    terminationReason: TerminationReason;
    executionTime: number;
    citationsUsed: number[];
}

export interface SessionTurn extends ConversationTurn {
    meta?: TurnMeta;
}

export class ConversationSession {
    private turns: SessionTurn[] = [];
    private window: number;
    private clock: () => Date;

    constructor(window = 10, clock: () => Date = () => new Date()) {
        this.window = window;
        this.clock = clock;
    }

    get length(): number {
        return this.turns.length;
    }

    addUser(content: string): SessionTurn {
        return this.append({ role: 'user', content, timestamp: this.clock().toISOString() });
    }

    addAssistant(result: RunResult): SessionTurn {
        return this.append({
            role: 'assistant',
            content: result.content,
            timestamp: this.clock().toISOString(),
            meta: {
                iterationsUsed: result.iterationsUsed,
                terminationReason: result.terminationReason,
                executionTime: result.executionTime,
                citationsUsed: [...result.citationsUsed],
            },
        });
    }

    /**
     * The last n turns without run metadata, ready to hand to the engine
     */
    recent(n = this.window): ConversationTurn[] {
        if (n <= 0) return [];
        return this.turns.slice(-n).map(({ role, content, timestamp }) => ({ role, content, timestamp }));
    }

    all(): readonly SessionTurn[] {
        return [...this.turns];
    }

    clear(): void {
        this.turns = [];
    }

    private append(turn: SessionTurn): SessionTurn {
        const frozen = Object.freeze(turn);
        this.turns.push(frozen);
        return frozen;
    }
}

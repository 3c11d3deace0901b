/**
 * ReAct engine: Orchestrate → Act → Observe until an answer is ready or a guard trips
 */

import type { SearchClient } from '../clients/knowledge-base.js';
import type { ModelClient } from '../clients/model.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { ActionStep } from './action.js';
import { finalizeCitations, preview } from './citations.js';
import { ObservationStep } from './observation.js';
import { OrchestrationStep } from './orchestration.js';
import { SafetyController } from './safety.js';
import type { AgentSettings } from './settings.js';
import { appendStep } from './trace.js';
import type {
    ConversationTurn,
    LoopContext,
    RunResult,
    SearchResult,
    StepRecord,
    StepType,
    TerminationReason,
} from './types.js';

const log = createLogger('ReactEngine');

const BEST_EFFORT_ITEMS = 3;
const BEST_EFFORT_PREVIEW = 100;

export const SYSTEM_ERROR_ANSWER = 'Sorry, something went wrong while answering. Please try again.';
const NOTHING_FOUND = 'I could not find relevant information for this question. Please try rephrasing it or asking about a related topic.';

const STOP_NOTES: Record<TerminationReason, string> = {
    'goal achieved': '',
    'max iterations reached': 'I reached the search limit before finding a complete answer.',
    'too many consecutive errors': 'Several steps failed in a row, so I stopped searching.',
    'keyword repetition': 'The search kept returning to the same keywords, so I stopped early.',
    'action repeated 3rd time': 'The same search was about to run a third time, so I stopped early.',
    'no retry keywords': 'I could not come up with better search terms for this question.',
    'system error': SYSTEM_ERROR_ANSWER,
};

export interface EngineSteps {
    orchestration: Pick<OrchestrationStep, 'orchestrate'>;
    action: Pick<ActionStep, 'act'>;
    observation: Pick<ObservationStep, 'observe'>;
}

export interface ReactEngineDeps {
    modelClient: ModelClient;
    searchClient: SearchClient;
    steps?: Partial<EngineSteps>;
    now?: () => number;
}

/**
 * Hedged answer from the strongest evidence collected so far
 */
export function bestEffortAnswer(results: SearchResult[], reason: TerminationReason): string {
    const note = STOP_NOTES[reason];
    if (results.length === 0) return `${note}\n\n${NOTHING_FOUND}`.trim();

    const top = [...results]
        .sort((a, b) => b.score - a.score)
        .slice(0, BEST_EFFORT_ITEMS)
        .map((r) => `• ${preview(r.content, BEST_EFFORT_PREVIEW)} [${r.citationId}]`);

    return [note, '', 'Here is the most relevant information I found:', ...top].join('\n').trim();
}

export class ReactEngine {
    private settings: AgentSettings;
    private steps: EngineSteps;
    private now: () => number;

    constructor(settings: AgentSettings, deps: ReactEngineDeps) {
        this.settings = settings;
        this.now = deps.now ?? Date.now;
        this.steps = {
            orchestration: deps.steps?.orchestration ?? new OrchestrationStep(deps.modelClient, settings),
            action: deps.steps?.action ?? new ActionStep(deps.searchClient, settings),
            observation: deps.steps?.observation ?? new ObservationStep(deps.modelClient, settings),
        };
    }

    /**
     * Answer one user turn. Never throws.
     */
    async run(userQuery: string, history: ConversationTurn[] = []): Promise<RunResult> {
        const startedAt = this.now();
        const trace: StepRecord[] = [];
        const context: LoopContext = {
            originalQuery: userQuery,
            conversationHistory: history.slice(-this.settings.historyWindow),
            accumulatedSearchResults: [],
            iteration: 0,
            nextCitationId: 1,
        };

        const finish = (text: string, reason: TerminationReason): RunResult => {
            const { text: content, citationsUsed } = finalizeCitations(text, context.accumulatedSearchResults);
            return {
                content,
                trace: Object.freeze([...trace]),
                iterationsUsed: context.iteration,
                terminationReason: reason,
                executionTime: this.now() - startedAt,
                citationsUsed,
                safetyTriggered: reason !== 'goal achieved',
            };
        };

        try {
            const safety = new SafetyController(this.settings.maxIterations, this.settings.maxErrors);

            for (;;) {
                context.iteration += 1;
                const iteration = context.iteration;
                let stage: Exclude<StepType, 'error'> = 'orchestration';

                try {
                    const plan = this.track(trace, safety, await this.steps.orchestration.orchestrate(context));

                    let searchKeywords: string[] | undefined;
                    if (plan.type === 'orchestration' && plan.parsedResult.needsSearch) {
                        stage = 'action';
                        const action = this.track(trace, safety, await this.steps.action.act(context, trace));
                        if (action.type === 'action') searchKeywords = action.parsedResult.searchKeywords;
                    }

                    stage = 'observation';
                    const observed = this.track(trace, safety, await this.steps.observation.observe(context, trace));
                    if (observed.type !== 'observation') {
                        throw new Error('Observation step returned no observation');
                    }
                    const observation = observed.parsedResult;

                    if (observation.isFinalAnswer) {
                        return finish(observation.finalAnswer ?? observed.content, 'goal achieved');
                    }

                    if (observation.needsRetry && observation.retryKeywords.length === 0) {
                        return finish(bestEffortAnswer(context.accumulatedSearchResults, 'no retry keywords'), 'no retry keywords');
                    }

                    const decision = safety.shouldContinue(
                        iteration,
                        searchKeywords ? { type: 'search', searchKeywords } : undefined
                    );
                    if (!decision.continue) {
                        const reason = decision.reason ?? 'max iterations reached';
                        log.info(`Stopping at iteration ${iteration}: ${reason}`);
                        return finish(bestEffortAnswer(context.accumulatedSearchResults, reason), reason);
                    }

                    if (observation.needsRetry) {
                        context.retryKeywords = [...observation.retryKeywords];
                        context.retryReason = observation.reasoning;
                    }
                } catch (error) {
                    const message = errorMessage(error);
                    log.warn(`${stage} step failed at iteration ${iteration}: ${message}`);
                    this.track(trace, safety, {
                        type: 'error',
                        iteration,
                        modelUsed: '',
                        content: `${stage} step failed: ${message}`,
                        parsedResult: { failedStep: stage, message },
                        error: true,
                    });

                    const decision = safety.shouldContinue(iteration);
                    if (!decision.continue) {
                        const reason = decision.reason ?? 'too many consecutive errors';
                        return finish(bestEffortAnswer(context.accumulatedSearchResults, reason), reason);
                    }
                }
            }
        } catch (error) {
            log.error(`Run failed: ${errorMessage(error)}`);
            return {
                content: SYSTEM_ERROR_ANSWER,
                trace: Object.freeze([...trace]),
                iterationsUsed: context.iteration,
                terminationReason: 'system error',
                executionTime: this.now() - startedAt,
                citationsUsed: [],
                safetyTriggered: true,
            };
        }
    }

    /**
     * Append to the trace and move the consecutive-error counter
     */
    private track(trace: StepRecord[], safety: SafetyController, step: StepRecord): StepRecord {
        const appended = appendStep(trace, step);
        if (appended.error) {
            safety.recordError();
        } else {
            safety.resetErrorCount();
        }
        return appended;
    }
}

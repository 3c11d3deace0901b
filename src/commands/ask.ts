/**
 * Ask Command - Answer a single question and exit
 */

import { Command } from 'commander';
import { ConversationSession } from '../agent/session.js';
import type { RunResult } from '../agent/types.js';
import { exportTranscript, formatFromPath } from '../export/formats.js';
import {
    createSpinner,
    showAnswer,
    showComplete,
    showError,
    showRunSummary,
    showTrace,
} from '../ui/components.js';
import { createEngine, prepareConfig, type CommonOptions } from './shared.js';

interface AskOptions extends CommonOptions {
    trace?: boolean;
    json?: boolean;
    output?: string;
    render?: boolean;
}

export function toJsonReport(query: string, result: RunResult): string {
    return JSON.stringify(
        {
            query,
            answer: result.content,
            citationsUsed: result.citationsUsed,
            iterationsUsed: result.iterationsUsed,
            terminationReason: result.terminationReason,
            safetyTriggered: result.safetyTriggered,
            executionTime: result.executionTime,
            trace: result.trace,
        },
        null,
        2
    );
}

export const askCommand = new Command('ask')
    .description('Answer one question from the knowledge base')
    .argument('<query>', 'Question to answer')
    .option('--kb <id>', 'Knowledge base id (blank = general knowledge)')
    .option('-p, --provider <name>', 'Model provider: openrouter | bedrock')
    .option('-m, --model <model>', 'Use one model for every step')
    .option('-t, --trace', 'Print the step trace after the answer')
    .option('--json', 'Print the full run result as JSON')
    .option('-o, --output <file>', 'Save the exchange (.md, .html, .txt, .json)')
    .option('--ui <mode>', 'UI mode: minimal | fancy | plain')
    .option('--no-render', 'Print the answer as raw markdown')
    .action(async (query: string, options: AskOptions) => {
        try {
            const config = await prepareConfig(options);
            const engine = createEngine(config);
            const session = new ConversationSession(config.historyWindow);

            const spinner = options.json ? undefined : createSpinner('Thinking...');
            spinner?.start();
            const result = await engine.run(query);
            spinner?.stop();

            session.addUser(query);
            session.addAssistant(result);

            if (options.json) {
                console.log(toJsonReport(query, result));
            } else {
                showAnswer(result.content, { markdown: options.render !== false && config.renderMarkdown });
                if (options.trace || config.showTrace) showTrace(result.trace);
                showRunSummary(result, config.maxIterations);
            }

            if (options.output) {
                await exportTranscript(session.all(), {
                    format: formatFromPath(options.output),
                    outputPath: options.output,
                    title: query,
                });
                if (!options.json) showComplete(options.output);
            }
        } catch (error) {
            showError(error instanceof Error ? error.message : String(error));
            process.exit(1);
        }
    });

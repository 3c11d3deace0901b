/**
 * Chat Command - Multi-turn conversation over the knowledge base
 */

import { Command } from 'commander';
import inquirer from 'inquirer';
import type { Config } from '../config.js';
import type { ReactEngine } from '../agent/react-engine.js';
import { ConversationSession } from '../agent/session.js';
import type { RunResult } from '../agent/types.js';
import { exportTranscript, formatFromPath } from '../export/formats.js';
import {
    createSpinner,
    showAnswer,
    showError,
    showHeader,
    showRunSummary,
    showTrace,
} from '../ui/components.js';
import { colors } from '../ui/theme.js';
import { createEngine, prepareConfig, type CommonOptions } from './shared.js';

export type ChatCommand =
    | { kind: 'exit' }
    | { kind: 'help' }
    | { kind: 'clear' }
    | { kind: 'trace' }
    | { kind: 'save'; file?: string }
    | { kind: 'unknown'; name: string };

/**
 * Parse a slash command line, undefined for a normal question
 */
export function parseChatCommand(line: string): ChatCommand | undefined {
    const trimmed = line.trim();
    if (!trimmed.startsWith('/')) return undefined;

    const [name, ...rest] = trimmed.slice(1).split(/\s+/);
    const arg = rest.join(' ').trim();
    switch (name.toLowerCase()) {
        case 'exit':
        case 'quit':
            return { kind: 'exit' };
        case 'help':
            return { kind: 'help' };
        case 'clear':
            return { kind: 'clear' };
        case 'trace':
            return { kind: 'trace' };
        case 'save':
            return { kind: 'save', file: arg || undefined };
        default:
            return { kind: 'unknown', name };
    }
}

const HELP_LINES = [
    '/trace         show the steps behind the last answer',
    '/save [file]   save the conversation (.md, .html, .txt, .json)',
    '/clear         forget the conversation so far',
    '/exit          quit',
];

class ChatLoop {
    private config: Config;
    private engine: ReactEngine;
    private session: ConversationSession;
    private lastResult?: RunResult;
    private alwaysTrace: boolean;

    constructor(config: Config, engine: ReactEngine, alwaysTrace: boolean) {
        this.config = config;
        this.engine = engine;
        this.session = new ConversationSession(config.historyWindow);
        this.alwaysTrace = alwaysTrace;
    }

    async start(): Promise<void> {
        showHeader({
            title: 'ragchat',
            provider: this.config.modelProvider,
            model: this.config.models.observation,
            knowledgeBase: this.config.kbId,
            showDivider: false,
        });
        console.log();
        console.log(colors.muted('Ask a question to start. Type /help for commands, or /exit to quit.'));
        console.log();

        while (true) {
            const { input } = await inquirer.prompt<{ input: string }>([
                {
                    type: 'input',
                    name: 'input',
                    message: colors.primary('>'),
                },
            ]);

            const line = String(input ?? '').trim();
            if (!line) continue;

            const command = parseChatCommand(line);
            if (command) {
                try {
                    const action = await this.handleCommand(command);
                    if (action === 'exit') return;
                } catch (error) {
                    showError(error instanceof Error ? error.message : String(error));
                }
                continue;
            }

            await this.answer(line);
        }
    }

    private async answer(query: string): Promise<void> {
        const history = this.session.recent();
        const spinner = createSpinner('Thinking...');
        spinner.start();
        const result = await this.engine.run(query, history);
        spinner.stop();

        this.session.addUser(query);
        this.session.addAssistant(result);
        this.lastResult = result;

        showAnswer(result.content, { markdown: this.config.renderMarkdown });
        if (this.alwaysTrace) showTrace(result.trace);
        showRunSummary(result, this.config.maxIterations);
        console.log();
    }

    private async handleCommand(command: ChatCommand): Promise<'exit' | void> {
        switch (command.kind) {
            case 'exit':
                console.log(colors.muted('Goodbye!'));
                return 'exit';
            case 'help':
                for (const line of HELP_LINES) console.log(colors.muted(line));
                return;
            case 'clear':
                this.session.clear();
                this.lastResult = undefined;
                console.log(colors.muted('Conversation cleared.'));
                return;
            case 'trace':
                if (!this.lastResult) {
                    console.log(colors.muted('Nothing to show yet.'));
                    return;
                }
                showTrace(this.lastResult.trace);
                return;
            case 'save': {
                if (this.session.length === 0) {
                    console.log(colors.muted('Nothing to save yet.'));
                    return;
                }
                const file = command.file ?? await this.askFilename();
                await exportTranscript(this.session.all(), { format: formatFromPath(file), outputPath: file });
                console.log(colors.success(`Saved to ${file}`));
                return;
            }
            case 'unknown':
                console.log(colors.warning(`Unknown command: /${command.name}. Type /help.`));
                return;
        }
    }

    private async askFilename(): Promise<string> {
        const { file } = await inquirer.prompt<{ file: string }>([
            {
                type: 'input',
                name: 'file',
                message: 'Filename:',
                default: 'ragchat-transcript.md',
                validate: (input: string) => input.trim().length > 0 || 'Filename is required',
            },
        ]);
        return file.trim();
    }
}

export const chatCommand = new Command('chat')
    .description('Start an interactive conversation')
    .option('--kb <id>', 'Knowledge base id (blank = general knowledge)')
    .option('-p, --provider <name>', 'Model provider: openrouter | bedrock')
    .option('-m, --model <model>', 'Use one model for every step')
    .option('-t, --trace', 'Print the step trace after every answer')
    .option('--ui <mode>', 'UI mode: minimal | fancy | plain')
    .action(async (options: CommonOptions & { trace?: boolean }) => {
        try {
            if (!process.stdin.isTTY) {
                throw new Error('chat needs an interactive terminal. Use `ragchat ask "<question>"` instead.');
            }
            const config = await prepareConfig(options);
            const loop = new ChatLoop(config, createEngine(config), Boolean(options.trace) || config.showTrace);
            await loop.start();
        } catch (error) {
            showError(error instanceof Error ? error.message : String(error));
            process.exit(1);
        }
    });

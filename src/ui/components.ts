/**
 * UI Components - Rich terminal UI elements
 */

import ora, { type Ora } from 'ora';
import boxen from 'boxen';
import { marked } from 'marked';
import { markedTerminal } from 'marked-terminal';
import gradient from 'gradient-string';
import type { UiMode } from '../config.js';
import type { RunResult, StepRecord } from '../agent/types.js';
import { colors, icons, createHeader, divider, getBoxOuterWidth, traceLine } from './theme.js';

function getUiMode(): UiMode {
    if (process.env.NO_COLOR !== undefined) return 'plain';
    const ui = process.env.UI_MODE?.trim().toLowerCase();
    if (ui === 'plain') return 'plain';
    if (ui === 'fancy') {
        const isInteractive = Boolean(process.stdout.isTTY && process.stderr.isTTY);
        return isInteractive ? 'fancy' : 'minimal';
    }
    return 'minimal';
}

export interface HeaderInfo {
    title?: string;
    provider?: string;
    model?: string;
    knowledgeBase?: string;
    showDivider?: boolean;
}

/**
 * Display the app header
 */
export function showHeader(options: HeaderInfo = {}): void {
    const { title = 'ragchat', provider, model, knowledgeBase } = options;
    const showDivider = options.showDivider !== false;
    const mode = getUiMode();

    const details: string[] = [];
    if (provider) details.push(`Provider: ${provider}`);
    if (model) details.push(`Model: ${model}`);
    details.push(`Knowledge base: ${knowledgeBase || 'none (general knowledge)'}`);

    console.log();

    if (mode === 'fancy') {
        const heading = gradient(['#6D28D9', '#7C3AED', '#4F46E5', '#06B6D4'])(title);
        console.log(
            boxen([heading, ...details.map((d) => colors.muted(d))].join('\n'), {
                padding: 1,
                borderStyle: 'round',
                borderColor: '#7C3AED',
                width: getBoxOuterWidth(),
            })
        );
        if (showDivider) console.log(colors.muted(divider()));
        return;
    }

    console.log(createHeader(title, details.join(' · ')));
    if (showDivider) console.log(colors.muted(divider()));
}

/**
 * Create a spinner with custom styling
 */
export function createSpinner(text: string): Ora {
    const mode = getUiMode();
    return ora({
        text: mode === 'fancy' ? colors.secondary(text) : colors.muted(text),
        spinner: mode === 'fancy' ? 'dots12' : 'dots',
        color: mode === 'fancy' ? 'cyan' : undefined,
        isEnabled: mode !== 'plain' && Boolean(process.stderr.isTTY),
    });
}

let terminalRendererInstalled = false;

export function renderMarkdown(markdown: string): string {
    if (!terminalRendererInstalled) {
        const width = typeof process.stdout.columns === 'number' && process.stdout.columns > 0
            ? Math.min(process.stdout.columns, 100)
            : 80;
        marked.use(markedTerminal({
            width,
            emoji: false,
            showSectionPrefix: false,
            reflowText: true,
        }));
        terminalRendererInstalled = true;
    }

    const rendered = marked.parse(markdown, { async: false });
    return typeof rendered === 'string' ? rendered : markdown;
}

/**
 * Print the answer, rendered as markdown unless disabled or in plain mode
 */
export function showAnswer(content: string, options: { markdown?: boolean } = {}): void {
    const mode = getUiMode();
    const useMarkdown = options.markdown !== false && mode !== 'plain';
    console.log();
    console.log(useMarkdown ? renderMarkdown(content).trimEnd() : content);
}

/**
 * One-line description of a trace step
 */
export function describeStep(step: StepRecord): string {
    switch (step.type) {
        case 'orchestration': {
            const plan = step.parsedResult;
            return plan.needsSearch
                ? `${plan.intent}: ${plan.searchKeywords.join(', ')}`
                : `${plan.intent}: no search`;
        }
        case 'action': {
            const result = step.parsedResult;
            if (result.error) return `${result.errorReason ?? 'error'}: ${result.content}`;
            if (result.searchKeywords.length === 0) return result.content;
            return `${result.searchResults.length} results for ${result.searchKeywords.join(', ')}`;
        }
        case 'observation': {
            const result = step.parsedResult;
            if (result.needsRetry) return `retry with ${result.retryKeywords.join(', ')} (${result.reasoning})`;
            return `answer ready, quality ${result.qualityScore.toFixed(2)}`;
        }
        case 'error':
            return `${step.parsedResult.failedStep} failed: ${step.parsedResult.message}`;
    }
}

export function showTrace(trace: readonly StepRecord[]): void {
    console.log();
    console.log(colors.primary('Trace'));
    for (const step of trace) {
        console.log(traceLine(step.iteration, step.type, describeStep(step), step.error));
    }
}

export function formatRunSummary(result: RunResult, maxIterations: number): string {
    const seconds = (result.executionTime / 1000).toFixed(1);
    const parts = [
        `${result.iterationsUsed}/${maxIterations} iterations`,
        result.terminationReason,
        `${seconds}s`,
    ];
    if (result.citationsUsed.length > 0) parts.push(`${result.citationsUsed.length} sources cited`);
    if (result.safetyTriggered) parts.push('safety guard');
    return parts.join(' · ');
}

export function showRunSummary(result: RunResult, maxIterations: number): void {
    const icon = result.safetyTriggered ? colors.warning(icons.warning) : colors.success(icons.complete);
    console.log();
    console.log(`${icon} ${colors.muted(formatRunSummary(result, maxIterations))}`);
}

/**
 * Show completion message
 */
export function showComplete(outputPath?: string): void {
    const mode = getUiMode();
    console.log();
    if (mode === 'fancy') {
        const msg = gradient(['#10B981', '#06B6D4'])('Done');
        console.log(`${colors.success(icons.complete)} ${msg}`);
        if (outputPath) console.log(colors.muted(`Saved to: ${outputPath}`));
        return;
    }

    console.log(`${colors.success(icons.complete)} ${colors.success('Done')}`);
    if (outputPath) console.log(colors.muted(`Saved to: ${outputPath}`));
}

/**
 * Show error message
 */
export function showError(message: string): void {
    const mode = getUiMode();
    if (mode === 'fancy') {
        console.error(
            boxen(`${colors.error('Error')}\n${message}`, {
                padding: 1,
                borderStyle: 'round',
                borderColor: 'red',
                width: getBoxOuterWidth(),
            })
        );
        return;
    }
    console.error(`${colors.error(icons.error)} ${colors.error('Error:')} ${message}`);
}

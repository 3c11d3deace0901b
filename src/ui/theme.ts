/**
 * UI Theme - Design system for the CLI
 * Provides consistent styling with a clean, minimal palette
 */

import chalk from 'chalk';
import figures from 'figures';

export function isPlainMode(): boolean {
    const ui = process.env.UI_MODE?.trim().toLowerCase();
    return ui === 'plain' || process.env.NO_COLOR !== undefined;
}

function maybeColor(styler: (text: string) => string): (text: string) => string {
    return (text: string) => (isPlainMode() ? text : styler(text));
}

export function getBoxOuterWidth(maxWidth: number = 112): number {
    const columns = process.stdout.columns;
    const fallback = maxWidth;
    if (typeof columns !== 'number' || columns <= 0) return fallback;
    // Keep a small margin to avoid terminal soft-wrapping at the right edge.
    return Math.min(maxWidth, Math.max(0, columns - 2));
}

// Color palette
export const colors = {
    primary: maybeColor(chalk.hex('#7C3AED')),      // Violet (accent)
    secondary: maybeColor(chalk.hex('#06B6D4')),    // Cyan (secondary accent)
    success: maybeColor(chalk.hex('#10B981')),      // Green
    warning: maybeColor(chalk.hex('#F59E0B')),      // Amber
    error: maybeColor(chalk.hex('#EF4444')),        // Red
    muted: maybeColor(chalk.gray),
    dim: maybeColor(chalk.dim),
    bold: maybeColor(chalk.bold),
};

// Status/icons (use `figures` for OS-safe fallbacks)
export const icons = {
    complete: figures.tick,
    error: figures.cross,
    warning: figures.warning,
    arrow: figures.arrowRight,
    bullet: figures.bullet,
    search: figures.pointerSmall,
    plan: figures.circleQuestionMark,
    observe: figures.circleFilled,
};

export function divider(maxWidth: number = 60): string {
    const columns = process.stdout.columns;
    const width = typeof columns === 'number' && columns > 0 ? Math.min(columns, maxWidth) : maxWidth;
    return '─'.repeat(Math.max(0, width));
}

/**
 * Title plus an optional muted subtitle on one line
 */
export function createHeader(title: string, subtitle?: string): string {
    const parts = [isPlainMode() ? title : chalk.bold(colors.primary(title))];
    if (subtitle) parts.push(colors.muted(subtitle));
    return parts.join(' ');
}

/**
 * Format one trace line: icon, iteration, step name, summary
 */
export function traceLine(
    iteration: number,
    step: 'orchestration' | 'action' | 'observation' | 'error',
    text: string,
    failed: boolean
): string {
    const icon = failed
        ? colors.error(icons.error)
        : {
            orchestration: colors.secondary(icons.plan),
            action: colors.primary(icons.search),
            observation: colors.success(icons.observe),
            error: colors.error(icons.error),
        }[step];

    const label = colors.dim(`#${iteration}`);
    const name = failed ? colors.error(step) : colors.bold(step);
    return `${icon} ${label} ${name} ${failed ? colors.error(text) : colors.muted(text)}`;
}

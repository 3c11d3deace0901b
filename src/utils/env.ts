export function envBool(value: string | undefined, defaultValue: boolean): boolean {
    if (value === undefined) return defaultValue;
    const normalized = value.trim().toLowerCase();
    if (normalized === '') return defaultValue;
    return normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on';
}

export function envOptionalNumber(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const trimmed = value.trim();
    if (trimmed === '') return undefined;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
}

export function envOptionalInt(value: string | undefined): number | undefined {
    const parsed = envOptionalNumber(value);
    if (parsed === undefined) return undefined;
    return Number.isInteger(parsed) ? parsed : undefined;
}

export function envNumber(value: string | undefined, defaultValue: number): number {
    return envOptionalNumber(value) ?? defaultValue;
}

export function envPositiveInt(value: string | undefined, defaultValue: number): number {
    const parsed = envOptionalInt(value);
    if (typeof parsed !== 'number' || parsed < 1) return defaultValue;
    return parsed;
}

export function envNonNegativeInt(value: string | undefined, defaultValue: number): number {
    const parsed = envOptionalInt(value);
    if (typeof parsed !== 'number' || parsed < 0) return defaultValue;
    return parsed;
}

export function envString(value: string | undefined, defaultValue = ''): string {
    const trimmed = value?.trim();
    return trimmed ? trimmed : defaultValue;
}

/**
 * Match a value against a closed set of options, case-insensitively
 */
export function envChoice<T extends string>(
    value: string | undefined,
    choices: readonly T[],
    defaultValue: T
): T {
    const normalized = value?.trim().toLowerCase();
    if (!normalized) return defaultValue;
    return choices.find((choice) => choice.toLowerCase() === normalized) ?? defaultValue;
}

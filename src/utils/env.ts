import { InvalidArgumentError } from 'commander';

export type EnvRecord = Record<string, string | undefined>;

export function envBool(value: string | undefined, defaultValue: boolean): boolean {
    if (value === undefined) return defaultValue;
    const normalized = value.trim().toLowerCase();
    if (normalized === '') return defaultValue;
    return normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on';
}

export function envString(value: string | undefined, defaultValue: string): string {
    const trimmed = value?.trim();
    return trimmed ? trimmed : defaultValue;
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

export function envPositiveInt(value: string | undefined, defaultValue: number): number {
    const parsed = envOptionalInt(value);
    if (typeof parsed !== 'number' || parsed < 1) return defaultValue;
    return parsed;
}

/**
 * Parse a positive integer CLI flag; anything else is rejected rather than defaulted.
 * Commander prints an InvalidArgumentError as a usage error.
 */
export function parsePositiveInt(value: string): number {
    const parsed = envOptionalInt(value);
    if (typeof parsed !== 'number' || parsed < 1) {
        throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
    }
    return parsed;
}

export function envTimeoutMs(value: string | undefined, fallback: number): number {
    const parsed = value ? Number(value) : Number.NaN;
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

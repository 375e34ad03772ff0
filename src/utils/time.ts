// src/utils/time.ts

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const MS_PER_MINUTE = 60_000;
export const MS_PER_DAY = 86_400_000;

/**
 * Format as ISO-8601 UTC without milliseconds, e.g. 2026-01-15T09:00:00Z
 */
export function toIsoSeconds(date: Date): string {
    return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function addMinutes(date: Date, minutes: number): Date {
    return new Date(date.getTime() + minutes * MS_PER_MINUTE);
}

/**
 * Parse a stored timestamp; missing zone is read as UTC.
 *
 * @returns null when the value is not a valid date
 */
export function parseTimestamp(value: string): Date | null {
    const hasZone = /(Z|[+-]\d{2}:\d{2})$/.test(value);
    const isDateOnly = /^\d{4}-\d{2}-\d{2}$/.test(value);
    const normalized = isDateOnly ? `${value}T00:00:00Z` : hasZone ? value : `${value}Z`;
    const parsed = new Date(normalized);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
}

// Generic currency helpers for decimal columns
export function toAmount(val: string | number | undefined | null): number {
    if (val === undefined || val === null) return 0;
    const num = Number(val);
    return Number.isNaN(num) ? 0 : num;
}

export function formatAmount(amount: number): string {
    return amount.toFixed(2);
}

export function sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Cut a string to a column width. Null and undefined pass through as null.
 */
export function truncate(value: string | null | undefined, max: number): string | null {
    if (value === null || value === undefined) return null;
    return value.length > max ? value.slice(0, max) : value;
}

/**
 * Parse an integer cell ("3", " 12 ") into a number; anything else is null.
 */
export function toInt(value: unknown): number | null {
    if (typeof value === 'number') return Number.isInteger(value) ? value : null;
    if (typeof value !== 'string') return null;
    const trimmed = value.trim();
    if (!/^-?\d+$/.test(trimmed)) return null;
    return parseInt(trimmed, 10);
}

export function parseYesNo(value: unknown): boolean {
    return typeof value === 'string' && value.trim().toLowerCase() === 'yes';
}

/**
 * Parse a timestamp string into a Date, or null when it does not parse.
 */
export function parseDate(value: unknown): Date | null {
    if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
    if (typeof value !== 'string' || !value.trim()) return null;
    const d = new Date(value.trim());
    return Number.isNaN(d.getTime()) ? null : d;
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
    const step = Math.max(1, Math.floor(size));
    const out: T[][] = [];
    for (let i = 0; i < items.length; i += step) {
        out.push(items.slice(i, i + step));
    }
    return out;
}

export function daysToMs(days: number): number {
    return days * 24 * 60 * 60 * 1000;
}

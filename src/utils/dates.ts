/**
 * Date utilities
 * Duration parsing and expiry arithmetic, always in epoch milliseconds
 */

const UNIT_MS: Record<string, number> = {
    ms: 1,
    s: 1000,
    m: 60 * 1000,
    h: 60 * 60 * 1000,
};

/**
 * Parses a duration into milliseconds.
 *
 * Supports `"500ms"`, `"30s"`, `"5m"`, `"2h"` and bare numbers, which are
 * read as seconds.
 *
 * @throws {Error} If the string is not a non-negative duration
 */
export function parseDuration(value: string): number {
    const match = value.trim().match(/^(\d+(?:\.\d+)?)(ms|s|m|h)?$/);
    if (!match) {
        throw new Error(`Invalid duration: "${value}". Use seconds or a unit suffix (e.g., 30s, 5m, 1h)`);
    }
    const amount = parseFloat(match[1]);
    const unit = match[2] ?? 's';
    return Math.round(amount * UNIT_MS[unit]);
}

/**
 * Formats a duration in milliseconds as `1h 5m`, `4m 30s` or `12s`.
 * Negative durations are prefixed with `-`.
 */
export function formatDuration(ms: number): string {
    const sign = ms < 0 ? '-' : '';
    let seconds = Math.floor(Math.abs(ms) / 1000);
    const hours = Math.floor(seconds / 3600);
    seconds -= hours * 3600;
    const minutes = Math.floor(seconds / 60);
    seconds -= minutes * 60;

    if (hours > 0) return `${sign}${hours}h ${minutes}m`;
    if (minutes > 0) return `${sign}${minutes}m ${seconds}s`;
    return `${sign}${seconds}s`;
}

/** True when `expiresAt` falls within `marginMs` of now, or has passed. */
export function isWithinMargin(expiresAt: number, marginMs: number, now: number = Date.now()): boolean {
    return expiresAt - marginMs <= now;
}

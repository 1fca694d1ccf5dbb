/**
 * Time Utilities
 */

/**
 * Get current ISO timestamp
 */
export function nowISO(): string {
    return new Date().toISOString();
}

/**
 * Calendar date (UTC) as YYYY-MM-DD
 */
export function todayISODate(now: Date = new Date()): string {
    return now.toISOString().slice(0, 10);
}

/**
 * Trim a timestamp such as "2024-08-17T14:00:00Z" down to its date part.
 * Returns null when the text does not start with a YYYY-MM-DD date.
 */
export function toISODate(value: string): string | null {
    const date = value.trim().slice(0, 10);
    return /^\d{4}-\d{2}-\d{2}$/.test(date) ? date : null;
}

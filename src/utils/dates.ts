const MS_PER_DAY = 86_400_000;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

/**
 * Parse "YYYY-MM-DD" (optionally followed by a time) or "MM/DD/YYYY" into "YYYY-MM-DD".
 * Returns null for anything else, including impossible dates such as 2023-02-30.
 */
export function parseCalendarDate(raw: string): string | null {
    const value = raw.trim();

    let year: number;
    let month: number;
    let day: number;

    const iso = ISO_DATE.exec(value);
    const us = iso ? null : US_DATE.exec(value);
    if (iso) {
        year = Number(iso[1]);
        month = Number(iso[2]);
        day = Number(iso[3]);
    } else if (us) {
        month = Number(us[1]);
        day = Number(us[2]);
        year = Number(us[3]);
    } else {
        return null;
    }

    const date = new Date(Date.UTC(year, month - 1, day));
    if (
        date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day
    ) {
        return null;
    }

    return date.toISOString().slice(0, 10);
}

/**
 * Whole calendar days from `from` to `to` (both "YYYY-MM-DD"). Negative when `to` is earlier.
 */
export function daysBetween(from: string, to: string): number {
    return Math.round((Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / MS_PER_DAY);
}

// src/utils/date.ts
/**
 * Date/time helpers for the backend.
 *
 * Note:
 * - DATETIME columns arrive as JS Dates in server local time.
 * - Everything leaving the API is ISO-8601 UTC (Z).
 */

/** Convert local/offsetted date to ISO-8601 UTC (Z) */
export function toUtcZ(input: string | Date | null | undefined): string | null {
    if (!input) return null;
    const d = new Date(input);
    if (Number.isNaN(d.getTime())) return null;
    return d.toISOString();
}

/** Same as toUtcZ for a raw driver value; anything that is not a Date or string is null. */
export function columnToUtcZ(v: unknown): string | null {
    return v instanceof Date || typeof v === "string" ? toUtcZ(v) : null;
}

/** DATE column → "YYYY-MM-DD" (null when empty). */
export function toDateOnly(v: unknown): string | null {
    if (v == null || v === "") return null;
    if (v instanceof Date) {
        if (Number.isNaN(v.getTime())) return null;
        const mm = String(v.getMonth() + 1).padStart(2, "0");
        const dd = String(v.getDate()).padStart(2, "0");
        return `${v.getFullYear()}-${mm}-${dd}`;
    }
    return String(v).slice(0, 10);
}

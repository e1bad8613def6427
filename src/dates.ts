const DAY_MS = 24 * 60 * 60 * 1000;

/** UTC calendar day of an instant, `YYYY-MM-DD`. */
export function isoDay(at: Date): string {
    return at.toISOString().slice(0, 10);
}

/** Parse a provider timestamp or bare date into a calendar day; `undefined` when unparseable. */
export function toDay(value: string | undefined): string | undefined {
    if (!value) return undefined;
    const ms = Date.parse(value.trim());
    if (Number.isNaN(ms)) return undefined;
    return isoDay(new Date(ms));
}

export function addDays(day: string, n: number): string {
    return isoDay(new Date(Date.parse(day) + n * DAY_MS));
}

export function daysBefore(now: Date, n: number): string {
    return isoDay(new Date(now.getTime() - n * DAY_MS));
}

export function ageMs(now: Date, iso: string): number {
    return now.getTime() - Date.parse(iso);
}

export { DAY_MS };

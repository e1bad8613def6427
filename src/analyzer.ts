import { daysBefore } from './dates.js';
import type { Item, OutletCount } from './types.js';

const MIN_ITEMS = 5;
const MIN_PER_BUCKET = 2;
const RECENT_DAYS = 180;
const DOMINANCE = 0.4;

export type OutletChange = { changed: boolean; note?: string };

/** Outlet counts, most frequent first; ties keep first-seen order. */
export function outletHistory(items: Pick<Item, 'outlet'>[]): OutletCount[] {
    const counts = new Map<string, number>();
    for (const it of items) counts.set(it.outlet, (counts.get(it.outlet) ?? 0) + 1);
    return Array.from(counts, ([outlet, count]) => ({ outlet, count })).sort((a, b) => b.count - a.count);
}

export function mostCommonOutlet(items: Pick<Item, 'outlet'>[]): string | undefined {
    return outletHistory(items)[0]?.outlet;
}

/**
 * Compare the plurality outlet of the last 180 days with the one before.
 * A change needs at least 5 items, 2 per bucket, differing pluralities, and each plurality holding 40% of its bucket.
 */
export function outletChange(items: Pick<Item, 'outlet' | 'date'>[], now: Date = new Date()): OutletChange {
    if (items.length < MIN_ITEMS) return { changed: false };

    const cutoff = daysBefore(now, RECENT_DAYS);
    const recent = items.filter((it) => it.date >= cutoff);
    const older = items.filter((it) => it.date < cutoff);
    if (recent.length < MIN_PER_BUCKET || older.length < MIN_PER_BUCKET) return { changed: false };

    const [current] = outletHistory(recent);
    const [prior] = outletHistory(older);
    if (current.outlet === prior.outlet) return { changed: false };

    if (current.count / recent.length >= DOMINANCE && prior.count / older.length >= DOMINANCE) {
        return { changed: true, note: `Possible outlet change: Previously ${prior.outlet}, now ${current.outlet}` };
    }
    return { changed: false };
}

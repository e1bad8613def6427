import { addDays, ageMs, DAY_MS } from './dates.js';
import type { Tier } from './types.js';

export type TierInput = {
    hasRecord: boolean;
    isFresh: boolean;
    forceRefresh: boolean;
    hasItems: boolean;
    hasIdentity: boolean;
};

/**
 * Pick the resolution strategy.
 * fresh-hit: stored, fresh, not forced, owns items. incremental: stored with a provider identity.
 * Everything else, including stored records without an identity, resolves identity from scratch.
 */
export function selectTier(s: TierInput): Tier {
    if (s.hasRecord && s.isFresh && !s.forceRefresh && s.hasItems) return 'fresh-hit';
    if (s.hasRecord && s.hasIdentity) return 'incremental';
    return 'cold-start';
}

export function isFresh(refreshedAt: string | undefined, now: Date, freshnessDays: number): boolean {
    if (!refreshedAt || Number.isNaN(Date.parse(refreshedAt))) return false;
    return ageMs(now, refreshedAt) < freshnessDays * DAY_MS;
}

/** The day after the newest stored item; no bound when nothing is stored. */
export function incrementalLowerBound(latestItemDate: string | undefined): string | undefined {
    return latestItemDate ? addDays(latestItemDate, 1) : undefined;
}

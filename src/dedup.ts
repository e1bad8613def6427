import { headlineKey } from './normalize.js';
import { outletPriority, outletTable, type OutletTable } from './outlets.js';
import type { Item } from './types.js';

/**
 * Collapse syndicated copies of the same headline.
 * Per headline key the kept copy is the highest-priority outlet, then the most recent date, then the lowest URL,
 * so the result does not depend on input order. Items whose headline normalizes to nothing are dropped.
 * Output is date descending.
 */
export function dedupBySyndication(items: Item[], table: OutletTable = outletTable()): Item[] {
    const groups = new Map<string, Item[]>();
    for (const it of items) {
        const key = headlineKey(it.headline);
        if (!key) continue;
        const group = groups.get(key);
        if (group) group.push(it);
        else groups.set(key, [it]);
    }
    const unique: Item[] = [];
    for (const group of groups.values()) {
        let best = group[0];
        for (const candidate of group.slice(1)) {
            if (preferred(candidate, best, table)) best = candidate;
        }
        unique.push(best);
    }
    return unique.sort(byDateDesc);
}

function preferred(a: Item, b: Item, table: OutletTable): boolean {
    const pa = outletPriority(a.outlet, table);
    const pb = outletPriority(b.outlet, table);
    if (pa !== pb) return pa > pb;
    if (a.date !== b.date) return a.date > b.date;
    return a.url < b.url;
}

export function byDateDesc(a: Item, b: Item): number {
    if (a.date !== b.date) return a.date < b.date ? 1 : -1;
    return a.url < b.url ? -1 : a.url > b.url ? 1 : 0;
}

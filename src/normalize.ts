import { toDay } from './dates.js';
import { outletTable, resolveOutlet, type OutletTable } from './outlets.js';
import type { Item, RawItem } from './types.js';

const MAX_TOPICS = 5;

/**
 * Map provider items onto the canonical shape.
 * Items without a URL, a title or a parseable publication date are dropped; repeated URLs keep the first occurrence.
 */
export function normalize(raw: RawItem[], table: OutletTable = outletTable()): Item[] {
    const seen = new Set<string>();
    const out: Item[] = [];
    for (const it of raw) {
        const url = (it.url || '').trim();
        const headline = (it.title || '').trim();
        const date = toDay(it.publishedAt);
        if (!url || !headline || !date || seen.has(url)) continue;
        seen.add(url);
        out.push({
            headline,
            outlet: outletName(it, table),
            date,
            url,
            topics: uniqueTopics(it.topics || []),
        });
    }
    return out;
}

function outletName(it: RawItem, table: OutletTable): string {
    if (it.domain && it.domain.trim()) return resolveOutlet(it.domain, table);
    const title = (it.outletTitle || '').trim();
    if (!title) return 'Unknown';
    // some feeds put a bare host in the title slot
    return /^[\w-]+(\.[\w-]+)+$/.test(title) ? resolveOutlet(title, table) : title;
}

function uniqueTopics(topics: string[]): string[] {
    const out: string[] = [];
    for (const t of topics) {
        const name = t.trim();
        if (name && !out.includes(name)) out.push(name);
        if (out.length === MAX_TOPICS) break;
    }
    return out;
}

/** Grouping key for syndicated copies: lower-case, no punctuation, single spaces, no "breaking"/"live updates"/"update" lead. */
export function headlineKey(headline: string): string {
    return headline
        .toLowerCase()
        .replace(/[^\p{L}\p{N}_\s]/gu, '')
        .replace(/\s+/g, ' ')
        .trim()
        .replace(/^(live updates?|breaking|update)\b\s*:?\s*/, '');
}

import { z } from 'zod';
import { ageMs, isoDay } from '../dates.js';
import { byDateDesc } from '../dedup.js';
import { createLogger } from '../logger.js';
import type { Item, Person, Provenance, RelevanceVerdict, SocialLinks } from '../types.js';
import { isUniqueViolation, type Collections } from './db.js';

const logger = createLogger('store');

const HOUR_MS = 60 * 60 * 1000;

const SocialLinksSchema = z.object({
    twitterHandle: z.string().optional(),
    twitterUrl: z.string().optional(),
    linkedinUrl: z.string().optional(),
    websiteUrl: z.string().optional(),
    title: z.string().optional(),
});

const VerdictSchema = z.discriminatedUnion('state', [
    z.object({ state: z.literal('unknown') }),
    z.object({ state: z.literal('relevant'), rationale: z.string() }),
    z.object({ state: z.literal('not-relevant'), rationale: z.string() }),
]);

const PersonDocSchema = z.object({
    _id: z.string(),
    name: z.string(),
    externalId: z.string().optional(),
    affiliation: z.string().optional(),
    bio: z.string().optional(),
    socialLinks: SocialLinksSchema.optional(),
    provenance: z.enum(['perigon', 'newsapi', 'import']),
    relevance: VerdictSchema,
    refreshedAt: z.string().optional(),
});

const ItemDocSchema = z.object({
    personId: z.string(),
    headline: z.string(),
    outlet: z.string(),
    date: z.string(),
    url: z.string(),
    summary: z.string().optional(),
    topics: z.array(z.string()).default([]),
});

const QueryDocSchema = z.object({ key: z.string(), payload: z.string(), storedAt: z.string() });
const SummaryDocSchema = z.object({ key: z.string(), text: z.string() });

export type PersonFields = {
    name: string;
    externalId?: string;
    socialLinks?: SocialLinks;
    affiliation?: string;
    bio?: string;
    provenance: Provenance;
};

export type DecidedVerdict = Exclude<RelevanceVerdict, { state: 'unknown' }>;

export type StoreOptions = {
    now?: () => Date;
    queryTtlHours?: number;
};

/** Canonical form of a person name: trimmed, lower-case, single spaces. */
export function normalizeName(name: string): string {
    return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

/** Drop keys whose value is undefined so `$set` never writes them. */
function defined(fields: object): Record<string, unknown> {
    return Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));
}

/**
 * Record store over the NeDB collections.
 * Query-cache rows expire logically after the TTL and are ignored, never deleted; summaries never expire.
 */
export class RecordStore {
    private readonly now: () => Date;

    private readonly queryTtlMs: number;

    constructor(private readonly db: Collections, options: StoreOptions = {}) {
        this.now = options.now ?? (() => new Date());
        this.queryTtlMs = (options.queryTtlHours ?? 24) * HOUR_MS;
    }

    // --- query cache ---

    async getQuery<T>(key: string, schema: z.ZodType<T>): Promise<T | undefined> {
        const rows: unknown[] = await this.db.queries.find({ key });
        const now = this.now();
        let latest: z.infer<typeof QueryDocSchema> | undefined;
        for (const row of rows) {
            const doc = QueryDocSchema.safeParse(row);
            if (!doc.success || ageMs(now, doc.data.storedAt) >= this.queryTtlMs) continue;
            if (!latest || doc.data.storedAt > latest.storedAt) latest = doc.data;
        }
        if (!latest) return undefined;
        const parsed = schema.safeParse(JSON.parse(latest.payload));
        return parsed.success ? parsed.data : undefined;
    }

    /** One row per key per calendar day; a later write the same day supersedes the earlier one. */
    async putQuery(key: string, payload: unknown): Promise<void> {
        const now = this.now();
        const slot = `${key}|${isoDay(now)}`;
        await this.db.queries.update(
            { slot },
            { $set: { slot, key, day: isoDay(now), payload: JSON.stringify(payload), storedAt: now.toISOString() } },
            { upsert: true },
        );
    }

    // --- summary cache ---

    async getSummary(key: string): Promise<string | undefined> {
        const row: unknown = await this.db.summaries.findOne({ key });
        const doc = SummaryDocSchema.safeParse(row);
        return doc.success ? doc.data.text : undefined;
    }

    async getSummaries(keys: string[]): Promise<Map<string, string>> {
        const found = new Map<string, string>();
        if (!keys.length) return found;
        const rows: unknown[] = await this.db.summaries.find({ key: { $in: keys } });
        for (const row of rows) {
            const doc = SummaryDocSchema.safeParse(row);
            if (doc.success) found.set(doc.data.key, doc.data.text);
        }
        return found;
    }

    async putSummary(key: string, text: string): Promise<void> {
        await this.db.summaries.update({ key }, { $set: { key, text } }, { upsert: true });
    }

    async putSummaries(entries: Map<string, string>): Promise<void> {
        for (const [key, text] of entries) await this.putSummary(key, text);
    }

    // --- people ---

    async findPerson(name: string): Promise<Person | undefined> {
        const row: unknown = await this.db.people.findOne({ name: normalizeName(name) });
        return toPerson(row);
    }

    async getPerson(id: string): Promise<Person | undefined> {
        const row: unknown = await this.db.people.findOne({ _id: id });
        return toPerson(row);
    }

    /**
     * Insert or merge a person. Fields left undefined keep their stored value; the refresh timestamp is always touched.
     * A new record starts with an unknown relevance verdict.
     */
    async upsertPerson(fields: PersonFields): Promise<Person> {
        const name = normalizeName(fields.name);
        const changes = defined({ ...fields, name, refreshedAt: this.now().toISOString() });
        const existing = await this.findPerson(name);
        if (!existing) {
            try {
                await this.db.people.insert({ ...changes, relevance: { state: 'unknown' } });
            } catch (e) {
                // lost a concurrent cold-start race on the unique name; merge instead
                if (!isUniqueViolation(e)) throw e;
                await this.db.people.update({ name }, { $set: changes }, {});
            }
        } else {
            await this.db.people.update({ _id: existing.id }, { $set: changes }, {});
        }
        const stored = await this.findPerson(name);
        if (!stored) throw new Error(`person "${name}" missing after upsert`);
        return stored;
    }

    /** Write the profile fields that are present; absent ones keep their stored value. Always touches the refresh timestamp. */
    async updateProfile(personId: string, profile: { affiliation?: string; bio?: string }): Promise<void> {
        const changes = defined({ affiliation: profile.affiliation, bio: profile.bio, refreshedAt: this.now().toISOString() });
        await this.db.people.update({ _id: personId }, { $set: changes }, {});
    }

    /** Write-once: the update only matches while the stored verdict is still unknown. */
    async setVerdictIfUnknown(personId: string, verdict: DecidedVerdict): Promise<void> {
        await this.db.people.update({ _id: personId, 'relevance.state': 'unknown' }, { $set: { relevance: verdict } }, {});
    }

    // --- items ---

    async listItems(personId: string): Promise<Item[]> {
        const rows: unknown[] = await this.db.items.find({ personId });
        const items: Item[] = [];
        for (const row of rows) {
            const doc = ItemDocSchema.safeParse(row);
            if (!doc.success) continue;
            const { personId: _owner, ...item } = doc.data;
            items.push(item);
        }
        return items.sort(byDateDesc);
    }

    async latestItemDate(personId: string): Promise<string | undefined> {
        const items = await this.listItems(personId);
        return items[0]?.date;
    }

    /** Insert-or-ignore by URL. Returns how many rows were new. */
    async insertItems(personId: string, items: Item[]): Promise<number> {
        let inserted = 0;
        for (const it of items) {
            try {
                await this.db.items.insert({ ...defined(it), personId });
                inserted++;
            } catch (e) {
                if (!isUniqueViolation(e)) throw e;
                logger.debug('store.item.duplicate', { url: it.url });
            }
        }
        logger.info('store.items.insert', { personId, count: items.length, inserted });
        return inserted;
    }
}

function toPerson(row: unknown): Person | undefined {
    if (row === null || row === undefined) return undefined;
    const doc = PersonDocSchema.safeParse(row);
    if (!doc.success) {
        logger.warn('store.person.invalid', { issues: doc.error.issues.length });
        return undefined;
    }
    const { _id, ...person } = doc.data;
    return { id: _id, ...person };
}

import crypto from 'node:crypto';
import { z } from 'zod';
import { outletChange, outletHistory } from './analyzer.js';
import { isoDay } from './dates.js';
import { dedupBySyndication } from './dedup.js';
import { InvalidInputError, UpstreamRateLimitedError } from './errors.js';
import { createLogger } from './logger.js';
import { headlineKey, normalize } from './normalize.js';
import { titleCase } from './outlets.js';
import { RelevanceGate } from './relevance.js';
import { normalizeName, type RecordStore } from './storage/store.js';
import { truncateHeadline } from './summarizer.js';
import { incrementalLowerBound, isFresh, selectTier } from './tiers.js';
import type { Dossier, Identity, IdentitySummary, IntelligenceAdapter, Item, Person, ProviderAdapter, RawItem, SocialLinks, Tier } from './types.js';

const logger = createLogger('pipeline');

const MIN_NAME_LENGTH = 2;
const MAX_TOPIC_RESULTS = 50;

const CachedProfileSchema = z.object({ affiliation: z.string().optional(), bio: z.string().optional() });

export type ResolverOptions = {
    store: RecordStore;
    provider: ProviderAdapter;
    intelligence: IntelligenceAdapter;
    now?: () => Date;
    freshnessDays?: number;
    /** Items per resolution sent to the summarizer; the rest use their headline. */
    summaryCap?: number;
};

/**
 * Cache-first dossier resolution.
 * fresh-hit serves stored data with no upstream calls; incremental fetches only items newer than the newest stored one
 * and regenerates the profile from the full set; cold-start resolves the identity and fetches the historical window.
 */
export class Resolver {
    private readonly store: RecordStore;

    private readonly provider: ProviderAdapter;

    private readonly intelligence: IntelligenceAdapter;

    private readonly gate: RelevanceGate;

    private readonly now: () => Date;

    private readonly freshnessDays: number;

    private readonly summaryCap: number;

    constructor(options: ResolverOptions) {
        this.store = options.store;
        this.provider = options.provider;
        this.intelligence = options.intelligence;
        this.gate = new RelevanceGate(options.store, options.intelligence);
        this.now = options.now ?? (() => new Date());
        this.freshnessDays = options.freshnessDays ?? 7;
        this.summaryCap = options.summaryCap ?? 20;
    }

    async resolve(rawName: string, forceRefresh = false): Promise<Dossier> {
        const name = rawName.trim().replace(/\s+/g, ' ');
        if (name.length < MIN_NAME_LENGTH) {
            throw new InvalidInputError(`Reporter name must be at least ${MIN_NAME_LENGTH} characters`, { details: { name: rawName } });
        }

        const person = await this.store.findPerson(name);
        const items = person ? await this.store.listItems(person.id) : [];
        const tier = selectTier({
            hasRecord: !!person,
            isFresh: !!person && isFresh(person.refreshedAt, this.now(), this.freshnessDays),
            forceRefresh,
            hasItems: items.length > 0,
            hasIdentity: !!person?.externalId,
        });
        logger.info('pipeline.tier', { name, tier, forceRefresh, stored: items.length });

        if (person && tier === 'fresh-hit') return this.freshHit(person, items);
        if (person?.externalId && tier === 'incremental') return this.incremental(person, person.externalId, items);
        return this.coldStart(name, person);
    }

    async searchByTopic(rawTopic: string, limit = 10): Promise<IdentitySummary[]> {
        const topic = rawTopic.trim();
        if (topic.length < MIN_NAME_LENGTH) {
            throw new InvalidInputError(`Topic must be at least ${MIN_NAME_LENGTH} characters`, { details: { topic: rawTopic } });
        }
        const size = Math.min(MAX_TOPIC_RESULTS, Math.max(1, Math.floor(limit) || 1));
        try {
            return await this.provider.fetchByTopic(topic, size);
        } catch (e) {
            if (e instanceof UpstreamRateLimitedError) return [];
            throw e;
        }
    }

    private async freshHit(person: Person, items: Item[]): Promise<Dossier> {
        if (person.relevance.state === 'unknown') {
            await this.gate.classifyIfUnknown(person.id, items);
            return this.buildDossier((await this.store.getPerson(person.id)) ?? person, items, 'fresh-hit');
        }
        return this.buildDossier(person, items, 'fresh-hit');
    }

    private async incremental(person: Person, externalId: string, stored: Item[]): Promise<Dossier> {
        const since = incrementalLowerBound(await this.store.latestItemDate(person.id));
        const fetched = await this.fetchItems(externalId, since);
        if (fetched === 'rate-limited') {
            // keep the refresh timestamp untouched so the next request retries upstream
            return this.buildDossier(person, stored, 'incremental');
        }

        const storedKeys = new Set(stored.map((it) => headlineKey(it.headline)));
        const fresh = fetched.filter((it) => !storedKeys.has(headlineKey(it.headline)));
        if (fresh.length) {
            await this.store.insertItems(person.id, await this.attachSummaries(fresh));
        }

        const all = await this.store.listItems(person.id);
        const profile = await this.profileFor(person.name, all, person.socialLinks?.title);
        await this.store.updateProfile(person.id, profile);
        await this.gate.classifyIfUnknown(person.id, all);

        logger.info('pipeline.incremental.done', { name: person.name, since, fetched: fetched.length, added: fresh.length });
        return this.buildDossier((await this.store.getPerson(person.id)) ?? person, all, 'incremental');
    }

    private async coldStart(name: string, existing: Person | undefined): Promise<Dossier> {
        let identity: Identity | null;
        try {
            identity = await this.provider.findIdentity(name);
        } catch (e) {
            if (!(e instanceof UpstreamRateLimitedError)) throw e;
            return this.storedOrEmpty(name, existing);
        }
        if (!identity) {
            logger.info('pipeline.identity.not_found', { name });
            return this.storedOrEmpty(name, existing);
        }

        const fetched = await this.fetchItems(identity.id);
        if (fetched === 'rate-limited') return this.storedOrEmpty(name, existing, identity.socialLinks);

        const personFields = { name, externalId: identity.id, socialLinks: identity.socialLinks, provenance: this.provider.id };
        if (!fetched.length) {
            // remember the identity so the next request goes straight to the incremental tier
            const person = await this.store.upsertPerson(personFields);
            return existing ? this.buildDossier(person, await this.store.listItems(person.id), 'cold-start') : this.emptyDossier(name, identity.socialLinks);
        }

        const person = await this.store.upsertPerson(personFields);
        await this.store.insertItems(person.id, await this.attachSummaries(fetched));

        // an existing record may already own items; the profile reads the merged set
        const all = await this.store.listItems(person.id);
        await this.store.updateProfile(person.id, await this.profileFor(name, all, identity.socialLinks?.title));
        await this.gate.classifyIfUnknown(person.id, all);
        logger.info('pipeline.cold_start.done', { name, fetched: fetched.length });
        return this.buildDossier((await this.store.getPerson(person.id)) ?? person, all, 'cold-start');
    }

    /** Provider fetch, normalized and deduplicated. Only a rate limit is distinguishable from "no data". */
    private async fetchItems(externalId: string, since?: string): Promise<Item[] | 'rate-limited'> {
        let raw: RawItem[];
        try {
            raw = await this.provider.fetchItemsSince(externalId, since);
        } catch (e) {
            if (!(e instanceof UpstreamRateLimitedError)) throw e;
            logger.warn('pipeline.rate_limited', { provider: this.provider.id, externalId });
            return 'rate-limited';
        }
        return dedupBySyndication(normalize(raw));
    }

    /**
     * Cached summaries first; then at most `summaryCap` uncached items go to the summarizer and the remainder keep
     * their headline. Only model-written summaries are cached.
     */
    private async attachSummaries(items: Item[]): Promise<Item[]> {
        const cached = await this.store.getSummaries(items.map((it) => it.url));
        const pending = items.filter((it) => !cached.has(it.url));
        const batch = pending.slice(0, this.summaryCap);
        const generated = batch.length ? await this.intelligence.summarizeBatch(batch.map(({ headline, outlet }) => ({ headline, outlet }))) : [];

        const written = new Map<string, string>();
        const toCache = new Map<string, string>();
        batch.forEach((it, i) => {
            const g = generated[i];
            written.set(it.url, g ? g.text : truncateHeadline(it.headline));
            if (g?.source === 'model') toCache.set(it.url, g.text);
        });
        await this.store.putSummaries(toCache);
        logger.info('pipeline.summaries', { cached: cached.size, generated: toCache.size, overflow: pending.length - batch.length });

        return items.map((it) => ({ ...it, summary: cached.get(it.url) ?? written.get(it.url) ?? it.headline }));
    }

    /** Profile from the full item set. Cached per name and item set, so new items always regenerate it. */
    private async profileFor(name: string, items: Item[], titleHint?: string): Promise<{ affiliation?: string; bio?: string }> {
        if (!items.length) return {};
        const fingerprint = crypto.createHash('sha1').update(items.map((it) => it.url).sort().join('\n')).digest('hex');
        const key = `profile:${normalizeName(name)}:${fingerprint}`;
        const cached = await this.store.getSummary(key);
        if (cached) {
            const parsed = CachedProfileSchema.safeParse(JSON.parse(cached));
            if (parsed.success) return parsed.data;
        }
        const profile = await this.intelligence.generateProfile(titleCase(name), items, titleHint);
        const result = { affiliation: profile.affiliation, bio: profile.bio };
        if (profile.source === 'model') await this.store.putSummary(key, JSON.stringify(result));
        return result;
    }

    private async storedOrEmpty(name: string, existing: Person | undefined, socialLinks?: SocialLinks): Promise<Dossier> {
        if (existing) return this.buildDossier(existing, await this.store.listItems(existing.id), 'cold-start');
        return this.emptyDossier(name, socialLinks);
    }

    private emptyDossier(name: string, socialLinks?: SocialLinks): Dossier {
        return {
            name,
            queryDate: isoDay(this.now()),
            tier: 'cold-start',
            items: [],
            socialLinks,
            outletHistory: [],
            outletChangeDetected: false,
            relevance: { state: 'unknown' },
        };
    }

    private buildDossier(person: Person, items: Item[], tier: Tier): Dossier {
        const change = outletChange(items, this.now());
        return {
            name: titleCase(person.name),
            queryDate: isoDay(this.now()),
            tier,
            items,
            affiliation: person.affiliation,
            bio: person.bio,
            socialLinks: person.socialLinks,
            outletHistory: outletHistory(items),
            outletChangeDetected: change.changed,
            outletChangeNote: change.note,
            relevance: person.relevance,
            lastRefreshed: person.refreshedAt,
        };
    }
}

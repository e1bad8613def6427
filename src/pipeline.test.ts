import { beforeEach, describe, expect, it, vi } from 'vitest';
import { InvalidInputError, UpstreamRateLimitedError } from './errors.js';
import { Resolver } from './pipeline.js';
import type { Collections } from './storage/db.js';
import { RecordStore } from './storage/store.js';
import { memoryStore } from './testing.js';
import type { Identity, IdentitySummary, Item, RawItem, SummaryRequest } from './types.js';

const NOW = new Date('2026-10-18T12:00:00Z');
const daysAgo = (n: number) => new Date(NOW.getTime() - n * 24 * 60 * 60 * 1000);

function fakeProvider(p: { identity?: Identity | null; items?: RawItem[] } = {}) {
    return {
        id: 'perigon' as const,
        findIdentity: vi.fn(async (_name: string): Promise<Identity | null> => p.identity ?? null),
        fetchItemsSince: vi.fn(async (_id: string, _since?: string): Promise<RawItem[]> => p.items ?? []),
        fetchByTopic: vi.fn(async (_topic: string, _limit: number): Promise<IdentitySummary[]> => []),
    };
}

function fakeIntelligence() {
    return {
        summarizeBatch: vi.fn(async (requests: SummaryRequest[]) => requests.map((r) => ({ text: `About ${r.headline}`, source: 'model' as const }))),
        generateProfile: vi.fn(async (_name: string, _items: Item[], _titleHint?: string) => ({ affiliation: 'New York Times', bio: 'Covers markets.', source: 'model' as const })),
        classify: vi.fn(async (_name: string, _outlets: string[], _summaries: string[]) => ({ relevant: true, rationale: 'Covers deals.', source: 'model' as const })),
    };
}

const stored = (headline: string, outlet: string, date: string, url: string): Item => ({ headline, outlet, date, url, topics: [] });

describe('Resolver', () => {
    let db: Collections;
    let store: RecordStore;

    beforeEach(async () => {
        ({ db, store } = await memoryStore(() => NOW));
    });

    /** Store whose clock reads `at`, for seeding records with an older refresh timestamp. */
    const seedStore = (at: Date) => new RecordStore(db, { now: () => at });

    const resolver = (provider = fakeProvider(), intelligence = fakeIntelligence(), summaryCap?: number) =>
        new Resolver({ store, provider, intelligence, now: () => NOW, summaryCap });

    it('serves a fresh record without upstream calls and flags the outlet change', async () => {
        const seed = seedStore(daysAgo(2));
        const person = await seed.upsertPerson({ name: 'Jane Doe', externalId: 'ext-7', affiliation: 'Politico', provenance: 'perigon' });
        await seed.setVerdictIfUnknown(person.id, { state: 'relevant', rationale: 'Covers policy.' });
        await seed.insertItems(person.id, [
            stored('Budget talks stall', 'Washington Post', '2025-12-20', 'https://wapo.example/1'),
            stored('Shutdown looms', 'Washington Post', '2026-01-15', 'https://wapo.example/2'),
            stored('Deal reached', 'Washington Post', '2026-02-10', 'https://wapo.example/3'),
            stored('Markets react to deal', 'Reuters', '2026-03-05', 'https://reuters.example/1'),
            stored('New trade bill', 'Politico', '2026-07-01', 'https://politico.example/1'),
            stored('Trade bill passes', 'Politico', '2026-09-15', 'https://politico.example/2'),
        ]);
        const provider = fakeProvider();
        const intelligence = fakeIntelligence();

        const dossier = await resolver(provider, intelligence).resolve('Jane Doe', false);

        expect(provider.findIdentity).not.toHaveBeenCalled();
        expect(provider.fetchItemsSince).not.toHaveBeenCalled();
        expect(intelligence.summarizeBatch).not.toHaveBeenCalled();
        expect(intelligence.generateProfile).not.toHaveBeenCalled();
        expect(intelligence.classify).not.toHaveBeenCalled();
        expect(dossier).toMatchObject({
            name: 'Jane Doe',
            queryDate: '2026-10-18',
            tier: 'fresh-hit',
            affiliation: 'Politico',
            outletChangeDetected: true,
            outletChangeNote: 'Possible outlet change: Previously Washington Post, now Politico',
            relevance: { state: 'relevant', rationale: 'Covers policy.' },
            lastRefreshed: daysAgo(2).toISOString(),
        });
        expect(dossier.items.map((it) => it.url)[0]).toBe('https://politico.example/2');
        expect(dossier.outletHistory).toEqual([
            { outlet: 'Washington Post', count: 3 },
            { outlet: 'Politico', count: 2 },
            { outlet: 'Reuters', count: 1 },
        ]);
    });

    it('classifies a fresh record once when its verdict is still unknown', async () => {
        const seed = seedStore(daysAgo(1));
        const person = await seed.upsertPerson({ name: 'Rosa Diaz', externalId: 'ext-4', provenance: 'perigon' });
        await seed.insertItems(person.id, [
            stored('Bank merger cleared', 'Reuters', '2026-10-10', 'https://reuters.example/merger'),
            stored('Audit rules tighten', 'Bloomberg', '2026-10-05', 'https://bloomberg.example/audit'),
        ]);
        const provider = fakeProvider();
        const intelligence = fakeIntelligence();

        const dossier = await resolver(provider, intelligence).resolve('Rosa Diaz');
        expect(dossier.tier).toBe('fresh-hit');
        expect(dossier.relevance).toEqual({ state: 'relevant', rationale: 'Covers deals.' });
        expect(intelligence.classify).toHaveBeenCalledWith('Rosa Diaz', ['Reuters', 'Bloomberg'], ['Bank merger cleared', 'Audit rules tighten']);
        expect(provider.findIdentity).not.toHaveBeenCalled();
        expect(provider.fetchItemsSince).not.toHaveBeenCalled();
        expect((await store.getPerson(person.id))?.relevance).toEqual({ state: 'relevant', rationale: 'Covers deals.' });

        const again = await resolver(provider, intelligence).resolve('Rosa Diaz');
        expect(again.relevance).toEqual({ state: 'relevant', rationale: 'Covers deals.' });
        expect(intelligence.classify).toHaveBeenCalledTimes(1);
    });

    it('cold-starts a new name: dedups, caps summaries and classifies', async () => {
        const provider = fakeProvider({
            identity: { id: 'ext-9', socialLinks: { title: 'Reporter' } },
            items: [
                { url: 'https://apnews.com/fed', title: 'Fed raises rates', publishedAt: '2026-10-10T09:00:00Z', domain: 'apnews.com' },
                { url: 'https://www.nytimes.com/fed', title: 'Fed Raises Rates!', publishedAt: '2026-10-09T09:00:00Z', domain: 'nytimes.com' },
                { url: 'https://www.nytimes.com/jobs', title: 'Jobs report beats forecasts', publishedAt: '2026-10-12T09:00:00Z', domain: 'nytimes.com' },
            ],
        });
        const intelligence = fakeIntelligence();

        const dossier = await resolver(provider, intelligence, 1).resolve('Sam Reed');

        expect(provider.fetchItemsSince).toHaveBeenCalledWith('ext-9', undefined);
        expect(intelligence.summarizeBatch).toHaveBeenCalledWith([{ headline: 'Jobs report beats forecasts', outlet: 'New York Times' }]);
        expect(intelligence.generateProfile).toHaveBeenCalledWith('Sam Reed', expect.any(Array), 'Reporter');
        expect(intelligence.generateProfile.mock.calls[0][1]).toHaveLength(2);
        expect(intelligence.classify).toHaveBeenCalledWith('Sam Reed', ['New York Times'], ['About Jobs report beats forecasts', 'Fed Raises Rates!']);
        expect(dossier).toEqual({
            name: 'Sam Reed',
            queryDate: '2026-10-18',
            tier: 'cold-start',
            items: [
                { headline: 'Jobs report beats forecasts', outlet: 'New York Times', date: '2026-10-12', url: 'https://www.nytimes.com/jobs', summary: 'About Jobs report beats forecasts', topics: [] },
                { headline: 'Fed Raises Rates!', outlet: 'New York Times', date: '2026-10-09', url: 'https://www.nytimes.com/fed', summary: 'Fed Raises Rates!', topics: [] },
            ],
            affiliation: 'New York Times',
            bio: 'Covers markets.',
            socialLinks: { title: 'Reporter' },
            outletHistory: [{ outlet: 'New York Times', count: 2 }],
            outletChangeDetected: false,
            outletChangeNote: undefined,
            relevance: { state: 'relevant', rationale: 'Covers deals.' },
            lastRefreshed: NOW.toISOString(),
        });

        expect(await store.getSummary('https://www.nytimes.com/jobs')).toBe('About Jobs report beats forecasts');
        expect(await store.getSummary('https://www.nytimes.com/fed')).toBeUndefined();

        const again = await resolver(provider, intelligence).resolve('sam   reed');
        expect(again.tier).toBe('fresh-hit');
        expect(provider.findIdentity).toHaveBeenCalledTimes(1);
    });

    it('persists nothing when the identity cannot be resolved', async () => {
        const provider = fakeProvider({ identity: null });

        const dossier = await resolver(provider).resolve('Ann Lee');
        expect(dossier).toEqual({
            name: 'Ann Lee',
            queryDate: '2026-10-18',
            tier: 'cold-start',
            items: [],
            socialLinks: undefined,
            outletHistory: [],
            outletChangeDetected: false,
            relevance: { state: 'unknown' },
        });
        expect(await store.findPerson('Ann Lee')).toBeUndefined();

        await resolver(provider).resolve('Ann Lee');
        expect(provider.findIdentity).toHaveBeenCalledTimes(2);
    });

    it('persists nothing when identity lookup is rate limited', async () => {
        const provider = fakeProvider();
        provider.findIdentity.mockRejectedValue(new UpstreamRateLimitedError('perigon'));

        const dossier = await resolver(provider).resolve('Ann Lee');
        expect(dossier.items).toEqual([]);
        expect(await store.findPerson('Ann Lee')).toBeUndefined();
    });

    it('remembers an identity with no items', async () => {
        const provider = fakeProvider({ identity: { id: 'ext-3' }, items: [] });

        const dossier = await resolver(provider).resolve('Kim Cho');
        expect(dossier.items).toEqual([]);
        expect((await store.findPerson('Kim Cho'))?.externalId).toBe('ext-3');

        await resolver(provider).resolve('Kim Cho');
        expect(provider.findIdentity).toHaveBeenCalledTimes(1);
        expect(provider.fetchItemsSince).toHaveBeenLastCalledWith('ext-3', undefined);
    });

    it('resolves an identity for an imported record and keeps it when lookup fails', async () => {
        const seed = seedStore(daysAgo(10));
        const imported = await seed.upsertPerson({ name: 'Pat Kim', affiliation: 'Axios', provenance: 'import' });
        await seed.insertItems(imported.id, [stored('Chip exports slow', 'Axios', '2026-09-30', 'https://axios.example/1')]);

        const missing = fakeProvider({ identity: null });
        const kept = await resolver(missing).resolve('Pat Kim');
        expect(missing.findIdentity).toHaveBeenCalledWith('Pat Kim');
        expect(kept).toMatchObject({ tier: 'cold-start', affiliation: 'Axios', lastRefreshed: daysAgo(10).toISOString() });
        expect(kept.items).toHaveLength(1);

        const found = fakeProvider({ identity: { id: 'ext-5' } });
        await resolver(found).resolve('Pat Kim');
        const merged = await store.getPerson(imported.id);
        expect(merged).toMatchObject({ externalId: 'ext-5', provenance: 'perigon', affiliation: 'Axios' });
    });

    it('builds the profile of an imported record from stored and fetched items', async () => {
        const seed = seedStore(daysAgo(10));
        const imported = await seed.upsertPerson({ name: 'Pat Kim', provenance: 'import' });
        await seed.insertItems(imported.id, [stored('Chip exports slow', 'Axios', '2026-09-30', 'https://axios.example/1')]);
        const provider = fakeProvider({
            identity: { id: 'ext-5' },
            items: [{ url: 'https://www.nytimes.com/chips', title: 'Chip tariffs expand', publishedAt: '2026-10-10T08:00:00Z', domain: 'nytimes.com' }],
        });
        const intelligence = fakeIntelligence();

        const dossier = await resolver(provider, intelligence).resolve('Pat Kim');
        expect(intelligence.generateProfile).toHaveBeenCalledTimes(1);
        expect(intelligence.generateProfile.mock.calls[0][1].map((it) => it.url)).toEqual(['https://www.nytimes.com/chips', 'https://axios.example/1']);
        expect(dossier).toMatchObject({ tier: 'cold-start', affiliation: 'New York Times', lastRefreshed: NOW.toISOString() });
        expect(dossier.items.map((it) => it.url)).toEqual(['https://www.nytimes.com/chips', 'https://axios.example/1']);
    });

    it('keeps the stored profile when an incremental refresh finds no items', async () => {
        const seed = seedStore(daysAgo(10));
        await seed.upsertPerson({ name: 'Dana Moss', externalId: 'ext-8', affiliation: 'Axios', bio: 'Covers chips.', provenance: 'import' });
        const provider = fakeProvider();
        const intelligence = fakeIntelligence();

        const dossier = await resolver(provider, intelligence).resolve('Dana Moss');
        expect(provider.fetchItemsSince).toHaveBeenCalledWith('ext-8', undefined);
        expect(intelligence.generateProfile).not.toHaveBeenCalled();
        expect(dossier).toMatchObject({ tier: 'incremental', affiliation: 'Axios', bio: 'Covers chips.', lastRefreshed: NOW.toISOString() });
    });

    describe('incremental refresh', () => {
        let personId: string;

        beforeEach(async () => {
            const seed = seedStore(daysAgo(10));
            personId = (await seed.upsertPerson({ name: 'Lee Park', externalId: 'ext-1', provenance: 'perigon' })).id;
            await seed.insertItems(personId, [stored('Old story', 'Politico', '2026-10-01', 'https://politico.example/old')]);
        });

        it('fetches from the day after the newest item and merges', async () => {
            const provider = fakeProvider({
                items: [
                    { url: 'https://www.nytimes.com/new', title: 'New story', publishedAt: '2026-10-05T10:00:00Z', domain: 'nytimes.com' },
                    { url: 'https://politico.example/old-copy', title: 'Old Story', publishedAt: '2026-10-03T10:00:00Z', domain: 'politico.com' },
                ],
            });
            const intelligence = fakeIntelligence();

            const dossier = await resolver(provider, intelligence).resolve('Lee Park');

            expect(provider.findIdentity).not.toHaveBeenCalled();
            expect(provider.fetchItemsSince).toHaveBeenCalledWith('ext-1', '2026-10-02');
            expect(intelligence.summarizeBatch).toHaveBeenCalledWith([{ headline: 'New story', outlet: 'New York Times' }]);
            expect(intelligence.generateProfile.mock.calls[0][1].map((it) => it.url)).toEqual(['https://www.nytimes.com/new', 'https://politico.example/old']);
            expect(dossier.tier).toBe('incremental');
            expect(dossier.items.map((it) => it.url)).toEqual(['https://www.nytimes.com/new', 'https://politico.example/old']);
            expect(dossier.items[0].summary).toBe('About New story');
            expect(dossier.affiliation).toBe('New York Times');
            expect(dossier.lastRefreshed).toBe(NOW.toISOString());
            expect(dossier.relevance).toEqual({ state: 'relevant', rationale: 'Covers deals.' });
        });

        it('runs on a forced refresh of a fresh record', async () => {
            await store.updateProfile(personId, {});
            const provider = fakeProvider();

            const dossier = await resolver(provider).resolve('Lee Park', true);
            expect(dossier.tier).toBe('incremental');
            expect(provider.fetchItemsSince).toHaveBeenCalledWith('ext-1', '2026-10-02');
        });

        it('keeps the refresh timestamp when rate limited', async () => {
            const provider = fakeProvider();
            provider.fetchItemsSince.mockRejectedValue(new UpstreamRateLimitedError('perigon'));

            const dossier = await resolver(provider).resolve('Lee Park');
            expect(dossier.tier).toBe('incremental');
            expect(dossier.items).toHaveLength(1);
            expect(dossier.lastRefreshed).toBe(daysAgo(10).toISOString());
            expect((await store.getPerson(personId))?.refreshedAt).toBe(daysAgo(10).toISOString());
        });
    });

    it('rejects names shorter than two characters', async () => {
        await expect(resolver().resolve('  J ')).rejects.toBeInstanceOf(InvalidInputError);
    });

    describe('searchByTopic', () => {
        it('clamps the limit', async () => {
            const provider = fakeProvider();
            await resolver(provider).searchByTopic(' antitrust ', 500);
            await resolver(provider).searchByTopic('antitrust', 0);
            expect(provider.fetchByTopic.mock.calls).toEqual([
                ['antitrust', 50],
                ['antitrust', 1],
            ]);
        });

        it('returns nothing when rate limited', async () => {
            const provider = fakeProvider();
            provider.fetchByTopic.mockRejectedValue(new UpstreamRateLimitedError('perigon'));
            expect(await resolver(provider).searchByTopic('antitrust')).toEqual([]);
        });

        it('rejects short topics', async () => {
            await expect(resolver().searchByTopic('x')).rejects.toBeInstanceOf(InvalidInputError);
        });
    });
});

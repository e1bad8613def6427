import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { daysBefore } from '../dates.js';
import { UpstreamUnavailableError } from '../errors.js';
import { createLogger } from '../logger.js';
import { normalizeName } from '../storage/store.js';
import { resolveOutlet } from '../outlets.js';
import type { Identity, IdentitySummary, ProviderAdapter, RawItem, SocialLinks } from '../types.js';
import { IdentitySchema, IdentitySummaryListSchema, RawItemListSchema, cachedCall, type QueryCache } from './cache.js';

const logger = createLogger('src:perigon');

const BASE_URL = 'https://api.goperigon.com/v1';
const PAGE_SIZE = 100;

const named = z.object({ name: z.string().nullish() });

const JournalistSchema = z.object({
    id: z.string(),
    name: z.string().nullish(),
    title: z.string().nullish(),
    twitterHandle: z.string().nullish(),
    linkedinUrl: z.string().nullish(),
    websiteUrl: z.string().nullish(),
    topSources: z.array(z.object({ domain: z.string().nullish() })).nullish(),
});

const JournalistListSchema = z.object({ results: z.array(JournalistSchema).nullish() });

const ArticleListSchema = z.object({
    articles: z
        .array(
            z.object({
                url: z.string().nullish(),
                title: z.string().nullish(),
                pubDate: z.string().nullish(),
                source: z.object({ domain: z.string().nullish() }).nullish(),
                topics: z.array(named).nullish(),
                categories: z.array(named).nullish(),
            }),
        )
        .nullish(),
});

export type PerigonOptions = {
    apiKey: string;
    timeoutMs?: number;
    historyDays?: number;
    cache?: QueryCache;
    http?: AxiosInstance;
    now?: () => Date;
};

/**
 * Perigon journalist/article API.
 * Identity: `/journalists?name=` then `/journalists/{id}` for social links. Items: `/all?journalistId=&from=`.
 */
export class PerigonProvider implements ProviderAdapter {
    readonly id = 'perigon' as const;

    private readonly http: AxiosInstance;

    private readonly historyDays: number;

    private readonly now: () => Date;

    constructor(private readonly options: PerigonOptions) {
        this.http = options.http ?? axios.create({ baseURL: BASE_URL, timeout: options.timeoutMs ?? 30_000, headers: { 'User-Agent': 'byline-dossier/0.1' } });
        this.historyDays = options.historyDays ?? 365;
        this.now = options.now ?? (() => new Date());
    }

    async findIdentity(name: string): Promise<Identity | null> {
        return cachedCall(
            { cache: this.options.cache, key: `perigon:identity:${normalizeName(name)}`, schema: IdentitySchema, provider: this.id, op: 'identity', empty: null, store: (v) => v !== null },
            async () => {
                const search = this.parse(JournalistListSchema, (await this.http.get<unknown>('/journalists', { params: { name, apiKey: this.options.apiKey } })).data);
                const first = search.results?.[0];
                if (!first) return null;
                const detail = this.parse(JournalistSchema, (await this.http.get<unknown>(`/journalists/${encodeURIComponent(first.id)}`, { params: { apiKey: this.options.apiKey } })).data);
                return { id: first.id, socialLinks: socialLinksOf(detail) };
            },
        );
    }

    async fetchItemsSince(id: string, since?: string): Promise<RawItem[]> {
        const from = since ?? daysBefore(this.now(), this.historyDays);
        return cachedCall(
            { cache: this.options.cache, key: `perigon:items:${id}:${since ?? 'window'}`, schema: RawItemListSchema, provider: this.id, op: 'items', empty: [] },
            async () => {
                const res = await this.http.get<unknown>('/all', {
                    params: { journalistId: id, from, sortBy: 'date', size: PAGE_SIZE, language: 'en', apiKey: this.options.apiKey },
                });
                const items = (this.parse(ArticleListSchema, res.data).articles ?? []).map((a): RawItem => ({
                    url: a.url ?? undefined,
                    title: a.title ?? undefined,
                    publishedAt: a.pubDate ?? undefined,
                    domain: a.source?.domain ?? undefined,
                    topics: [...(a.topics ?? []), ...(a.categories ?? [])].flatMap((t) => (t.name ? [t.name] : [])),
                }));
                logger.info('perigon.items.ok', { id, from, count: items.length });
                return items;
            },
        );
    }

    async fetchByTopic(topic: string, limit: number): Promise<IdentitySummary[]> {
        return cachedCall(
            { cache: this.options.cache, key: `perigon:topic:${topic.toLowerCase()}:${limit}`, schema: IdentitySummaryListSchema, provider: this.id, op: 'topic', empty: [] },
            async () => {
                const res = await this.http.get<unknown>('/journalists', { params: { topic, size: limit, apiKey: this.options.apiKey } });
                return (this.parse(JournalistListSchema, res.data).results ?? []).slice(0, limit).map((j) => ({
                    id: j.id,
                    name: j.name ?? j.id,
                    title: j.title ?? undefined,
                    outlets: uniqueOutlets((j.topSources ?? []).flatMap((s) => (s.domain ? [s.domain] : []))),
                    provider: this.id,
                }));
            },
        );
    }

    private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
        const parsed = schema.safeParse(data);
        if (!parsed.success) throw new UpstreamUnavailableError(this.id, 'malformed response', { details: { issues: parsed.error.issues.length } });
        return parsed.data;
    }
}

function socialLinksOf(j: z.infer<typeof JournalistSchema>): SocialLinks {
    const links: SocialLinks = {};
    const handle = j.twitterHandle?.replace(/^@/, '');
    if (handle) {
        links.twitterHandle = handle;
        links.twitterUrl = `https://twitter.com/${handle}`;
    }
    if (j.linkedinUrl) links.linkedinUrl = j.linkedinUrl;
    if (j.websiteUrl) links.websiteUrl = j.websiteUrl;
    if (j.title) links.title = j.title;
    return links;
}

function uniqueOutlets(domains: string[]): string[] {
    return Array.from(new Set(domains.map((d) => resolveOutlet(d)))).slice(0, 3);
}

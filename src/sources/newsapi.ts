import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { daysBefore } from '../dates.js';
import { UpstreamUnavailableError } from '../errors.js';
import { resolveOutlet } from '../outlets.js';
import { normalizeName } from '../storage/store.js';
import type { Identity, IdentitySummary, ProviderAdapter, RawItem } from '../types.js';
import { IdentitySchema, IdentitySummaryListSchema, RawItemListSchema, cachedCall, type QueryCache } from './cache.js';

const BASE_URL = 'https://eventregistry.org/api/v1';
const PAGE_SIZE = 100;

const AuthorSchema = z.object({ uri: z.string().nullish(), name: z.string().nullish() });

const ArticleSchema = z.object({
    url: z.string().nullish(),
    title: z.string().nullish(),
    date: z.string().nullish(),
    dateTime: z.string().nullish(),
    source: z.object({ uri: z.string().nullish(), title: z.string().nullish() }).nullish(),
    authors: z.array(AuthorSchema).nullish(),
    categories: z.array(z.object({ label: z.string().nullish() })).nullish(),
});

const ArticleResponseSchema = z.object({
    articles: z.object({ results: z.array(ArticleSchema).nullish() }).nullish(),
});

type Article = z.infer<typeof ArticleSchema>;

export type NewsApiOptions = {
    apiKey: string;
    timeoutMs?: number;
    historyDays?: number;
    cache?: QueryCache;
    http?: AxiosInstance;
    now?: () => Date;
};

/**
 * NewsAPI.ai (Event Registry). Identities are author URIs from `/suggestAuthors`;
 * bylines come from `/article/getArticles` filtered by `authorUri`.
 */
export class NewsApiProvider implements ProviderAdapter {
    readonly id = 'newsapi' as const;

    private readonly http: AxiosInstance;

    private readonly historyDays: number;

    private readonly now: () => Date;

    constructor(private readonly options: NewsApiOptions) {
        this.http = options.http ?? axios.create({ baseURL: BASE_URL, timeout: options.timeoutMs ?? 30_000 });
        this.historyDays = options.historyDays ?? 365;
        this.now = options.now ?? (() => new Date());
    }

    async findIdentity(name: string): Promise<Identity | null> {
        return cachedCall(
            { cache: this.options.cache, key: `newsapi:identity:${normalizeName(name)}`, schema: IdentitySchema, provider: this.id, op: 'identity', empty: null, store: (v) => v !== null },
            async () => {
                const res = await this.http.post<unknown>('/suggestAuthors', { prefix: name, apiKey: this.options.apiKey });
                const authors = this.parse(z.array(AuthorSchema), res.data);
                const wanted = normalizeName(name);
                const exact = authors.find((a) => a.uri && a.name && normalizeName(a.name) === wanted);
                const uri = exact?.uri ?? authors.find((a) => a.uri)?.uri;
                return uri ? { id: uri } : null;
            },
        );
    }

    async fetchItemsSince(id: string, since?: string): Promise<RawItem[]> {
        return cachedCall(
            { cache: this.options.cache, key: `newsapi:items:${id}:${since ?? 'window'}`, schema: RawItemListSchema, provider: this.id, op: 'items', empty: [] },
            async () => (await this.articles({ authorUri: id, dateStart: since ?? daysBefore(this.now(), this.historyDays) })).map(toRawItem),
        );
    }

    /** Bylines of keyword-matching articles, ranked by how many of those articles each author wrote. */
    async fetchByTopic(topic: string, limit: number): Promise<IdentitySummary[]> {
        return cachedCall(
            { cache: this.options.cache, key: `newsapi:topic:${topic.toLowerCase()}:${limit}`, schema: IdentitySummaryListSchema, provider: this.id, op: 'topic', empty: [] },
            async () => {
                const tally = new Map<string, { name: string; count: number; outlets: Set<string> }>();
                for (const article of await this.articles({ keyword: topic })) {
                    const outlet = article.source?.uri ? resolveOutlet(article.source.uri) : undefined;
                    for (const author of article.authors ?? []) {
                        if (!author.uri || !author.name) continue;
                        const entry = tally.get(author.uri) ?? { name: author.name, count: 0, outlets: new Set<string>() };
                        entry.count++;
                        if (outlet) entry.outlets.add(outlet);
                        tally.set(author.uri, entry);
                    }
                }
                return Array.from(tally, ([id, e]) => ({ id, name: e.name, count: e.count, outlets: Array.from(e.outlets).slice(0, 3) }))
                    .sort((a, b) => b.count - a.count)
                    .slice(0, limit)
                    .map(({ id, name, outlets }) => ({ id, name, outlets, provider: this.id }));
            },
        );
    }

    private async articles(query: Record<string, string>): Promise<Article[]> {
        const res = await this.http.post<unknown>('/article/getArticles', {
            ...query,
            lang: 'eng',
            resultType: 'articles',
            articlesSortBy: 'date',
            articlesSortByAsc: false,
            articlesCount: PAGE_SIZE,
            includeArticleAuthors: true,
            includeArticleCategories: true,
            apiKey: this.options.apiKey,
        });
        return this.parse(ArticleResponseSchema, res.data).articles?.results ?? [];
    }

    private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
        const parsed = schema.safeParse(data);
        if (!parsed.success) throw new UpstreamUnavailableError(this.id, 'malformed response', { details: { issues: parsed.error.issues.length } });
        return parsed.data;
    }
}

function toRawItem(a: Article): RawItem {
    return {
        url: a.url ?? undefined,
        title: a.title ?? undefined,
        publishedAt: a.dateTime ?? a.date ?? undefined,
        domain: a.source?.uri ?? undefined,
        outletTitle: a.source?.title ?? undefined,
        // category labels are paths such as "news/Business"
        topics: (a.categories ?? []).flatMap((c) => (c.label ? [c.label.split('/').pop() ?? c.label] : [])),
        authors: (a.authors ?? []).flatMap((p) => (p.name ? [p.name] : [])),
    };
}

import { z } from 'zod';
import type { RecordStore } from '../storage/store.js';
import type { Identity, IdentitySummary, ProviderId, RawItem } from '../types.js';
import { guarded } from './http.js';

export type QueryCache = Pick<RecordStore, 'getQuery' | 'putQuery'>;

const SocialLinksSchema = z.object({
    twitterHandle: z.string().optional(),
    twitterUrl: z.string().optional(),
    linkedinUrl: z.string().optional(),
    websiteUrl: z.string().optional(),
    title: z.string().optional(),
});

export const IdentitySchema: z.ZodType<Identity | null> = z
    .object({ id: z.string(), socialLinks: SocialLinksSchema.optional() })
    .nullable();

export const RawItemListSchema: z.ZodType<RawItem[]> = z.array(
    z.object({
        url: z.string().optional(),
        title: z.string().optional(),
        publishedAt: z.string().optional(),
        domain: z.string().optional(),
        outletTitle: z.string().optional(),
        topics: z.array(z.string()).optional(),
        authors: z.array(z.string()).optional(),
    }),
);

export const IdentitySummaryListSchema: z.ZodType<IdentitySummary[]> = z.array(
    z.object({
        id: z.string(),
        name: z.string(),
        title: z.string().optional(),
        outlets: z.array(z.string()),
        provider: z.enum(['perigon', 'newsapi']),
    }),
);

/**
 * Read-through provider call. Only successful results reach the cache: a rate limit throws past the write,
 * other failures come back as `empty` from `guarded` without being stored.
 */
export async function cachedCall<T>(
    opts: { cache?: QueryCache; key: string; schema: z.ZodType<T>; provider: ProviderId; op: string; empty: T; store?: (value: T) => boolean },
    load: () => Promise<T>,
): Promise<T> {
    const { cache, key, schema, provider, op, empty, store = () => true } = opts;
    const hit = cache ? await cache.getQuery(key, schema) : undefined;
    if (hit !== undefined) return hit;
    return guarded(provider, op, empty, async () => {
        const value = await load();
        if (cache && store(value)) await cache.putQuery(key, value);
        return value;
    });
}

export type ProviderId = 'perigon' | 'newsapi';

/** Where a person record was last written from. */
export type Provenance = ProviderId | 'import';

/** Loose provider item before normalization; any field may be missing upstream. */
export type RawItem = {
    url?: string;
    title?: string;
    publishedAt?: string;
    domain?: string;
    outletTitle?: string;
    topics?: string[];
    authors?: string[];
};

/** Canonical published item. `date` is a calendar day, `YYYY-MM-DD`. */
export type Item = {
    headline: string;
    outlet: string;
    date: string;
    url: string;
    summary?: string;
    topics: string[];
};

export type SocialLinks = {
    twitterHandle?: string;
    twitterUrl?: string;
    linkedinUrl?: string;
    websiteUrl?: string;
    title?: string;
};

/**
 * Write-once relevance verdict. Once `relevant` or `not-relevant` is stored it is never recomputed.
 */
export type RelevanceVerdict =
    | { state: 'unknown' }
    | { state: 'relevant'; rationale: string }
    | { state: 'not-relevant'; rationale: string };

export type Person = {
    id: string;
    name: string;
    externalId?: string;
    affiliation?: string;
    bio?: string;
    socialLinks?: SocialLinks;
    provenance: Provenance;
    relevance: RelevanceVerdict;
    refreshedAt?: string;
};

export type Identity = { id: string; socialLinks?: SocialLinks };

export type IdentitySummary = {
    id: string;
    name: string;
    title?: string;
    outlets: string[];
    provider: ProviderId;
};

export type OutletCount = { outlet: string; count: number };

export type Tier = 'fresh-hit' | 'incremental' | 'cold-start';

export type Dossier = {
    name: string;
    queryDate: string;
    tier: Tier;
    items: Item[];
    affiliation?: string;
    bio?: string;
    socialLinks?: SocialLinks;
    outletHistory: OutletCount[];
    outletChangeDetected: boolean;
    outletChangeNote?: string;
    relevance: RelevanceVerdict;
    lastRefreshed?: string;
};

export type ProviderAdapter = {
    readonly id: ProviderId;
    /** `null` when the provider has no such person. Throws UpstreamRateLimitedError on 429. */
    findIdentity(name: string): Promise<Identity | null>;
    /** Without `since` the adapter applies its own historical window. */
    fetchItemsSince(id: string, since?: string): Promise<RawItem[]>;
    fetchByTopic(topic: string, limit: number): Promise<IdentitySummary[]>;
};

export type SummaryRequest = { headline: string; outlet: string };
export type GeneratedText = { text: string; source: 'model' | 'fallback' };
export type Profile = { affiliation?: string; bio?: string; source: 'model' | 'fallback' };
export type Classification = { relevant: boolean; rationale: string; source: 'model' | 'fallback' };

/** Every operation resolves; failures come back as fallback results. */
export type IntelligenceAdapter = {
    summarizeBatch(requests: SummaryRequest[]): Promise<GeneratedText[]>;
    generateProfile(name: string, items: Item[], titleHint?: string): Promise<Profile>;
    classify(name: string, outlets: string[], summaries: string[]): Promise<Classification>;
};

import { z } from 'zod';
import { ConfigError } from './errors.js';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const emptyAsUndefined = z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().min(1).optional(),
);

export const envSchema = z
    .object({
        PORT: positiveInt(3000),
        DATA_DIR: z.string().min(1).default('./data'),
        PROVIDER: z.enum(['perigon', 'newsapi']).default('perigon'),
        PERIGON_API_KEY: emptyAsUndefined,
        NEWSAPI_API_KEY: emptyAsUndefined,
        LLM_API_KEY: emptyAsUndefined,
        LLM_BASE_URL: z.string().url('LLM_BASE_URL must be a valid URL').default('https://api.openai.com'),
        LLM_MODEL: z.string().min(1).default('gpt-4o-mini'),
        PROVIDER_TIMEOUT_MS: positiveInt(30_000),
        LLM_TIMEOUT_MS: positiveInt(20_000),
        FRESHNESS_DAYS: positiveInt(7),
        QUERY_CACHE_TTL_HOURS: positiveInt(24),
        HISTORY_DAYS: positiveInt(365),
        SUMMARY_CAP: positiveInt(20),
    })
    .superRefine((env, ctx) => {
        if (env.PROVIDER === 'perigon' && !env.PERIGON_API_KEY) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['PERIGON_API_KEY'], message: 'PERIGON_API_KEY is required when PROVIDER=perigon' });
        }
        if (env.PROVIDER === 'newsapi' && !env.NEWSAPI_API_KEY) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['NEWSAPI_API_KEY'], message: 'NEWSAPI_API_KEY is required when PROVIDER=newsapi' });
        }
        if (!env.LLM_API_KEY) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['LLM_API_KEY'], message: 'LLM_API_KEY is required' });
        }
    });

export type AppConfig = {
    port: number;
    dataDir: string;
    provider: { id: 'perigon' | 'newsapi'; apiKey: string; timeoutMs: number; historyDays: number };
    llm: { apiKey: string; baseUrl: string; model: string; timeoutMs: number };
    freshnessDays: number;
    queryCacheTtlHours: number;
    summaryCap: number;
};

/**
 * Validate the environment. Missing upstream credentials throw ConfigError; this is the only fatal configuration path.
 */
export function loadConfig(input: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = envSchema.safeParse(input);
    if (!result.success) {
        const messages = result.error.issues.map((issue) => issue.message);
        throw new ConfigError(`Invalid environment variables: ${messages.join(', ')}`);
    }
    const env = result.data;
    const providerKey = env.PROVIDER === 'perigon' ? env.PERIGON_API_KEY : env.NEWSAPI_API_KEY;
    // superRefine above guarantees both keys; narrowing for the compiler
    if (!providerKey || !env.LLM_API_KEY) {
        throw new ConfigError('Upstream credentials missing');
    }
    return {
        port: env.PORT,
        dataDir: env.DATA_DIR,
        provider: { id: env.PROVIDER, apiKey: providerKey, timeoutMs: env.PROVIDER_TIMEOUT_MS, historyDays: env.HISTORY_DAYS },
        llm: { apiKey: env.LLM_API_KEY, baseUrl: env.LLM_BASE_URL.replace(/\/+$/, ''), model: env.LLM_MODEL, timeoutMs: env.LLM_TIMEOUT_MS },
        freshnessDays: env.FRESHNESS_DAYS,
        queryCacheTtlHours: env.QUERY_CACHE_TTL_HOURS,
        summaryCap: env.SUMMARY_CAP,
    };
}

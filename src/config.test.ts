import { describe, expect, it } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigError } from './errors.js';

const base = { PERIGON_API_KEY: 'test-secret', LLM_API_KEY: 'test-secret' };

describe('loadConfig', () => {
    it('applies defaults', () => {
        expect(loadConfig(base)).toEqual({
            port: 3000,
            dataDir: './data',
            provider: { id: 'perigon', apiKey: 'test-secret', timeoutMs: 30_000, historyDays: 365 },
            llm: { apiKey: 'test-secret', baseUrl: 'https://api.openai.com', model: 'gpt-4o-mini', timeoutMs: 20_000 },
            freshnessDays: 7,
            queryCacheTtlHours: 24,
            summaryCap: 20,
        });
    });

    it('reads overrides and picks the selected provider key', () => {
        const cfg = loadConfig({
            PROVIDER: 'newsapi',
            NEWSAPI_API_KEY: 'test-newsapi',
            LLM_API_KEY: 'test-secret',
            LLM_BASE_URL: 'http://llm.local:8080/',
            PORT: '8081',
            FRESHNESS_DAYS: '3',
        });
        expect(cfg.provider).toEqual({ id: 'newsapi', apiKey: 'test-newsapi', timeoutMs: 30_000, historyDays: 365 });
        expect(cfg.llm.baseUrl).toBe('http://llm.local:8080');
        expect(cfg.port).toBe(8081);
        expect(cfg.freshnessDays).toBe(3);
    });

    it('rejects missing credentials', () => {
        expect(() => loadConfig({ LLM_API_KEY: 'test-secret' })).toThrow(ConfigError);
        expect(() => loadConfig({ ...base, PROVIDER: 'newsapi' })).toThrow('NEWSAPI_API_KEY is required when PROVIDER=newsapi');
        expect(() => loadConfig({ ...base, LLM_API_KEY: '  ' })).toThrow('LLM_API_KEY is required');
    });

    it('rejects malformed values', () => {
        expect(() => loadConfig({ ...base, PORT: 'eighty' })).toThrow(ConfigError);
        expect(() => loadConfig({ ...base, PROVIDER: 'gdelt' })).toThrow(ConfigError);
    });
});

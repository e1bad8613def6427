import 'dotenv/config';
import { loadConfig } from './config.js';
import { createIntelligence } from './intelligence.js';
import { createLogger, errorMessage } from './logger.js';
import { Resolver } from './pipeline.js';
import { createServer } from './server.js';
import { NewsApiProvider } from './sources/newsapi.js';
import { PerigonProvider } from './sources/perigon.js';
import { openCollections } from './storage/db.js';
import { RecordStore } from './storage/store.js';
import type { ProviderAdapter } from './types.js';

const logger = createLogger('main');

async function main() {
    // throws ConfigError when upstream credentials are missing
    const cfg = loadConfig();

    const store = new RecordStore(await openCollections(cfg.dataDir), { queryTtlHours: cfg.queryCacheTtlHours });
    const providerOptions = { apiKey: cfg.provider.apiKey, timeoutMs: cfg.provider.timeoutMs, historyDays: cfg.provider.historyDays, cache: store };
    const provider: ProviderAdapter = cfg.provider.id === 'perigon' ? new PerigonProvider(providerOptions) : new NewsApiProvider(providerOptions);

    const resolver = new Resolver({
        store,
        provider,
        intelligence: createIntelligence(cfg.llm),
        freshnessDays: cfg.freshnessDays,
        summaryCap: cfg.summaryCap,
    });

    const app = createServer(resolver);
    app.listen(cfg.port, () => logger.info(`server.started http://localhost:${cfg.port}`, { provider: provider.id }));
}

main().catch((e) => {
    logger.error('fatal', { err: errorMessage(e) });
    process.exit(1);
});

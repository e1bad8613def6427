import Datastore from 'nedb-promises';
import fs from 'node:fs';
import path from 'node:path';
import { createLogger } from '../logger.js';

const logger = createLogger('db');

export type Collection = ReturnType<typeof Datastore.create>;

export type Collections = {
    people: Collection;
    items: Collection;
    queries: Collection;
    summaries: Collection;
};

/**
 * Open the NeDB collections: file-backed under `dataDir`, or in memory when `dataDir` is omitted.
 * Unique indexes carry the store's only concurrency guarantee (person name, item URL, cache slots).
 */
export async function openCollections(dataDir?: string): Promise<Collections> {
    const open = (name: string): Collection => {
        if (!dataDir) return Datastore.create({ inMemoryOnly: true, timestampData: true });
        return Datastore.create({ filename: path.join(dataDir, `${name}.db`), autoload: true, timestampData: true });
    };
    if (dataDir) fs.mkdirSync(path.resolve(dataDir), { recursive: true });

    const collections: Collections = {
        people: open('people'),
        items: open('items'),
        queries: open('queries'),
        summaries: open('summaries'),
    };
    await Promise.all([
        collections.people.ensureIndex({ fieldName: 'name', unique: true }),
        collections.items.ensureIndex({ fieldName: 'url', unique: true }),
        collections.items.ensureIndex({ fieldName: 'personId' }),
        collections.queries.ensureIndex({ fieldName: 'slot', unique: true }),
        collections.queries.ensureIndex({ fieldName: 'key' }),
        collections.summaries.ensureIndex({ fieldName: 'key', unique: true }),
    ]);
    logger.info('db.init.done', { dataDir: dataDir ?? ':memory:' });
    return collections;
}

/** NeDB reports unique index collisions with `errorType: 'uniqueViolated'`. */
export function isUniqueViolation(e: unknown): boolean {
    return typeof e === 'object' && e !== null && 'errorType' in e && e.errorType === 'uniqueViolated';
}

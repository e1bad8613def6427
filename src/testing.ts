import type { Express } from 'express';
import type { Server } from 'node:http';
import { openCollections } from './storage/db.js';
import { RecordStore } from './storage/store.js';

export type Listening = { url: string; close: () => Promise<void> };

/** Bind an express app to an ephemeral loopback port. */
export async function listen(app: Express): Promise<Listening> {
    const server = await new Promise<Server>((resolve) => {
        const s = app.listen(0, '127.0.0.1', () => resolve(s));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server has no TCP address');
    return {
        url: `http://127.0.0.1:${address.port}`,
        close: () => new Promise<void>((resolve, reject) => server.close((e) => (e ? reject(e) : resolve()))),
    };
}

/** In-memory store whose clock is read through `clock()` on every call. */
export async function memoryStore(clock: () => Date, queryTtlHours?: number) {
    const db = await openCollections();
    return { db, store: new RecordStore(db, { now: clock, queryTtlHours }) };
}

import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { InvalidInputError } from './errors.js';
import { createLogger, errorMessage } from './logger.js';
import type { Resolver } from './pipeline.js';
import { providerStatuses } from './state.js';

const logger = createLogger('server');

const DEFAULT_TOPIC_LIMIT = 10;

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler): RequestHandler {
    return (req, res, next) => {
        handler(req, res).catch(next);
    };
}

function truthy(value: unknown): boolean {
    return typeof value === 'string' && ['1', 'true', 'yes'].includes(value.toLowerCase());
}

export function createServer(resolver: Pick<Resolver, 'resolve' | 'searchByTopic'>) {
    const app = express();

    app.use((req, _res, next) => {
        logger.debug('http.request', { method: req.method, path: req.path });
        next();
    });

    app.get('/api/person/:name', route(async (req, res) => {
        const dossier = await resolver.resolve(req.params.name, truthy(req.query.refresh));
        res.json(dossier);
    }));

    app.get('/api/topics/:topic', route(async (req, res) => {
        const limit = typeof req.query.limit === 'string' ? Number(req.query.limit) : DEFAULT_TOPIC_LIMIT;
        const results = await resolver.searchByTopic(req.params.topic, Number.isFinite(limit) ? limit : DEFAULT_TOPIC_LIMIT);
        res.json(results);
    }));

    app.get('/providers', (_req: Request, res: Response) => {
        res.json(providerStatuses());
    });

    app.get('/health', (_req: Request, res: Response) => {
        res.json({ ok: true, time: new Date().toISOString() });
    });

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof InvalidInputError) {
            res.status(400).json({ error: err.message, code: err.code });
            return;
        }
        logger.error('http.error', { path: req.path, err: errorMessage(err) });
        res.status(500).json({ error: 'internal error' });
    });

    return app;
}

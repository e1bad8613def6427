import axios from 'axios';
import { UpstreamRateLimitedError, UpstreamUnavailableError } from '../errors.js';
import { createLogger, errorMessage } from '../logger.js';
import { setProviderStatus } from '../state.js';
import type { ProviderId } from '../types.js';

const logger = createLogger('src:http');

/** Classify a failed upstream call: HTTP 429 is a rate limit, anything else (timeouts included) is unavailability. */
export function toUpstreamError(provider: ProviderId, e: unknown): UpstreamRateLimitedError | UpstreamUnavailableError {
    if (e instanceof UpstreamRateLimitedError || e instanceof UpstreamUnavailableError) return e;
    if (axios.isAxiosError(e)) {
        const status = e.response?.status;
        if (status === 429) return new UpstreamRateLimitedError(provider, { cause: e });
        const reason = status ? `HTTP ${status}` : e.code === 'ECONNABORTED' || e.code === 'ETIMEDOUT' ? 'timeout' : e.message;
        return new UpstreamUnavailableError(provider, reason, { cause: e, details: { status } });
    }
    return new UpstreamUnavailableError(provider, errorMessage(e), { cause: e });
}

/**
 * Run one upstream operation. Rate limits propagate as UpstreamRateLimitedError;
 * every other failure is logged and replaced by `empty`.
 */
export async function guarded<T>(provider: ProviderId, op: string, empty: T, call: () => Promise<T>): Promise<T> {
    const start = Date.now();
    try {
        const result = await call();
        setProviderStatus({ id: provider, lastSuccessAt: new Date().toISOString(), lastCount: Array.isArray(result) ? result.length : undefined });
        logger.debug(`${provider}.${op}.ok`, { ms: Date.now() - start });
        return result;
    } catch (e) {
        const err = toUpstreamError(provider, e);
        if (err instanceof UpstreamRateLimitedError) {
            setProviderStatus({ id: provider, rateLimitedAt: new Date().toISOString() });
            logger.warn(`${provider}.rate_limited`, { op, ms: Date.now() - start });
            throw err;
        }
        setProviderStatus({ id: provider, lastError: err.message, lastErrorAt: new Date().toISOString() });
        logger.warn(`${provider}.${op}.fail`, { err: err.message, ms: Date.now() - start });
        return empty;
    }
}

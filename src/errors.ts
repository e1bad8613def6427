export interface DossierErrorOptions extends ErrorOptions {
    details?: Record<string, unknown>;
}

export class DossierError extends Error {
    readonly code: string;

    readonly details: Record<string, unknown>;

    constructor(code: string, message: string, options: DossierErrorOptions = {}) {
        const { details, ...errorOptions } = options;
        super(message, errorOptions);
        this.name = this.constructor.name;
        this.code = code;
        this.details = details ?? {};
    }
}

/** Surfaced to the caller as a 400. */
export class InvalidInputError extends DossierError {
    constructor(message: string, options: DossierErrorOptions = {}) {
        super('INVALID_INPUT', message, options);
    }
}

/** Absorbed by the pipeline: partial result, nothing negative cached. */
export class UpstreamRateLimitedError extends DossierError {
    constructor(provider: string, options: DossierErrorOptions = {}) {
        super('UPSTREAM_RATE_LIMITED', `${provider} rate limit reached`, options);
    }
}

export class UpstreamUnavailableError extends DossierError {
    constructor(provider: string, message: string, options: DossierErrorOptions = {}) {
        super('UPSTREAM_UNAVAILABLE', `${provider}: ${message}`, options);
    }
}

/** Fatal at startup only. */
export class ConfigError extends DossierError {
    constructor(message: string, options: DossierErrorOptions = {}) {
        super('CONFIG_INVALID', message, options);
    }
}

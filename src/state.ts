import type { ProviderId } from './types.js';

export type ProviderStatus = {
    id: ProviderId;
    lastSuccessAt?: string;
    lastError?: string;
    lastErrorAt?: string;
    rateLimitedAt?: string;
    lastCount?: number;
};

export const runtimeState: { providerStatus: Map<ProviderId, ProviderStatus> } = {
    providerStatus: new Map<ProviderId, ProviderStatus>(),
};

export function setProviderStatus(partial: ProviderStatus) {
    const prev = runtimeState.providerStatus.get(partial.id);
    runtimeState.providerStatus.set(partial.id, { ...prev, ...partial });
}

export function providerStatuses(): ProviderStatus[] {
    return Array.from(runtimeState.providerStatus.values());
}

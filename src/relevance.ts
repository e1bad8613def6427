import { createLogger } from './logger.js';
import { titleCase } from './outlets.js';
import type { RecordStore } from './storage/store.js';
import type { IntelligenceAdapter, Item } from './types.js';

const logger = createLogger('relevance');

const MAX_SUMMARIES = 10;

/**
 * One-shot relevance classification. A stored relevant/not-relevant verdict is final and never recomputed;
 * with no items the verdict stays unknown.
 */
export class RelevanceGate {
    constructor(
        private readonly store: RecordStore,
        private readonly intelligence: IntelligenceAdapter,
    ) {}

    async classifyIfUnknown(personId: string, items: Pick<Item, 'outlet' | 'headline' | 'summary'>[]): Promise<void> {
        const person = await this.store.getPerson(personId);
        if (!person || person.relevance.state !== 'unknown') return;
        if (!items.length) {
            logger.debug('relevance.deferred', { personId });
            return;
        }

        const outlets = Array.from(new Set(items.map((a) => a.outlet).filter(Boolean)));
        const summaries = items.slice(0, MAX_SUMMARIES).map((a) => a.summary || a.headline);
        const result = await this.intelligence.classify(titleCase(person.name), outlets, summaries);
        await this.store.setVerdictIfUnknown(
            personId,
            result.relevant ? { state: 'relevant', rationale: result.rationale } : { state: 'not-relevant', rationale: result.rationale },
        );
        logger.info('relevance.classified', { personId, relevant: result.relevant, source: result.source });
    }
}

import { z } from 'zod';
import { mostCommonOutlet } from './analyzer.js';
import { extractJson, type ChatClient } from './llm.js';
import { createLogger, errorMessage } from './logger.js';
import type { GeneratedText, Item, Profile, SummaryRequest } from './types.js';

const logger = createLogger('summarizer');

const BATCH_SIZE = 10;
const PROFILE_ITEMS = 30;
const FALLBACK_LENGTH = 100;

const ProfileSchema = z.object({
    current_outlet: z.string().nullish(),
    reporter_bio: z.string().nullish(),
});

export function truncateHeadline(headline: string, max = FALLBACK_LENGTH): string {
    return headline.length > max ? headline.slice(0, max) : headline;
}

/** Map numbered lines ("3. text", "3) text") onto positions 0..count-1; unmatched positions stay undefined. */
export function parseNumberedSummaries(text: string, count: number): Array<string | undefined> {
    const out: Array<string | undefined> = Array.from({ length: count }, () => undefined);
    for (const line of text.split('\n')) {
        const m = line.trim().match(/^(\d+)\s*[.):\-]\s*(.+)$/);
        if (!m) continue;
        const idx = Number(m[1]) - 1;
        const summary = m[2].trim();
        if (idx >= 0 && idx < count && summary && out[idx] === undefined) out[idx] = summary;
    }
    return out;
}

/**
 * One-sentence summaries per headline, batched by 10. A failed batch, or a position the model skipped,
 * falls back to the truncated headline.
 */
export async function summarizeBatch(client: ChatClient, requests: SummaryRequest[]): Promise<GeneratedText[]> {
    const results: GeneratedText[] = [];
    for (let i = 0; i < requests.length; i += BATCH_SIZE) {
        const batch = requests.slice(i, i + BATCH_SIZE);
        let parsed: Array<string | undefined> = [];
        try {
            const headlines = batch.map((r, j) => `${j + 1}. [${r.outlet}] ${r.headline}`).join('\n');
            const prompt = 'Summarize each of these news article headlines in one concise sentence each.\n' +
                'Focus on what the article is about and what beat/topic it covers.\n' +
                'Write for a PR professional researching the reporter.\n\n' +
                `Headlines:\n${headlines}\n\n` +
                `Provide exactly ${batch.length} summaries, numbered to match the headlines above.\n` +
                'Keep each summary to one sentence, under 100 characters if possible.';
            parsed = parseNumberedSummaries(await client.complete(prompt, { maxTokens: 1024 }), batch.length);
        } catch (e) {
            logger.warn('summarizer.batch.fail', { size: batch.length, err: errorMessage(e) });
        }
        batch.forEach((r, j) => {
            const text = parsed[j];
            results.push(text ? { text, source: 'model' } : { text: truncateHeadline(r.headline), source: 'fallback' });
        });
    }
    return results;
}

/** Most common outlet, no bio. */
export function fallbackProfile(items: Pick<Item, 'outlet'>[]): Profile {
    return { affiliation: mostCommonOutlet(items), source: 'fallback' };
}

/**
 * Current outlet and a short prose bio from the most recent items.
 */
export async function generateProfile(client: ChatClient, name: string, items: Item[], titleHint?: string): Promise<Profile> {
    if (!items.length) return { source: 'fallback' };
    const lines = items.slice(0, PROFILE_ITEMS).map((a) => {
        const topics = a.topics.length ? ` | Topics: ${a.topics.join(', ')}` : '';
        return `- "${a.headline}" | ${a.outlet} | ${a.date}${topics}`;
    });
    const hint = titleHint ? `\nKnown title/role: ${titleHint}` : '';
    const prompt = `You are analyzing a journalist's recent article history for a PR professional.

Reporter: ${name}${hint}

Recent articles:
${lines.join('\n')}

Based on this data, provide two things:

1. CURRENT OUTLET: Determine the reporter's current primary outlet. Account for syndication: if the same articles appear across multiple papers in the same network, identify the reporter's home paper, not every syndication partner. Give just the outlet name.

2. BIO: Write a 2-3 sentence mini-bio describing what this reporter covers, as prose for a PR audience. No bullet points or lists. Focus on their beat, coverage areas, and notable patterns.

Respond in this exact JSON format:
{"current_outlet": "Outlet Name", "reporter_bio": "Two to three sentences about the reporter."}`;
    try {
        const data = ProfileSchema.parse(extractJson(await client.complete(prompt, { maxTokens: 512 })));
        return { affiliation: data.current_outlet || undefined, bio: data.reporter_bio || undefined, source: 'model' };
    } catch (e) {
        logger.warn('summarizer.profile.fail', { name, err: errorMessage(e) });
        return fallbackProfile(items);
    }
}

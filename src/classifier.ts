import { z } from 'zod';
import { extractJson, type ChatClient } from './llm.js';
import { createLogger, errorMessage } from './logger.js';
import type { Classification } from './types.js';

const logger = createLogger('classifier');

const MAX_SUMMARIES = 10;
const KEYWORD_THRESHOLD = 3;

const RELEVANCE_KEYWORDS = [
  'law', 'accounting', 'tax', 'consulting', 'm&a', 'audit',
  'compliance', 'advisory', 'cfo', 'legal', 'regulation',
  'finance', 'banking', 'private equity', 'venture capital',
  'restructuring', 'litigation', 'governance', 'fiduciary',
];

const VerdictSchema = z.object({ relevant: z.boolean(), rationale: z.string().default('') });

/** Counts distinct professional-services terms across summaries and outlets; three or more is relevant. */
export function classifyByKeywords(outlets: string[], summaries: string[]): Classification {
  const text = (summaries.join(' ') + ' ' + outlets.join(' ')).toLowerCase();
  const matches = RELEVANCE_KEYWORDS.filter((k) => text.includes(k)).length;
  if (matches >= KEYWORD_THRESHOLD) {
    return { relevant: true, rationale: 'Keyword-based classification: multiple professional services terms found in recent coverage.', source: 'fallback' };
  }
  return { relevant: false, rationale: 'Keyword-based classification: few professional services terms found in recent coverage.', source: 'fallback' };
}

export async function classifyWithLLM(client: ChatClient, name: string, outlets: string[], summaries: string[]): Promise<Classification | null> {
  const prompt = `You are classifying a journalist for a PR tool used by professional services firms (law, accounting, consulting, financial advisory).

Reporter: ${name}
Outlets: ${outlets.length ? outlets.join(', ') : 'Unknown'}

Recent article summaries:
${summaries.slice(0, MAX_SUMMARIES).map((s) => `- ${s}`).join('\n')}

Question: Is this reporter relevant to professional services firms? A relevant reporter covers topics like: legal industry, accounting/audit, tax policy, M&A/deals, management consulting, financial regulation, corporate governance, bankruptcy/restructuring, or business topics where professional services firms are key players.

If the reporter primarily covers sports, entertainment, lifestyle, weather, local crime, or other unrelated beats, mark them as not relevant.

Respond in this exact JSON format:
{"relevant": true, "rationale": "One sentence explaining why."}`;
  try {
    const content = await client.complete(prompt, { system: 'You classify journalists. Output JSON only.', maxTokens: 256 });
    const parsed = VerdictSchema.parse(extractJson(content));
    return { relevant: parsed.relevant, rationale: parsed.rationale, source: 'model' };
  } catch (e) {
    logger.warn('classifier.llm.fail', { name, err: errorMessage(e) });
    return null;
  }
}

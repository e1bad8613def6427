import { classifyByKeywords, classifyWithLLM } from './classifier.js';
import { ChatClient, type ChatOptions } from './llm.js';
import { generateProfile, summarizeBatch } from './summarizer.js';
import type { IntelligenceAdapter } from './types.js';

/** Text-intelligence adapter backed by a chat-completions model; every operation has a local fallback. */
export function createIntelligence(options: ChatOptions | ChatClient): IntelligenceAdapter {
    const client = options instanceof ChatClient ? options : new ChatClient(options);
    return {
        summarizeBatch: (requests) => summarizeBatch(client, requests),
        generateProfile: (name, items, titleHint) => generateProfile(client, name, items, titleHint),
        classify: async (name, outlets, summaries) =>
            (await classifyWithLLM(client, name, outlets, summaries)) ?? classifyByKeywords(outlets, summaries),
    };
}

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';

const CompletionSchema = z.object({
    choices: z.array(z.object({ message: z.object({ content: z.string().nullish() }) })).min(1),
});

export type ChatOptions = {
    apiKey: string;
    baseUrl: string;
    model: string;
    timeoutMs?: number;
    http?: AxiosInstance;
};

/** Minimal OpenAI-compatible chat-completions client. Failures throw; callers own the fallback. */
export class ChatClient {
    private readonly http: AxiosInstance;

    constructor(private readonly options: ChatOptions) {
        this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 20_000 });
    }

    async complete(prompt: string, opts: { system?: string; maxTokens?: number } = {}): Promise<string> {
        const messages = opts.system ? [{ role: 'system', content: opts.system }, { role: 'user', content: prompt }] : [{ role: 'user', content: prompt }];
        const resp = await this.http.post<unknown>(
            this.options.baseUrl + '/v1/chat/completions',
            { model: this.options.model, messages, temperature: 0.2, max_tokens: opts.maxTokens ?? 512 },
            { headers: { Authorization: 'Bearer ' + this.options.apiKey, 'Content-Type': 'application/json' } },
        );
        const content = CompletionSchema.parse(resp.data).choices[0].message.content;
        if (!content) throw new Error('empty completion');
        return content.trim();
    }
}

/** Pull the first JSON object out of a completion, tolerating code fences and surrounding prose. */
export function extractJson(content: string): unknown {
    const match = content.match(/\{[\s\S]*\}/);
    if (!match) throw new Error('no JSON object in completion');
    return JSON.parse(match[0]);
}

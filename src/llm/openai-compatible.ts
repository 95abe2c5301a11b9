import { z } from 'zod';
import type { LlmCompletionParams, LlmCompletionResult, LlmConfig, LlmProvider } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';

const chatCompletionSchema = z.object({
    model: z.string().optional(),
    choices: z
        .array(
            z.object({
                message: z.object({ content: z.string().nullable().optional() }),
            })
        )
        .min(1),
});

/**
 * Any chat-completions endpoint that speaks the OpenAI wire format
 * (DeepSeek, OpenAI, vLLM, Ollama's compatibility layer).
 */
export class OpenAiCompatibleProvider implements LlmProvider {
    readonly name = 'openai-compatible';

    constructor(
        private readonly settings: () => LlmConfig,
        private readonly http: HttpClient
    ) {}

    isConfigured(): boolean {
        const { apiUrl, apiKey } = this.settings();
        return Boolean(apiUrl?.trim() && apiKey?.trim());
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const config = this.settings();
        const apiUrl = config.apiUrl?.trim();
        const apiKey = config.apiKey?.trim();
        if (!apiUrl || !apiKey) {
            throw new Error('LLM endpoint is not configured');
        }

        const model = params.model ?? config.model;
        const response = await this.http.post(
            apiUrl,
            {
                model,
                messages: [{ role: 'user', content: prompt }],
                max_tokens: params.maxTokens ?? config.maxTokens,
            },
            {
                headers: { Authorization: `Bearer ${apiKey}` },
                timeout: config.timeoutMs,
                source: 'llm',
                retries: 0,
            }
        );

        const parsed = chatCompletionSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new Error(`Unexpected LLM response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
        }

        return {
            text: parsed.data.choices[0]?.message.content ?? '',
            model: parsed.data.model ?? model,
            provider: this.name,
        };
    }
}

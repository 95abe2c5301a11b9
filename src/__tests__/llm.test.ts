import { describe, it, expect, vi } from 'vitest';
import { LlmMetadataParser, parseMetadataReply } from '../llm/metadata-parser.js';
import { OpenAiCompatibleProvider } from '../llm/openai-compatible.js';
import { buildMetadataPrompt, METADATA_PROMPT } from '../llm/prompts.js';
import type { LlmConfig, LlmProvider } from '../types/index.js';
import { HttpClient, type FetchLike } from '../utils/http-client.js';
import { jsonResponse, testConfig } from './helpers.js';

function llmConfig(overrides: Partial<LlmConfig> = {}): LlmConfig {
    return {
        ...testConfig().llm,
        enabled: true,
        apiUrl: 'https://llm.example.com/v1/chat/completions',
        apiKey: 'test-secret',
        ...overrides,
    };
}

describe('parseMetadataReply', () => {
    it('should read labelled lines', () => {
        const reply = 'Title: Metadata Recovery From Noisy Scans\nAuthors: Alice Smith; Bob Jones\nVenue: Pattern Recognition\nYear: 2022';
        expect(parseMetadataReply(reply)).toEqual({
            title: 'Metadata Recovery From Noisy Scans',
            authors: 'Alice Smith; Bob Jones',
            venue: 'Pattern Recognition',
            year: 2022,
        });
    });

    it('should accept Chinese labels and full-width colons', () => {
        expect(parseMetadataReply('标题：文献元数据抽取\n作者：张三; 李四\n期刊：未知\n年份：2023')).toEqual({
            title: '文献元数据抽取',
            authors: '张三; 李四',
            year: 2023,
        });
    });

    it('should skip unknown values and malformed years', () => {
        expect(parseMetadataReply('Title: unknown\nYear: 20xx\nVenue: Unknown')).toBeUndefined();
    });
});

describe('buildMetadataPrompt', () => {
    it('should truncate the paper text', () => {
        expect(buildMetadataPrompt('abcdef', 3)).toBe(`${METADATA_PROMPT}\n\nPaper text:\nabc`);
    });
});

describe('OpenAiCompatibleProvider', () => {
    it('should post a chat completion and return the message', async () => {
        const fetchImpl = vi.fn<FetchLike>(async () =>
            jsonResponse({ model: 'served-model', choices: [{ message: { content: 'Title: X' } }] })
        );
        const provider = new OpenAiCompatibleProvider(() => llmConfig(), new HttpClient({ fetchImpl }));

        const result = await provider.complete('prompt', { model: 'test-model', maxTokens: 50 });

        expect(result).toEqual({ text: 'Title: X', model: 'served-model', provider: 'openai-compatible' });
        const init = fetchImpl.mock.calls[0]?.[1];
        expect(init?.body).toBe(
            '{"model":"test-model","messages":[{"role":"user","content":"prompt"}],"max_tokens":50}'
        );
        expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    });

    it('should reject an unexpected response shape', async () => {
        const provider = new OpenAiCompatibleProvider(
            () => llmConfig(),
            new HttpClient({ fetchImpl: async () => jsonResponse({ choices: [] }) })
        );
        await expect(provider.complete('prompt')).rejects.toThrow(/^Unexpected LLM response/);
    });

    it('should require an endpoint and key', async () => {
        const provider = new OpenAiCompatibleProvider(
            () => llmConfig({ apiKey: '  ' }),
            new HttpClient({ fetchImpl: vi.fn<FetchLike>() })
        );
        expect(provider.isConfigured()).toBe(false);
        await expect(provider.complete('prompt')).rejects.toThrow('LLM endpoint is not configured');
    });
});

describe('LlmMetadataParser', () => {
    function providerReplying(reply: string | Error): LlmProvider & { prompts: string[] } {
        const prompts: string[] = [];
        return {
            name: 'fake',
            prompts,
            isConfigured: () => true,
            complete: async (prompt) => {
                prompts.push(prompt);
                if (reply instanceof Error) throw reply;
                return { text: reply, model: 'fake-model', provider: 'fake' };
            },
        };
    }

    it('should stay silent when disabled', async () => {
        const provider = providerReplying('Title: X');
        const parser = new LlmMetadataParser(() => llmConfig({ enabled: false }), provider);

        expect(parser.isEnabled()).toBe(false);
        await expect(parser.parse('text')).resolves.toBeUndefined();
        expect(provider.prompts).toHaveLength(0);
    });

    it('should send the truncated text and parse the reply', async () => {
        const provider = providerReplying('Title: A Scanned Paper\nYear: 2020');
        const parser = new LlmMetadataParser(() => llmConfig({ maxInputChars: 4 }), provider);

        await expect(parser.parse('abcdefgh')).resolves.toEqual({ title: 'A Scanned Paper', year: 2020 });
        expect(provider.prompts).toEqual([buildMetadataPrompt('abcd', 4)]);
    });

    it('should swallow provider failures into undefined', async () => {
        const parser = new LlmMetadataParser(() => llmConfig(), providerReplying(new Error('HTTP 502')));
        await expect(parser.parse('text')).resolves.toBeUndefined();
    });
});

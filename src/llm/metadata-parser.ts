import type { ExtractedFields, LlmConfig, LlmProvider } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { buildMetadataPrompt } from './prompts.js';

type ReplyField = 'title' | 'authors' | 'venue' | 'year';

/** English labels as prompted; Chinese ones are what some models answer with */
const LABELS: ReadonlyArray<readonly [string, ReplyField]> = [
    ['title', 'title'],
    ['authors', 'authors'],
    ['venue', 'venue'],
    ['year', 'year'],
    ['标题', 'title'],
    ['作者', 'authors'],
    ['期刊', 'venue'],
    ['年份', 'year'],
];

const UNKNOWN = new Set(['unknown', '未知']);

export type LlmMetadata = Pick<ExtractedFields, ReplyField>;

/**
 * Read `Label: value` lines back into fields. Returns undefined when no line
 * carried a usable value.
 */
export function parseMetadataReply(reply: string): LlmMetadata | undefined {
    const result: LlmMetadata = {};

    for (const rawLine of reply.split('\n')) {
        const line = rawLine.trim();
        const match = /^([^:：]+)[:：](.*)$/.exec(line);
        if (!match) continue;

        const label = (match[1] ?? '').trim().toLowerCase();
        const value = (match[2] ?? '').trim();
        const field = LABELS.find(([name]) => name === label)?.[1];
        if (!field || !value || UNKNOWN.has(value.toLowerCase())) continue;

        if (field === 'year') {
            if (/^\d{4}$/.test(value)) result.year = Number(value);
        } else {
            result[field] = value;
        }
    }

    return Object.keys(result).length > 0 ? result : undefined;
}

/**
 * Language-model fallback for OCR text. Never throws: a disabled, unconfigured
 * or failing endpoint yields undefined.
 */
export class LlmMetadataParser {
    private readonly logger = getLogger();

    constructor(
        private readonly settings: () => LlmConfig,
        private readonly provider: LlmProvider
    ) {}

    isEnabled(): boolean {
        return this.settings().enabled;
    }

    async parse(text: string): Promise<LlmMetadata | undefined> {
        const config = this.settings();
        if (!config.enabled) return undefined;
        if (!this.provider.isConfigured()) {
            this.logger.warn('LLM API not configured');
            return undefined;
        }

        try {
            const { text: reply, model } = await this.provider.complete(
                buildMetadataPrompt(text, config.maxInputChars),
                { model: config.model, maxTokens: config.maxTokens }
            );
            this.logger.debug({ model, chars: reply.length }, 'LLM reply received');
            return parseMetadataReply(reply);
        } catch (error) {
            this.logger.warn(
                { provider: this.provider.name, error: error instanceof Error ? error.message : String(error) },
                'LLM request failed'
            );
            return undefined;
        }
    }
}

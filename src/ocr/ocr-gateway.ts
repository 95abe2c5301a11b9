import { z } from 'zod';
import type { DocumentLoader, OcrConfig } from '../types/index.js';
import { HttpError, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

/**
 * Every failure is reported in-band as text starting with this prefix.
 */
export const OCR_ERROR_PREFIX = '[OCR Error]';

export function isOcrError(text: string): boolean {
    return text.startsWith(OCR_ERROR_PREFIX);
}

/**
 * OCR as the pipeline sees it: never throws.
 */
export interface OcrService {
    isConfigured(): boolean;
    recognize(path: string, pageIndex?: number): Promise<string>;
}

const layoutParsingSchema = z.object({
    result: z.object({
        layoutParsingResults: z
            .array(
                z.object({
                    markdown: z.object({ text: z.string().optional() }).optional(),
                })
            )
            .optional(),
    }),
});

const serviceErrorSchema = z.object({ error: z.unknown() });

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Turn a layout-parsing response body into text or an error sentinel.
 * A well-formed response without any text yields an empty string.
 */
export function parseOcrResponse(data: unknown): string {
    const parsed = layoutParsingSchema.safeParse(data);
    if (parsed.success) {
        const texts = (parsed.data.result.layoutParsingResults ?? [])
            .map((item) => item.markdown?.text ?? '')
            .filter((text) => text.length > 0);
        return texts.join('\n\n');
    }

    const serviceError = serviceErrorSchema.safeParse(data);
    if (serviceError.success && serviceError.data.error !== undefined) {
        const { error } = serviceError.data;
        return `${OCR_ERROR_PREFIX} ${typeof error === 'string' ? error : JSON.stringify(error)}`;
    }

    return `${OCR_ERROR_PREFIX} Unexpected response: ${String(JSON.stringify(data)).slice(0, 300)}`;
}

/**
 * Client for a layout-parsing OCR service.
 *
 * PDF pages are rasterised to PNG before upload; image files are sent as-is.
 * Settings are read on every call so the endpoint can be reconfigured at runtime.
 */
export class OcrGateway implements OcrService {
    private readonly logger = getLogger();

    constructor(
        private readonly settings: () => OcrConfig,
        private readonly loader: DocumentLoader,
        private readonly http: HttpClient
    ) {}

    isConfigured(): boolean {
        const { url, key } = this.settings();
        return Boolean(url && key);
    }

    async recognize(path: string, pageIndex = 0): Promise<string> {
        const config = this.settings();
        if (!config.url || !config.key) {
            this.logger.warn('OCR service is not configured');
            return `${OCR_ERROR_PREFIX} OCR service is not configured`;
        }

        let image: Uint8Array;
        try {
            const doc = await this.loader.open(path);
            try {
                image = await doc.pageImage(pageIndex, config.renderScale);
            } finally {
                doc.close();
            }
        } catch (error) {
            this.logger.warn({ path, pageIndex, error: describe(error) }, 'Could not prepare page for OCR');
            return `${OCR_ERROR_PREFIX} ${describe(error)}`;
        }

        this.logger.info({ path, pageIndex, url: config.url }, 'Calling OCR service');

        try {
            const response = await this.http.post(
                config.url,
                { file: Buffer.from(image).toString('base64'), fileType: 1 },
                {
                    headers: { Authorization: `token ${config.key}` },
                    timeout: config.timeoutMs,
                    source: 'ocr',
                    retries: 0,
                }
            );
            const text = parseOcrResponse(response.data);
            this.logger.debug({ path, chars: text.length }, 'OCR response received');
            return text;
        } catch (error) {
            if (error instanceof HttpError && error.status > 0) {
                this.logger.warn({ path, status: error.status }, 'OCR service returned an error');
                return `${OCR_ERROR_PREFIX} HTTP ${error.status}: ${error.responseText().slice(0, 200)}`;
            }
            this.logger.warn({ path, error: describe(error) }, 'OCR request failed');
            return `${OCR_ERROR_PREFIX} ${describe(error)}`;
        }
    }
}

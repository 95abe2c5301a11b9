import { describe, it, expect, vi } from 'vitest';
import { isOcrError, OcrGateway, parseOcrResponse } from '../ocr/ocr-gateway.js';
import type { OcrConfig } from '../types/index.js';
import { HttpClient, type FetchLike } from '../utils/http-client.js';
import { FakeLoader, jsonResponse, textResponse } from './helpers.js';

function configured(): OcrConfig {
    return { url: 'https://ocr.example.com/layout-parsing', key: 'test-secret', timeoutMs: 1000, renderScale: 2 };
}

describe('parseOcrResponse', () => {
    it('should join markdown texts with a blank line', () => {
        const data = {
            result: {
                layoutParsingResults: [{ markdown: { text: 'Page one' } }, { markdown: {} }, { markdown: { text: 'More' } }],
            },
        };
        expect(parseOcrResponse(data)).toBe('Page one\n\nMore');
    });

    it('should return an empty string for a result without text', () => {
        expect(parseOcrResponse({ result: {} })).toBe('');
    });

    it('should report a service error', () => {
        expect(parseOcrResponse({ error: 'quota exceeded' })).toBe('[OCR Error] quota exceeded');
        expect(parseOcrResponse({ error: { code: 1 } })).toBe('[OCR Error] {"code":1}');
    });

    it('should report any other shape with the raw JSON', () => {
        expect(parseOcrResponse({ foo: 1 })).toBe('[OCR Error] Unexpected response: {"foo":1}');
    });
});

describe('isOcrError', () => {
    it('should detect the error prefix', () => {
        expect(isOcrError('[OCR Error] timeout')).toBe(true);
        expect(isOcrError('Regular text')).toBe(false);
    });
});

describe('OcrGateway', () => {
    function setup(fetchImpl: FetchLike, config: OcrConfig = configured()) {
        const loader = new FakeLoader({ '/papers/scan.pdf': { text: '' } });
        const gateway = new OcrGateway(() => config, loader, new HttpClient({ fetchImpl, backoffMs: 0 }));
        return { gateway, loader, config };
    }

    it('should refuse to run without endpoint and key', async () => {
        const fetchImpl = vi.fn<FetchLike>();
        const { gateway } = setup(fetchImpl, { timeoutMs: 1000, renderScale: 2 });

        expect(gateway.isConfigured()).toBe(false);
        await expect(gateway.recognize('/papers/scan.pdf')).resolves.toBe('[OCR Error] OCR service is not configured');
        expect(fetchImpl).not.toHaveBeenCalled();
    });

    it('should upload the rendered page and return the text', async () => {
        const fetchImpl = vi.fn<FetchLike>(async () =>
            jsonResponse({ result: { layoutParsingResults: [{ markdown: { text: 'Recognized' } }] } })
        );
        const { gateway, loader } = setup(fetchImpl);

        const text = await gateway.recognize('/papers/scan.pdf', 0);

        expect(text).toBe('Recognized');
        const init = fetchImpl.mock.calls[0]?.[1];
        expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://ocr.example.com/layout-parsing');
        expect(init?.body).toBe('{"file":"AQID","fileType":1}');
        expect(init?.headers).toMatchObject({ Authorization: 'token test-secret' });
        expect(loader.closed).toBe(1);
    });

    it('should turn an HTTP failure into error text without retrying', async () => {
        const fetchImpl = vi.fn<FetchLike>(async () => textResponse('down', 500));
        const { gateway } = setup(fetchImpl);

        await expect(gateway.recognize('/papers/scan.pdf')).resolves.toBe('[OCR Error] HTTP 500: down');
        expect(fetchImpl).toHaveBeenCalledTimes(1);
    });

    it('should turn an unreadable document into error text', async () => {
        const { gateway } = setup(vi.fn<FetchLike>());
        await expect(gateway.recognize('/papers/missing.pdf')).resolves.toBe(
            '[OCR Error] cannot open /papers/missing.pdf'
        );
    });

    it('should pick up configuration changes between calls', async () => {
        const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse({ result: { layoutParsingResults: [] } }));
        const config: OcrConfig = { timeoutMs: 1000, renderScale: 2 };
        const { gateway } = setup(fetchImpl, config);

        expect(isOcrError(await gateway.recognize('/papers/scan.pdf'))).toBe(true);
        config.url = 'https://ocr.example.com/layout-parsing';
        config.key = 'test-secret';

        await expect(gateway.recognize('/papers/scan.pdf')).resolves.toBe('');
        expect(fetchImpl).toHaveBeenCalledTimes(1);
    });
});

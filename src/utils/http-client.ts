import { fetch, type Dispatcher, type RequestInit, type Response } from 'undici';
import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Wait until a token is available
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        await sleep(waitMs);
        this.refill();
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

/**
 * Per-source rate limit configurations.
 */
const RATE_LIMITS: Record<string, { tokensPerSecond: number; maxBurst: number }> = {
    crossref: { tokensPerSecond: 10, maxBurst: 10 },  // polite pool with mailto
    openalex: { tokensPerSecond: 10, maxBurst: 10 },
    ocr: { tokensPerSecond: 2, maxBurst: 2 },
    llm: { tokensPerSecond: 5, maxBurst: 5 },
};
const DEFAULT_RATE_LIMIT = { tokensPerSecond: 5, maxBurst: 5 };

const MAX_BACKOFF_MS = 30000;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: unknown;
    timeout?: number;
    source?: string;  // For per-source rate limiting
    /** Overrides the client's retry count for this request */
    retries?: number;
}

/**
 * HTTP response wrapper. `data` is parsed JSON when the body is JSON, text otherwise.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    data: unknown;
    ok: boolean;
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;
    retries?: number;
    backoffMs?: number;
    dispatcher?: Dispatcher;
    fetchImpl?: FetchLike;
}

/**
 * HTTP error with classification.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }

    /**
     * Response body as text, for error messages.
     */
    responseText(): string {
        if (this.response === undefined) return '';
        return typeof this.response === 'string' ? this.response : JSON.stringify(this.response);
    }
}

/**
 * Centralized HTTP client with per-source rate limiting and retry logic.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly logger = getLogger();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly retries: number;
    private readonly backoffMs: number;
    private readonly dispatcher?: Dispatcher;
    private readonly fetchImpl: FetchLike;

    constructor(options: HttpClientOptions = {}) {
        this.defaultTimeout = options.timeout ?? 30000;
        const version = options.version ?? '1.0.0';
        const email = options.email ?? 'scholarscan@example.com';
        this.userAgent = `ScholarScan/${version} (mailto:${email})`;
        this.retries = options.retries ?? 2;
        this.backoffMs = options.backoffMs ?? 1000;
        this.dispatcher = options.dispatcher;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    /**
     * Make an HTTP request with rate limiting and retry.
     * Network errors, timeouts and 429/5xx responses are retried with exponential backoff.
     */
    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const {
            method = 'GET',
            headers = {},
            body,
            timeout = this.defaultTimeout,
            source = 'default',
            retries = this.retries,
        } = options;

        // Acquire rate limit token
        const bucket = this.getBucket(source);
        await bucket.acquire();

        // Track request count
        this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        let requestBody: string | undefined;
        if (body !== undefined) {
            if (typeof body === 'string') {
                requestBody = body;
            } else {
                requestBody = JSON.stringify(body);
                requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
            }
        }

        for (let attempt = 0; attempt <= retries; attempt++) {
            const outcome = await this.send(url, { method, headers: requestHeaders, body: requestBody }, timeout);

            if (outcome instanceof HttpError) {
                if (attempt < retries) {
                    const backoff = this.calculateBackoff(attempt);
                    this.logger.warn(
                        { reason: outcome.message, attempt: attempt + 1, backoffMs: backoff, url },
                        'Retryable network error, backing off'
                    );
                    await sleep(backoff);
                    continue;
                }
                throw outcome;
            }

            const { response, data } = outcome;

            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            if (!response.ok) {
                const retryable = RETRYABLE_STATUS_CODES.has(response.status);

                if (retryable && attempt < retries) {
                    const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
                    const backoff = Math.min(MAX_BACKOFF_MS, retryAfter ?? this.calculateBackoff(attempt));

                    this.logger.warn(
                        { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                        'Retryable HTTP error, backing off'
                    );
                    await sleep(backoff);
                    continue;
                }

                throw new HttpError(
                    `HTTP ${response.status}: ${response.statusText}`,
                    response.status,
                    retryable,
                    data
                );
            }

            return { status: response.status, headers: responseHeaders, data, ok: true };
        }

        throw new HttpError(`Max retries exceeded for ${url}`, 0, false);
    }

    /**
     * Convenience method for GET requests.
     */
    async get(url: string, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'GET' });
    }

    /**
     * Convenience method for POST requests.
     */
    async post(url: string, body: unknown, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'POST', body });
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    /**
     * Reset request counts.
     */
    resetCounts(): void {
        this.requestCounts.clear();
    }

    /**
     * One attempt. Transport failures come back as a retryable HttpError with status 0.
     */
    private async send(
        url: string,
        init: { method: string; headers: Record<string, string>; body?: string },
        timeout: number
    ): Promise<{ response: Response; data: unknown } | HttpError> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
            const response = await this.fetchImpl(url, {
                ...init,
                signal: controller.signal,
                dispatcher: this.dispatcher,
            });
            const data = await readBody(response);
            return { response, data };
        } catch (error) {
            if (controller.signal.aborted) {
                return new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
            }
            return new HttpError(
                `Network error: ${error instanceof Error ? error.message : String(error)}`,
                0,
                true
            );
        } finally {
            clearTimeout(timeoutId);
        }
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = RATE_LIMITS[source] ?? DEFAULT_RATE_LIMIT;
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }

    private parseRetryAfter(header: string | null): number | null {
        if (!header) return null;

        // Try parsing as seconds
        const seconds = parseInt(header, 10);
        if (!isNaN(seconds)) return seconds * 1000;

        // Try parsing as HTTP date
        const date = new Date(header);
        if (!isNaN(date.getTime())) {
            return Math.max(0, date.getTime() - Date.now());
        }

        return null;
    }

    private calculateBackoff(attempt: number): number {
        // 1x, 2x, 4x ... of the base delay
        return Math.min(MAX_BACKOFF_MS, this.backoffMs * Math.pow(2, attempt));
    }
}

/**
 * Parse JSON bodies; anything else, including malformed JSON, stays text.
 */
async function readBody(response: Response): Promise<unknown> {
    const text = await response.text();
    const contentType = response.headers.get('content-type') ?? '';
    if (!contentType.includes('json') || text.length === 0) return text;

    try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
    } catch {
        return text;
    }
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create a new HTTP client.
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Proxy schemes the HTTP dispatcher can tunnel through.
 */
export type ProxyType = 'http' | 'https';

/**
 * Outbound proxy used for catalog, OCR and LLM requests.
 */
export interface ProxyConfig {
    enabled: boolean;
    type: ProxyType;
    host: string;
    port: number;
}

/**
 * Layout-parsing OCR service. Both `url` and `key` are required for OCR to run.
 */
export interface OcrConfig {
    url?: string;
    key?: string;
    timeoutMs: number;
    /** Rasterisation scale for PDF pages sent to the service */
    renderScale: number;
}

/**
 * OpenAI-compatible chat-completions endpoint used as a metadata fallback on OCR text.
 */
export interface LlmConfig {
    enabled: boolean;
    apiUrl?: string;
    apiKey?: string;
    model: string;
    maxTokens: number;
    /** Input text is truncated to this many characters */
    maxInputChars: number;
    timeoutMs: number;
}

/**
 * Crossref / OpenAlex access.
 */
export interface CatalogConfig {
    crossrefUrl: string;
    openalexUrl: string;
    /** Sent as `mailto` and in the User-Agent */
    contactEmail: string;
    timeoutMs: number;
    retries: number;
    backoffMs: number;
    maxCandidates: number;
}

/**
 * Decision thresholds for the scan state machine.
 */
export interface ThresholdConfig {
    /** Resolver score at or above which a candidate is accepted */
    acceptConfidence: number;
    /** Papers with less extracted text than this go to needs_ocr */
    minTextLength: number;
    /** Certificate PDFs with less text-layer content than this are OCR'd */
    certificateMinTextLength: number;
    /** Missing certificate fields that trigger the OCR remedy */
    ocrRemedyMissingFields: number;
    /** Pages read from a paper's text layer */
    maxPages: number;
    /** Pages read from a certificate's text layer */
    certificatePages: number;
}

/**
 * Directory traversal settings.
 */
export interface ScanConfig {
    extensions: string[];
    /** Folders relative to the scan root that are never entered */
    excludedFolders: string[];
    /** File-name fragments that route a PDF to the certificate flow */
    certificateKeywords: string[];
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface PipelineConfig {
    /** SQLite database path */
    db: string;

    logLevel: LogLevel;
    jsonLogs: boolean;

    scan: ScanConfig;
    thresholds: ThresholdConfig;
    catalog: CatalogConfig;
    ocr: OcrConfig;
    llm: LlmConfig;
    proxy: ProxyConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: PipelineConfig = {
    db: './scholarscan.db',
    logLevel: 'info',
    jsonLogs: false,
    scan: {
        extensions: ['.pdf', '.png', '.jpg', '.jpeg', '.bmp', '.tiff'],
        excludedFolders: [],
        certificateKeywords: ['专利', '软著', '证书', 'certificate', 'patent'],
    },
    thresholds: {
        acceptConfidence: 80,
        minTextLength: 200,
        certificateMinTextLength: 100,
        ocrRemedyMissingFields: 4,
        maxPages: 5,
        certificatePages: 2,
    },
    catalog: {
        crossrefUrl: 'https://api.crossref.org/works',
        openalexUrl: 'https://api.openalex.org/works',
        contactEmail: 'scholarscan@example.com',
        timeoutMs: 10000,
        retries: 2,
        backoffMs: 1000,
        maxCandidates: 5,
    },
    ocr: {
        timeoutMs: 60000,
        renderScale: 2,
    },
    llm: {
        enabled: false,
        model: 'deepseek-chat',
        maxTokens: 500,
        maxInputChars: 3000,
        timeoutMs: 60000,
    },
    proxy: {
        enabled: false,
        type: 'http',
        host: '127.0.0.1',
        port: 1080,
    },
};

import { BibliographicClient } from './catalog/bibliographic-client.js';
import { CrossrefAdapter } from './catalog/crossref.js';
import { OpenAlexAdapter } from './catalog/openalex.js';
import { FileDocumentLoader } from './documents/document-loader.js';
import { CertificateExtractor } from './extract/certificate-extractor.js';
import { ExtractionEngine } from './extract/extraction-engine.js';
import { LlmMetadataParser } from './llm/metadata-parser.js';
import { OpenAiCompatibleProvider } from './llm/openai-compatible.js';
import { OcrGateway } from './ocr/ocr-gateway.js';
import { BibliographicResolver } from './resolve/resolver.js';
import { ScanOrchestrator } from './scan/scan-orchestrator.js';
import { LibraryDatabase } from './storage/database.js';
import type { DocumentLoader, PipelineConfig } from './types/index.js';
import { createHttpClient, type FetchLike, type HttpClient } from './utils/http-client.js';
import { createProxyDispatcher } from './utils/proxy.js';

export const VERSION = '1.0.0';

export interface ServiceOverrides {
    fetchImpl?: FetchLike;
    loader?: DocumentLoader;
}

/**
 * Everything that reads files or talks to remote services. No database.
 */
export interface Services {
    config: PipelineConfig;
    http: HttpClient;
    loader: DocumentLoader;
    ocr: OcrGateway;
    llm: LlmMetadataParser;
    catalogs: BibliographicClient;
    resolver: BibliographicResolver;
    extraction: ExtractionEngine;
    certificates: CertificateExtractor;
}

export interface Pipeline extends Services {
    store: LibraryDatabase;
    orchestrator: ScanOrchestrator;
    close(): void;
}

/**
 * Wire the components for one configuration. OCR and LLM settings are read
 * through getters on `config`, so changing those sections takes effect on
 * the next call.
 */
export function createServices(config: PipelineConfig, overrides: ServiceOverrides = {}): Services {
    const http = createHttpClient({
        timeout: config.catalog.timeoutMs,
        version: VERSION,
        email: config.catalog.contactEmail,
        retries: config.catalog.retries,
        backoffMs: config.catalog.backoffMs,
        dispatcher: createProxyDispatcher(config.proxy),
        fetchImpl: overrides.fetchImpl,
    });

    const loader = overrides.loader ?? new FileDocumentLoader();
    const ocr = new OcrGateway(() => config.ocr, loader, http);
    const llm = new LlmMetadataParser(() => config.llm, new OpenAiCompatibleProvider(() => config.llm, http));

    const crossref = new CrossrefAdapter(http, config.catalog);
    const openalex = new OpenAlexAdapter(http, config.catalog);
    const catalogs = new BibliographicClient(crossref, [crossref, openalex], config.catalog.maxCandidates);
    const resolver = new BibliographicResolver(catalogs, config.thresholds.acceptConfidence);

    return {
        config,
        http,
        loader,
        ocr,
        llm,
        catalogs,
        resolver,
        extraction: new ExtractionEngine(loader, ocr, config.thresholds, llm),
        certificates: new CertificateExtractor(loader, ocr, config.thresholds),
    };
}

/**
 * Services plus the SQLite store and the scan orchestrator.
 */
export function createPipeline(config: PipelineConfig, overrides: ServiceOverrides = {}): Pipeline {
    const services = createServices(config, overrides);
    const store = new LibraryDatabase(config.db);
    const orchestrator = new ScanOrchestrator(
        {
            store,
            extraction: services.extraction,
            certificates: services.certificates,
            resolver: services.resolver,
        },
        config
    );

    return {
        ...services,
        store,
        orchestrator,
        close: () => store.close(),
    };
}

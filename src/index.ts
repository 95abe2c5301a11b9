/**
 * Library entry point. The CLI lives in ./cli/index.ts.
 */
export * from './types/index.js';
export { createPipeline, createServices, VERSION } from './pipeline.js';
export type { Pipeline, Services, ServiceOverrides } from './pipeline.js';

export { ScanOrchestrator } from './scan/scan-orchestrator.js';
export type { ScanDependencies } from './scan/scan-orchestrator.js';
export { decidePaperStatus } from './scan/status.js';
export { listFiles, describeFile, computeSha256, isCertificateCandidate } from './scan/file-source.js';

export { ExtractionEngine } from './extract/extraction-engine.js';
export { CertificateExtractor } from './extract/certificate-extractor.js';
export {
    extractDoi,
    extractYear,
    extractTitle,
    extractAuthors,
    extractVenue,
    extractTitleFromOcr,
    extractAuthorsFromOcr,
    extractEmails,
} from './extract/patterns.js';
export {
    classifyCertificate,
    extractPatentFields,
    extractSoftwareFields,
    normalizePatentNumber,
    validatePatentNumber,
} from './extract/certificate-patterns.js';
export { correctOcrText } from './extract/text.js';

export { BibliographicResolver } from './resolve/resolver.js';
export { scoreCandidate, titleSimilarity } from './resolve/scoring.js';
export { detectEntryType, detectPublicationType } from './resolve/publication-type.js';

export { BibliographicClient } from './catalog/bibliographic-client.js';
export { CrossrefAdapter } from './catalog/crossref.js';
export { OpenAlexAdapter } from './catalog/openalex.js';

export { OcrGateway, OCR_ERROR_PREFIX, isOcrError, parseOcrResponse } from './ocr/ocr-gateway.js';
export type { OcrService } from './ocr/ocr-gateway.js';
export { LlmMetadataParser, parseMetadataReply } from './llm/metadata-parser.js';
export { OpenAiCompatibleProvider } from './llm/openai-compatible.js';

export { FileDocumentLoader } from './documents/document-loader.js';
export { LibraryDatabase } from './storage/database.js';
export type { LibraryStats } from './storage/database.js';

export { resolveConfig, ConfigError } from './utils/config.js';
export { HttpClient, HttpError, createHttpClient } from './utils/http-client.js';
export { initLogger, getLogger } from './utils/logger.js';

/**
 * Barrel export for all shared types.
 */
export type {
    ExtractedFields,
    ExtractionResult,
    TextOrigin,
    ProcessingStatus,
    ResolutionSource,
    CandidateRecord,
    ResolutionResult,
} from './fields.js';
export type {
    PatentType,
    PatentFields,
    SoftwareFields,
    CertificateKind,
    ExtractionMethod,
    PatentCertificate,
    SoftwareCertificate,
    UnclassifiedCertificate,
    CertificateResult,
    PatentNumberValidation,
} from './certificate.js';
export type { DocumentFormat, DocumentInfo, RawDocument, DocumentLoader } from './document.js';
export type {
    FileDescriptor,
    StoredFile,
    EntryType,
    PublicationType,
    PaperSource,
    PaperRecord,
    PatentRecord,
    SoftwareRecord,
    RecordStore,
} from './record-store.js';
export type { ScanOutcomeKind, ScanState, ScanProgress, ScanOutcome } from './scan.js';
export type { BibliographicQuery, CatalogAdapter, BibliographicSource } from './catalog.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    PipelineConfig,
    LogLevel,
    ProxyType,
    ProxyConfig,
    OcrConfig,
    LlmConfig,
    CatalogConfig,
    ThresholdConfig,
    ScanConfig,
} from './config.js';
export type { LlmProvider, LlmCompletionParams, LlmCompletionResult } from './llm-provider.js';

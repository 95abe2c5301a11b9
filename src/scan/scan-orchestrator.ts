import path from 'node:path';
import type {
    ExtractionResult,
    FileDescriptor,
    PaperRecord,
    PipelineConfig,
    RecordStore,
    ResolutionResult,
    ScanOutcome,
    ScanProgress,
    StoredFile,
} from '../types/index.js';
import type { CertificateExtractor } from '../extract/certificate-extractor.js';
import type { ExtractionEngine } from '../extract/extraction-engine.js';
import { detectEntryType, detectPublicationType } from '../resolve/publication-type.js';
import type { BibliographicResolver } from '../resolve/resolver.js';
import { getLogger } from '../utils/logger.js';
import { describeFile, isCertificateCandidate, listFiles } from './file-source.js';
import { decidePaperStatus } from './status.js';

const MAX_ERROR_LENGTH = 500;

export interface ScanDependencies {
    store: RecordStore;
    extraction: ExtractionEngine;
    certificates: CertificateExtractor;
    resolver: BibliographicResolver;
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Sequential per-file state machine over a directory tree.
 *
 * Every paper file ends a pass in exactly one terminal status; an exception
 * in one file marks that file `failed` and the pass moves on. All writes for
 * a file happen in one store transaction, after extraction and resolution.
 */
export class ScanOrchestrator {
    private readonly logger = getLogger();

    constructor(
        private readonly deps: ScanDependencies,
        private readonly config: PipelineConfig
    ) {}

    /**
     * Walk `root`, yielding progress after each file. Cancellation is checked
     * between files. The return value lists the outcome of every processed file.
     */
    async *scan(root: string, signal?: AbortSignal): AsyncGenerator<ScanProgress, ScanOutcome[], void> {
        const files = await listFiles(root, this.config.scan);
        const total = files.length;
        const outcomes: ScanOutcome[] = [];

        for (const [i, filePath] of files.entries()) {
            if (signal?.aborted) {
                this.logger.info({ processed: i, total }, 'Scan cancelled');
                break;
            }

            const outcome = await this.processFile(root, filePath);
            outcomes.push(outcome);
            yield {
                index: i + 1,
                total,
                path: outcome.path,
                message: progressMessage(outcome),
                state: outcome.state,
            };
        }

        this.logger.info(
            { total, updated: outcomes.filter((outcome) => outcome.state === 'done').length },
            'Scan finished'
        );
        return outcomes;
    }

    /**
     * Route one file to the paper or certificate flow.
     */
    async processFile(root: string, filePath: string): Promise<ScanOutcome> {
        const certificate = isCertificateCandidate(filePath, this.config.scan.certificateKeywords);

        let file: FileDescriptor;
        try {
            file = await describeFile(root, filePath);
        } catch (error) {
            this.logger.error({ path: filePath, error: describe(error) }, 'Failed to read file');
            return {
                path: filePath,
                kind: certificate ? 'certificate' : 'paper',
                state: 'failed',
                error: describe(error).slice(0, MAX_ERROR_LENGTH),
            };
        }

        return certificate ? this.processCertificate(file) : this.processPaper(file);
    }

    /**
     * Skips files whose content is unchanged and already linked to a paper.
     */
    async processPaper(file: FileDescriptor): Promise<ScanOutcome> {
        const { store } = this.deps;
        const existing = store.getFileByPath(file.relPath);
        if (existing && existing.sha256 === file.sha256 && store.isFileLinked(existing.id)) {
            this.logger.debug({ path: file.relPath }, 'Skip unchanged');
            return { path: file.relPath, kind: 'paper', state: 'skipped', status: existing.status };
        }

        try {
            const extraction = await this.deps.extraction.extract(file.path);
            const resolution = extraction.needsOcr ? undefined : await this.deps.resolver.resolve(extraction.fields);
            return this.persistPaper(file, extraction, resolution);
        } catch (error) {
            return this.markFailed(file, error);
        }
    }

    /**
     * Second attempt at a paper through OCR of its first page. A resolved result
     * updates the linked paper in place; without one only the file status changes.
     */
    async remedyWithOcr(file: FileDescriptor): Promise<ScanOutcome> {
        try {
            const extraction = await this.deps.extraction.extractWithOcr(file.path);
            const resolution = extraction.needsOcr ? undefined : await this.deps.resolver.resolve(extraction.fields);
            return this.persistPaper(file, extraction, resolution);
        } catch (error) {
            return this.markFailed(file, error);
        }
    }

    /**
     * OCR every paper left in `needs_ocr` under `root`, yielding progress like
     * `scan`. A file that can no longer be read fails on its own.
     */
    async *remedyPending(root: string, signal?: AbortSignal): AsyncGenerator<ScanProgress, ScanOutcome[], void> {
        const pending = this.deps.store.getFilesByStatus('needs_ocr');
        const total = pending.length;
        const outcomes: ScanOutcome[] = [];

        for (const [i, stored] of pending.entries()) {
            if (signal?.aborted) {
                this.logger.info({ processed: i, total }, 'OCR remedy cancelled');
                break;
            }

            const outcome = await this.remedyStored(root, stored);
            outcomes.push(outcome);
            yield {
                index: i + 1,
                total,
                path: outcome.path,
                message: progressMessage(outcome),
                state: outcome.state,
            };
        }

        this.logger.info(
            { total, resolved: outcomes.filter((outcome) => outcome.status === 'success').length },
            'OCR remedy finished'
        );
        return outcomes;
    }

    /**
     * Skips files already linked to a patent or software record. Files that
     * match neither type are not recorded, so later passes retry them.
     */
    async processCertificate(file: FileDescriptor): Promise<ScanOutcome> {
        const { store } = this.deps;
        if (store.isCertificateLinked(file.relPath)) {
            this.logger.debug({ path: file.relPath }, 'Skip already linked certificate');
            return { path: file.relPath, kind: 'certificate', state: 'skipped' };
        }

        try {
            return await this.recordCertificate(file);
        } catch (error) {
            this.logger.error({ path: file.relPath, error: describe(error) }, 'Failed to process certificate');
            return {
                path: file.relPath,
                kind: 'certificate',
                state: 'failed',
                error: describe(error).slice(0, MAX_ERROR_LENGTH),
            };
        }
    }

    // ─── Private helpers ──────────────────────────────────────

    private async remedyStored(root: string, stored: StoredFile): Promise<ScanOutcome> {
        let file: FileDescriptor;
        try {
            file = await describeFile(root, path.join(root, stored.path));
        } catch (error) {
            const message = describe(error).slice(0, MAX_ERROR_LENGTH);
            this.logger.error({ path: stored.path, error: message }, 'Failed to read file');
            this.recordFailure(stored.path, () => {
                this.deps.store.setStatus(stored.id, 'failed', message);
                return stored.id;
            });
            return { path: stored.path, kind: 'paper', state: 'failed', status: 'failed', error: message };
        }
        return this.remedyWithOcr(file);
    }

    private async recordCertificate(file: FileDescriptor): Promise<ScanOutcome> {
        const { store } = this.deps;
        const result = await this.deps.certificates.extract(file.path);

        if (result.kind === 'patent') {
            const { fields, complete } = result;
            const recordId = store.transaction(() =>
                store.upsertPatent({
                    ...fields,
                    title: fields.title ?? file.filename,
                    filePath: file.relPath,
                    needsReview: !complete,
                })
            );
            this.logger.info({ path: file.relPath, recordId, complete }, 'Added patent');
            return { path: file.relPath, kind: 'patent', state: 'done', recordId };
        }

        if (result.kind === 'software') {
            const { fields, complete } = result;
            const recordId = store.transaction(() =>
                store.upsertSoftware({
                    ...fields,
                    title: fields.softwareName ?? file.filename,
                    filePath: file.relPath,
                    needsReview: !complete,
                })
            );
            this.logger.info({ path: file.relPath, recordId, complete }, 'Added software copyright');
            return { path: file.relPath, kind: 'software', state: 'done', recordId };
        }

        this.logger.info({ path: file.relPath }, 'No certificate detected');
        return { path: file.relPath, kind: 'unclassified', state: 'done' };
    }

    private persistPaper(
        file: FileDescriptor,
        extraction: ExtractionResult,
        resolution: ResolutionResult | undefined
    ): ScanOutcome {
        const { store } = this.deps;
        const paper = this.buildPaper(file, extraction, resolution);
        const status = decidePaperStatus(
            { needsOcr: resolution === undefined, confidence: paper.confidence },
            this.config.thresholds.acceptConfidence
        );
        const error = resolution === undefined
            ? extraction.origin === 'ocr' ? 'OCR produced no text' : 'Text too short'
            : undefined;

        const recordId = store.transaction(() => {
            const existing = store.getFileByPath(file.relPath);
            const existingPaperId = existing ? store.getLinkedPaperId(existing.id) : undefined;
            const fileId = store.upsertFile(file, 'pending');

            // Unresolved text leaves an already linked paper as earlier passes recorded it
            if (resolution === undefined && existingPaperId !== undefined) {
                store.setStatus(fileId, status, error);
                return existingPaperId;
            }

            const paperId = store.upsertPaper(paper, existingPaperId);
            if (existingPaperId !== undefined && paperId !== existingPaperId) {
                store.unlinkFile(fileId);
            }
            store.linkPaperFile(paperId, fileId);
            store.setStatus(fileId, status, error);
            return paperId;
        });

        this.logger.info(
            { path: file.relPath, status, confidence: paper.confidence, doi: paper.doi, source: paper.source },
            'Added paper'
        );
        return { path: file.relPath, kind: 'paper', state: 'done', status, recordId, confidence: paper.confidence };
    }

    private buildPaper(
        file: FileDescriptor,
        extraction: ExtractionResult,
        resolution: ResolutionResult | undefined
    ): PaperRecord {
        if (!resolution) {
            return {
                ...extraction.fields,
                title: extraction.fields.title ?? file.filename,
                entryType: 'article',
                publicationType: 'other',
                confidence: 0,
                source: extraction.origin,
            };
        }

        const { merged } = resolution;
        return {
            ...merged,
            title: merged.title ?? file.filename,
            entryType: detectEntryType(merged.venue),
            publicationType: detectPublicationType(merged.venue),
            confidence: resolution.confidence,
            source: resolution.source,
        };
    }

    /**
     * The file row records the failure and loses any paper link.
     */
    private markFailed(file: FileDescriptor, error: unknown): ScanOutcome {
        const message = describe(error).slice(0, MAX_ERROR_LENGTH);
        this.logger.error({ path: file.relPath, error: message }, 'Failed to process paper');

        this.recordFailure(file.relPath, () => this.deps.store.upsertFile(file, 'failed', message));
        return { path: file.relPath, kind: 'paper', state: 'failed', status: 'failed', error: message };
    }

    private recordFailure(relPath: string, markFile: () => number): void {
        const { store } = this.deps;
        try {
            store.transaction(() => {
                store.unlinkFile(markFile());
            });
        } catch (storeError) {
            this.logger.error({ path: relPath, error: describe(storeError) }, 'Could not record failure');
        }
    }
}

function progressMessage(outcome: ScanOutcome): string {
    if (outcome.state === 'skipped') return `Skipped ${outcome.path}`;
    if (outcome.state === 'failed') return `Failed ${outcome.path}: ${outcome.error ?? 'unknown error'}`;
    if (outcome.kind === 'paper') return `Scanned ${outcome.path} (${outcome.status ?? 'pending'})`;
    return `Scanned ${outcome.path} (${outcome.kind})`;
}

import type { DocumentLoader, ExtractedFields, ExtractionResult, ThresholdConfig } from '../types/index.js';
import type { LlmMetadataParser } from '../llm/metadata-parser.js';
import { isOcrError, type OcrService } from '../ocr/ocr-gateway.js';
import { getLogger } from '../utils/logger.js';
import {
    extractAuthors,
    extractAuthorsFromOcr,
    extractDoi,
    extractTitle,
    extractTitleFromOcr,
    extractVenue,
    extractYear,
} from './patterns.js';
import { correctOcrText } from './text.js';

/**
 * Best-effort bibliographic fields for one paper, from the PDF text layer or
 * from OCR of its first page.
 */
export class ExtractionEngine {
    private readonly logger = getLogger();

    constructor(
        private readonly loader: DocumentLoader,
        private readonly ocr: OcrService,
        private readonly thresholds: ThresholdConfig,
        private readonly llm?: LlmMetadataParser
    ) {}

    /**
     * Document info wins over text heuristics for title and authors.
     * Throws when the file cannot be opened or read.
     */
    async extract(path: string): Promise<ExtractionResult> {
        const doc = await this.loader.open(path);
        try {
            const rawText = await doc.text(this.thresholds.maxPages);
            const charCount = rawText.trim().length;

            const title = doc.info.title ?? doc.info.subject ?? extractTitle(rawText);
            const fields: ExtractedFields = {
                title,
                authors: doc.info.author ?? extractAuthors(rawText, title),
                year: extractYear(rawText),
                venue: extractVenue(rawText),
                doi: extractDoi(rawText),
            };

            const needsOcr = charCount < this.thresholds.minTextLength;
            this.logger.debug({ path, pages: doc.pageCount, chars: charCount, needsOcr }, 'Extracted text layer');

            return { fields, rawText, pageCount: doc.pageCount, charCount, needsOcr, origin: 'pdf' };
        } finally {
            doc.close();
        }
    }

    /**
     * OCR the first page and read fields from the result. An OCR failure counts
     * as no text. With the language model enabled it supplies title, authors,
     * venue and year; DOI and year patterns still run on the OCR text.
     */
    async extractWithOcr(path: string): Promise<ExtractionResult> {
        const recognized = await this.ocr.recognize(path, 0);
        if (isOcrError(recognized)) {
            this.logger.warn({ path, reason: recognized }, 'OCR produced no text');
        }
        const rawText = isOcrError(recognized) ? '' : correctOcrText(recognized);
        const charCount = rawText.trim().length;

        let fields: ExtractedFields = {};
        if (charCount > 0) {
            const parsed = this.llm?.isEnabled() ? await this.llm.parse(rawText) : undefined;
            fields = {
                title: parsed ? parsed.title : extractTitleFromOcr(rawText),
                authors: parsed ? parsed.authors : extractAuthorsFromOcr(rawText),
                venue: parsed ? parsed.venue : extractVenue(rawText),
                year: parsed?.year ?? extractYear(rawText),
                doi: extractDoi(rawText),
            };
            this.logger.debug({ path, chars: charCount, viaLlm: parsed !== undefined }, 'Extracted OCR text');
        }

        // OCR covers the first page only
        return { fields, rawText, pageCount: 1, charCount, needsOcr: charCount === 0, origin: 'ocr' };
    }
}

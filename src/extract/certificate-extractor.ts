import type {
    CertificateResult,
    DocumentLoader,
    ExtractionMethod,
    PatentFields,
    SoftwareFields,
    ThresholdConfig,
} from '../types/index.js';
import { detectFormat } from '../documents/document-loader.js';
import { isOcrError, type OcrService } from '../ocr/ocr-gateway.js';
import { getLogger } from '../utils/logger.js';
import {
    PATENT_REMEDY_FIELDS,
    SOFTWARE_REMEDY_FIELDS,
    classifyCertificate,
    countMissing,
    extractPatentFields,
    extractSoftwareFields,
    isPatentComplete,
    isSoftwareComplete,
} from './certificate-patterns.js';

interface AcquiredText {
    text: string;
    method: ExtractionMethod;
    /** OCR already ran for this file; the remedy does not call it again */
    ocrAttempted: boolean;
}

/**
 * Fill keys that are empty in `fields` from `extra`. Returns the keys filled.
 */
function fillMissing<T extends object>(fields: T, extra: T, keys: ReadonlyArray<keyof T>): Array<keyof T> {
    const filled: Array<keyof T> = [];
    for (const key of keys) {
        if (!fields[key] && extra[key]) {
            fields[key] = extra[key];
            filled.push(key);
        }
    }
    return filled;
}

/**
 * Reads patent and software-copyright certificates.
 *
 * Text comes from the PDF text layer when there is enough of it, otherwise
 * from OCR. When a PDF text layer leaves too many fields empty, page 0 is
 * OCR'd once and only the empty fields are filled from it.
 */
export class CertificateExtractor {
    private readonly logger = getLogger();

    constructor(
        private readonly loader: DocumentLoader,
        private readonly ocr: OcrService,
        private readonly thresholds: ThresholdConfig
    ) {}

    async extract(path: string): Promise<CertificateResult> {
        const acquired = await this.acquireText(path);
        const { text } = acquired;
        const kind = classifyCertificate(text);

        if (kind === 'patent') {
            const fields = extractPatentFields(text);
            const method = await this.remedy(path, acquired, fields, PATENT_REMEDY_FIELDS, extractPatentFields);
            this.logger.info(
                { path, patentNumber: fields.patentNumber, title: fields.title?.slice(0, 30), method },
                'Extracted patent'
            );
            return { kind, fields, complete: isPatentComplete(fields), method, rawText: text };
        }

        if (kind === 'software') {
            const fields = extractSoftwareFields(text);
            const method = await this.remedy(path, acquired, fields, SOFTWARE_REMEDY_FIELDS, extractSoftwareFields);
            this.logger.info(
                { path, registrationNumber: fields.registrationNumber, name: fields.softwareName?.slice(0, 30), method },
                'Extracted software copyright'
            );
            return { kind, fields, complete: isSoftwareComplete(fields), method, rawText: text };
        }

        this.logger.info({ path, preview: text.slice(0, 200) }, 'No certificate detected');
        return { kind, method: acquired.method, rawText: text };
    }

    private async acquireText(path: string): Promise<AcquiredText> {
        const format = detectFormat(path);

        if (format === 'image') {
            return { text: await this.recognize(path), method: 'ocr', ocrAttempted: true };
        }

        const doc = await this.loader.open(path);
        let text: string;
        try {
            text = await doc.text(format === 'pdf' ? this.thresholds.certificatePages : 1);
        } finally {
            doc.close();
        }

        if (format !== 'pdf') {
            return { text, method: 'text_file', ocrAttempted: false };
        }

        this.logger.debug({ path, chars: text.length }, 'PDF text layer read');
        if (text.trim().length >= this.thresholds.certificateMinTextLength) {
            return { text, method: 'pdf_text', ocrAttempted: false };
        }

        this.logger.info({ path }, 'PDF text too short, trying OCR');
        const recognized = await this.recognize(path);
        if (recognized.trim()) {
            return { text: recognized, method: 'ocr', ocrAttempted: true };
        }
        return { text, method: 'pdf_text', ocrAttempted: true };
    }

    /**
     * OCR text of page 0, or an empty string when OCR failed.
     */
    private async recognize(path: string): Promise<string> {
        const text = await this.ocr.recognize(path, 0);
        if (isOcrError(text)) {
            this.logger.warn({ path, reason: text }, 'OCR failed');
            return '';
        }
        return text;
    }

    private async remedy<T extends PatentFields | SoftwareFields>(
        path: string,
        acquired: AcquiredText,
        fields: T,
        keys: ReadonlyArray<keyof T>,
        reextract: (text: string) => T
    ): Promise<ExtractionMethod> {
        const missing = countMissing(fields, keys);
        if (missing < this.thresholds.ocrRemedyMissingFields || acquired.method !== 'pdf_text' || acquired.ocrAttempted) {
            return acquired.method;
        }

        this.logger.info({ path, missing }, 'Certificate incomplete, trying OCR');
        const recognized = await this.recognize(path);
        if (!recognized.trim()) {
            return acquired.method;
        }

        const filled = fillMissing(fields, reextract(recognized), keys);
        this.logger.info({ path, filled }, 'Filled fields from OCR');
        return 'pdf+ocr';
    }
}

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { DocumentFormat, DocumentInfo, DocumentLoader, RawDocument } from '../types/index.js';
import { openPdf } from './mupdf-engine.js';

export const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.bmp', '.tiff'];

export function detectFormat(filePath: string): DocumentFormat {
    const ext = path.extname(filePath).toLowerCase();
    if (ext === '.pdf') return 'pdf';
    if (IMAGE_EXTENSIONS.includes(ext)) return 'image';
    return 'text';
}

/**
 * Single-page document whose content is the file itself: an image for OCR,
 * or plain text.
 */
class FlatDocument implements RawDocument {
    readonly pageCount = 1;
    readonly info: DocumentInfo = {};

    constructor(
        readonly path: string,
        readonly format: 'image' | 'text',
        private readonly bytes: Uint8Array
    ) {}

    async text(maxPages: number): Promise<string> {
        if (this.format === 'image' || maxPages < 1) return '';
        return Buffer.from(this.bytes).toString('utf8');
    }

    async pageImage(pageIndex: number): Promise<Uint8Array> {
        if (pageIndex !== 0) {
            throw new RangeError(`Page ${pageIndex} out of range (1 pages)`);
        }
        return this.bytes;
    }

    close(): void {
        // nothing held open
    }
}

/**
 * Opens PDFs through MuPDF and everything else as a flat file.
 */
export class FileDocumentLoader implements DocumentLoader {
    async open(filePath: string): Promise<RawDocument> {
        const bytes = new Uint8Array(await readFile(filePath));
        const format = detectFormat(filePath);
        if (format === 'pdf') {
            return openPdf(filePath, bytes);
        }
        return new FlatDocument(filePath, format, bytes);
    }
}

/**
 * The only module that imports 'mupdf'. The WASM build is loaded on first use,
 * so commands that never open a PDF do not pay for it.
 */
import type * as MuPdf from 'mupdf';
import type { DocumentInfo, RawDocument } from '../types/index.js';

type MuPdfModule = typeof MuPdf;

let modulePromise: Promise<MuPdfModule> | null = null;

export async function loadMuPdf(): Promise<MuPdfModule> {
    if (!modulePromise) {
        modulePromise = import('mupdf').catch((error: unknown) => {
            modulePromise = null;
            throw new Error(
                `Failed to load MuPDF module: ${error instanceof Error ? error.message : String(error)}`
            );
        });
    }
    return modulePromise;
}

function metadata(doc: MuPdf.Document, key: string): string | undefined {
    const value = doc.getMetaData(key)?.trim();
    return value ? value : undefined;
}

/**
 * A PDF opened through MuPDF.
 */
class MuPdfDocument implements RawDocument {
    readonly format = 'pdf' as const;
    readonly pageCount: number;
    readonly info: DocumentInfo;

    constructor(
        readonly path: string,
        private readonly mupdf: MuPdfModule,
        private readonly doc: MuPdf.Document
    ) {
        this.pageCount = doc.countPages();
        this.info = {
            title: metadata(doc, 'info:Title'),
            author: metadata(doc, 'info:Author'),
            subject: metadata(doc, 'info:Subject'),
        };
    }

    async text(maxPages: number): Promise<string> {
        let text = '';
        for (let i = 0; i < Math.min(maxPages, this.pageCount); i++) {
            const page = this.doc.loadPage(i);
            text += page.toStructuredText('preserve-whitespace').asText() + '\n';
        }
        return text;
    }

    async pageImage(pageIndex: number, scale: number): Promise<Uint8Array> {
        if (pageIndex < 0 || pageIndex >= this.pageCount) {
            throw new RangeError(`Page ${pageIndex} out of range (${this.pageCount} pages)`);
        }
        const page = this.doc.loadPage(pageIndex);
        const pixmap = page.toPixmap(
            this.mupdf.Matrix.scale(scale, scale),
            this.mupdf.ColorSpace.DeviceRGB,
            false,
            true
        );
        return pixmap.asPNG();
    }

    close(): void {
        this.doc.destroy();
    }
}

export async function openPdf(path: string, bytes: Uint8Array): Promise<RawDocument> {
    const mupdf = await loadMuPdf();
    const doc = mupdf.Document.openDocument(bytes, 'application/pdf');
    return new MuPdfDocument(path, mupdf, doc);
}

export type DocumentFormat = 'pdf' | 'image' | 'text';

/**
 * Document-info dictionary of a PDF.
 */
export interface DocumentInfo {
    title?: string;
    author?: string;
    subject?: string;
}

/**
 * Read-only view of one source file for the duration of an extraction.
 */
export interface RawDocument {
    readonly path: string;
    readonly format: DocumentFormat;
    readonly pageCount: number;
    readonly info: DocumentInfo;

    /**
     * Text of the first `maxPages` pages, each followed by a newline.
     * Images have no text layer and yield an empty string.
     */
    text(maxPages: number): Promise<string>;

    /**
     * PNG (PDF pages) or the original file bytes (images) for OCR.
     * @throws RangeError when the page does not exist
     */
    pageImage(pageIndex: number, scale: number): Promise<Uint8Array>;

    close(): void;
}

/**
 * Opens source files. The PDF text-layer engine sits behind this seam.
 */
export interface DocumentLoader {
    open(path: string): Promise<RawDocument>;
}

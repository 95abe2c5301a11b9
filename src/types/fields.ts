/**
 * Bibliographic fields pulled out of a paper. A field is either present with a
 * non-empty value or absent; never an empty string.
 */
export interface ExtractedFields {
    title?: string;
    /** Ordered display form, `"; "`-joined */
    authors?: string;
    year?: number;
    venue?: string;
    /** Lower-cased, without the https://doi.org/ prefix */
    doi?: string;
    url?: string;
    volume?: string;
    issue?: string;
    pages?: string;
}

/**
 * Where the text behind an extraction came from.
 */
export type TextOrigin = 'pdf' | 'ocr';

/**
 * Output of the extraction engine for one paper.
 */
export interface ExtractionResult {
    fields: ExtractedFields;
    rawText: string;
    pageCount: number;
    /** Length of the trimmed raw text */
    charCount: number;
    /** Raw text is too short for the text layer to be trusted */
    needsOcr: boolean;
    origin: TextOrigin;
}

/**
 * Persisted parse state of a source file.
 */
export type ProcessingStatus = 'pending' | 'needs_ocr' | 'needs_review' | 'success' | 'failed';

/**
 * How a resolution was obtained.
 *
 * - `doi_lookup`: DOI known and fetched directly
 * - `auto`: fuzzy match at or above the acceptance threshold
 * - `review`: best candidate below threshold
 * - `none`: no usable candidate
 */
export type ResolutionSource = 'doi_lookup' | 'auto' | 'review' | 'none';

/**
 * Catalog search hit.
 */
export interface CandidateRecord extends ExtractedFields {
    catalog: 'crossref' | 'openalex';
    /** Relevance score reported by the catalog itself */
    score: number;
}

export interface ResolutionResult {
    /** Only set for `doi_lookup` and `auto` */
    doi?: string;
    confidence: number;
    source: ResolutionSource;
    /** Catalog values over extracted ones; `doi` is the resolved DOI, else the extracted one */
    merged: ExtractedFields;
    candidate?: CandidateRecord;
}

import type { CandidateRecord } from './fields.js';

/**
 * Query sent to the catalogs when no DOI is available.
 */
export interface BibliographicQuery {
    title: string;
    authors?: string;
    year?: number;
    venue?: string;
}

/**
 * Interface for catalog adapters (Crossref, OpenAlex).
 * Each adapter normalizes results into CandidateRecord.
 */
export interface CatalogAdapter {
    /** Human-readable catalog name */
    readonly name: string;

    readonly catalogId: CandidateRecord['catalog'];

    /**
     * Fetch a single record by DOI.
     * Adapters without DOI lookup return null.
     */
    lookupDoi(doi: string): Promise<CandidateRecord | null>;

    /**
     * Fuzzy search. Returns at most `limit` candidates in catalog order.
     */
    search(query: BibliographicQuery, limit: number): Promise<CandidateRecord[]>;
}

/**
 * What the resolver needs from the catalogs.
 */
export interface BibliographicSource {
    lookup(doi: string): Promise<CandidateRecord | null>;
    search(query: BibliographicQuery): Promise<CandidateRecord[]>;
}

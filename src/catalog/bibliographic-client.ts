import type {
    BibliographicQuery,
    BibliographicSource,
    CandidateRecord,
    CatalogAdapter,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Fans a query out to every catalog and concatenates the hits in adapter order.
 * A catalog that fails after its retries contributes nothing.
 */
export class BibliographicClient implements BibliographicSource {
    private readonly logger = getLogger();

    constructor(
        private readonly doiRegistry: CatalogAdapter,
        private readonly adapters: readonly CatalogAdapter[],
        private readonly maxCandidates: number
    ) {}

    async lookup(doi: string): Promise<CandidateRecord | null> {
        try {
            return await this.doiRegistry.lookupDoi(doi);
        } catch (error) {
            this.logger.warn(
                { doi, catalog: this.doiRegistry.name, error: describe(error) },
                'DOI lookup failed'
            );
            return null;
        }
    }

    async search(query: BibliographicQuery): Promise<CandidateRecord[]> {
        const candidates: CandidateRecord[] = [];
        for (const adapter of this.adapters) {
            try {
                const hits = await adapter.search(query, this.maxCandidates);
                candidates.push(...hits.slice(0, this.maxCandidates));
                this.logger.debug({ catalog: adapter.name, hits: hits.length }, 'Catalog search done');
            } catch (error) {
                this.logger.warn(
                    { catalog: adapter.name, title: query.title, error: describe(error) },
                    'Catalog search failed'
                );
            }
        }
        return candidates;
    }
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

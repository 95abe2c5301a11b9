import { z } from 'zod';
import type { BibliographicQuery, CandidateRecord, CatalogAdapter, CatalogConfig } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { formatAuthorFromDisplayName, nonEmpty, stripDoiPrefix } from './utils.js';

/** OpenAlex only keeps the leading authorships */
const MAX_AUTHORS = 3;

/**
 * OpenAlex API response types (subset of relevant fields).
 */
const openAlexWorkSchema = z.object({
    id: z.string().optional(),
    doi: z.string().nullish(),
    title: z.string().nullish(),
    display_name: z.string().nullish(),
    publication_year: z.number().nullish(),
    primary_location: z
        .object({
            source: z.object({ display_name: z.string().nullish() }).nullish(),
            landing_page_url: z.string().nullish(),
        })
        .nullish(),
    biblio: z
        .object({
            volume: z.string().nullish(),
            issue: z.string().nullish(),
            first_page: z.string().nullish(),
            last_page: z.string().nullish(),
        })
        .nullish(),
    authorships: z
        .array(z.object({ author: z.object({ display_name: z.string().nullish() }).nullish() }))
        .optional(),
    relevance_score: z.number().nullish(),
});

type OpenAlexWork = z.infer<typeof openAlexWorkSchema>;

const searchResponseSchema = z.object({ results: z.array(z.unknown()) });

/**
 * OpenAlex source adapter. Search only: DOIs are looked up at Crossref.
 *
 * @see https://docs.openalex.org/
 */
export class OpenAlexAdapter implements CatalogAdapter {
    readonly name = 'OpenAlex';
    readonly catalogId = 'openalex' as const;
    private readonly logger = getLogger();

    constructor(
        private readonly http: HttpClient,
        private readonly settings: CatalogConfig
    ) {}

    async lookupDoi(): Promise<CandidateRecord | null> {
        return null;
    }

    async search(query: BibliographicQuery, limit: number): Promise<CandidateRecord[]> {
        // Commas separate filters, so they cannot appear inside the title
        const title = query.title.replace(/,/g, ' ').replace(/\s+/g, ' ').trim();
        if (!title) return [];

        let filter = `title.search:${title}`;
        if (query.year) {
            filter += `,publication_year:${query.year}`;
        }

        const params = new URLSearchParams({
            filter,
            per_page: String(limit),
            mailto: this.settings.contactEmail,
        });
        const url = `${this.settings.openalexUrl}?${params.toString()}`;
        this.logger.debug({ url }, 'OpenAlex title search');

        const { data } = await this.http.get(url, {
            source: 'openalex',
            timeout: this.settings.timeoutMs,
            retries: this.settings.retries,
            headers: { Accept: 'application/json' },
        });

        const envelope = searchResponseSchema.safeParse(data);
        if (!envelope.success) {
            this.logger.warn('Unexpected OpenAlex search response');
            return [];
        }

        const candidates: CandidateRecord[] = [];
        for (const raw of envelope.data.results.slice(0, limit)) {
            const work = openAlexWorkSchema.safeParse(raw);
            if (work.success) candidates.push(this.normalizeWork(work.data));
        }
        return candidates;
    }

    // ─── Private helpers ──────────────────────────────────────

    private normalizeWork(work: OpenAlexWork): CandidateRecord {
        const doi = stripDoiPrefix(work.doi)?.toLowerCase();
        const authors = (work.authorships ?? [])
            .slice(0, MAX_AUTHORS)
            .map((authorship) => formatAuthorFromDisplayName(authorship.author?.display_name))
            .filter((author): author is string => author !== undefined);

        const firstPage = nonEmpty(work.biblio?.first_page);
        const lastPage = nonEmpty(work.biblio?.last_page);
        let pages = firstPage;
        if (firstPage && lastPage && lastPage !== firstPage) {
            pages = `${firstPage}-${lastPage}`;
        }

        return {
            catalog: this.catalogId,
            score: work.relevance_score ?? 0,
            doi,
            title: nonEmpty(work.display_name) ?? nonEmpty(work.title),
            authors: authors.length > 0 ? authors.join('; ') : undefined,
            year: work.publication_year ?? undefined,
            venue: nonEmpty(work.primary_location?.source?.display_name),
            volume: nonEmpty(work.biblio?.volume),
            issue: nonEmpty(work.biblio?.issue),
            pages,
            url: nonEmpty(work.primary_location?.landing_page_url) ?? (doi ? `https://doi.org/${doi}` : undefined),
        };
    }
}

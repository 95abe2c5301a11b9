import { z } from 'zod';
import type { BibliographicQuery, CandidateRecord, CatalogAdapter, CatalogConfig } from '../types/index.js';
import { HttpError, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { encodeDoiPath, formatAuthorFromParts, nonEmpty, stripDoiPrefix } from './utils.js';

const MAX_QUERY_LENGTH = 500;

/**
 * Crossref API response types (subset of relevant fields).
 */
const crossrefDateSchema = z
    .object({ 'date-parts': z.array(z.array(z.number().nullable())).optional() })
    .optional();

const crossrefItemSchema = z.object({
    DOI: z.string().optional(),
    title: z.array(z.string()).optional(),
    author: z
        .array(z.object({ family: z.string().optional(), given: z.string().optional() }))
        .optional(),
    'container-title': z.array(z.string()).optional(),
    'published-print': crossrefDateSchema,
    'published-online': crossrefDateSchema,
    issued: crossrefDateSchema,
    volume: z.string().optional(),
    issue: z.string().optional(),
    page: z.string().optional(),
    URL: z.string().optional(),
    score: z.number().optional(),
});

type CrossrefItem = z.infer<typeof crossrefItemSchema>;

const workResponseSchema = z.object({ message: z.unknown() });
const searchResponseSchema = z.object({ message: z.object({ items: z.array(z.unknown()) }) });

function firstYear(date: z.infer<typeof crossrefDateSchema>): number | undefined {
    return date?.['date-parts']?.[0]?.[0] ?? undefined;
}

/**
 * Crossref source adapter. Holds the DOI registry, so it is the only adapter
 * used for direct lookups.
 *
 * @see https://api.crossref.org/swagger-ui/index.html
 */
export class CrossrefAdapter implements CatalogAdapter {
    readonly name = 'Crossref';
    readonly catalogId = 'crossref' as const;
    private readonly logger = getLogger();

    constructor(
        private readonly http: HttpClient,
        private readonly settings: CatalogConfig
    ) {}

    async lookupDoi(doi: string): Promise<CandidateRecord | null> {
        const params = new URLSearchParams({ mailto: this.settings.contactEmail });
        const url = `${this.settings.crossrefUrl}/${encodeDoiPath(doi)}?${params.toString()}`;
        this.logger.debug({ url }, 'Crossref DOI lookup');

        let data: unknown;
        try {
            ({ data } = await this.http.get(url, this.requestOptions()));
        } catch (error) {
            if (error instanceof HttpError && error.status === 404) {
                this.logger.debug({ doi }, 'DOI not registered with Crossref');
                return null;
            }
            throw error;
        }

        const envelope = workResponseSchema.safeParse(data);
        const item = envelope.success ? crossrefItemSchema.safeParse(envelope.data.message) : undefined;
        if (!item?.success) {
            this.logger.warn({ doi }, 'Unexpected Crossref work response');
            return null;
        }
        return this.normalizeItem(item.data);
    }

    async search(query: BibliographicQuery, limit: number): Promise<CandidateRecord[]> {
        const parts = [query.title];
        const firstAuthor = query.authors?.split(';')[0]?.trim().split(/\s+/).at(-1);
        if (firstAuthor) parts.push(firstAuthor);
        if (query.year) parts.push(String(query.year));

        const bibliographic = parts.join(' ').trim().slice(0, MAX_QUERY_LENGTH);
        if (!bibliographic) return [];

        const params = new URLSearchParams({
            'query.bibliographic': bibliographic,
            rows: String(limit),
            mailto: this.settings.contactEmail,
        });
        const url = `${this.settings.crossrefUrl}?${params.toString()}`;
        this.logger.debug({ url }, 'Crossref bibliographic search');

        const { data } = await this.http.get(url, this.requestOptions());
        const envelope = searchResponseSchema.safeParse(data);
        if (!envelope.success) {
            this.logger.warn('Unexpected Crossref search response');
            return [];
        }

        const candidates: CandidateRecord[] = [];
        for (const raw of envelope.data.message.items.slice(0, limit)) {
            const item = crossrefItemSchema.safeParse(raw);
            if (item.success) candidates.push(this.normalizeItem(item.data));
        }
        return candidates;
    }

    // ─── Private helpers ──────────────────────────────────────

    private requestOptions() {
        return {
            source: 'crossref',
            timeout: this.settings.timeoutMs,
            retries: this.settings.retries,
            headers: { Accept: 'application/json' },
        };
    }

    private normalizeItem(item: CrossrefItem): CandidateRecord {
        const authors = (item.author ?? [])
            .map((author) => formatAuthorFromParts(author.family, author.given))
            .filter((author): author is string => author !== undefined);

        return {
            catalog: this.catalogId,
            score: item.score ?? 0,
            doi: stripDoiPrefix(item.DOI)?.toLowerCase(),
            title: nonEmpty(item.title?.[0]),
            authors: authors.length > 0 ? authors.join('; ') : undefined,
            year: firstYear(item['published-print']) ?? firstYear(item['published-online']) ?? firstYear(item.issued),
            venue: nonEmpty(item['container-title']?.[0]),
            volume: nonEmpty(item.volume),
            issue: nonEmpty(item.issue),
            pages: nonEmpty(item.page),
            url: nonEmpty(item.URL),
        };
    }
}

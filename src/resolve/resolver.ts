import type {
    BibliographicSource,
    CandidateRecord,
    ExtractedFields,
    ResolutionResult,
    ResolutionSource,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { definedEntries } from '../utils/objects.js';
import { stripDoiPrefix } from '../catalog/utils.js';
import { scoreCandidate } from './scoring.js';

function bibliographicFields(candidate: CandidateRecord): ExtractedFields {
    return {
        title: candidate.title,
        authors: candidate.authors,
        year: candidate.year,
        venue: candidate.venue,
        url: candidate.url,
        volume: candidate.volume,
        issue: candidate.issue,
        pages: candidate.pages,
    };
}

/**
 * Catalog values over extracted ones. The DOI is the resolved one, else
 * whatever the file itself printed; a review candidate's DOI is never taken.
 */
function mergeFields(extracted: ExtractedFields, candidate: CandidateRecord, doi: string | undefined): ExtractedFields {
    const merged: ExtractedFields = { ...extracted, ...definedEntries(bibliographicFields(candidate)) };
    const resolvedDoi = doi ?? extracted.doi;
    if (resolvedDoi) {
        merged.doi = resolvedDoi;
    } else {
        delete merged.doi;
    }
    return merged;
}

/**
 * Turns extracted fields into a DOI decision: direct lookup when the file
 * printed a DOI, otherwise the best-scoring catalog candidate.
 */
export class BibliographicResolver {
    private readonly logger = getLogger();

    constructor(
        private readonly catalogs: BibliographicSource,
        private readonly acceptConfidence: number
    ) {}

    async resolve(fields: ExtractedFields): Promise<ResolutionResult> {
        if (fields.doi) {
            const record = await this.catalogs.lookup(fields.doi);
            if (record) {
                this.logger.info({ doi: fields.doi }, 'Found metadata by DOI');
                return this.result(fields, 'doi_lookup', 100, record, fields.doi);
            }
        }

        if (!fields.title) {
            return { confidence: 0, source: 'none', merged: { ...fields } };
        }

        const candidates = await this.catalogs.search({
            title: fields.title,
            authors: fields.authors,
            year: fields.year,
            venue: fields.venue,
        });

        let best: CandidateRecord | undefined;
        let bestScore = 0;
        for (const candidate of candidates) {
            const score = scoreCandidate(fields, candidate);
            if (score > bestScore) {
                best = candidate;
                bestScore = score;
            }
        }

        if (!best) {
            this.logger.debug({ title: fields.title, candidates: candidates.length }, 'No usable candidate');
            return { confidence: 0, source: 'none', merged: { ...fields } };
        }

        if (bestScore >= this.acceptConfidence) {
            const doi = stripDoiPrefix(best.doi)?.toLowerCase();
            this.logger.info({ doi, score: bestScore }, 'Auto-matched DOI');
            return this.result(fields, 'auto', bestScore, best, doi);
        }

        this.logger.info({ doi: best.doi, score: bestScore }, 'Candidate found but below threshold');
        return this.result(fields, 'review', bestScore, best, undefined);
    }

    private result(
        fields: ExtractedFields,
        source: ResolutionSource,
        confidence: number,
        candidate: CandidateRecord,
        doi: string | undefined
    ): ResolutionResult {
        return {
            ...(doi ? { doi } : {}),
            confidence,
            source,
            merged: mergeFields(fields, candidate, doi),
            candidate,
        };
    }
}

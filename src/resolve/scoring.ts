import { normalizeTitle } from '../catalog/utils.js';
import type { ExtractedFields } from '../types/index.js';

/** Share of the title term in the final score */
const TITLE_WEIGHT = 0.4;
const MAX_SCORE = 100;

function wordSet(title: string): Set<string> {
    return new Set(normalizeTitle(title).split(' ').filter((word) => word.length > 0));
}

/**
 * Jaccard similarity of the two titles' word sets, 0 to 100.
 */
export function titleSimilarity(a: string | undefined, b: string | undefined): number {
    if (!a || !b) return 0;
    const wordsA = wordSet(a);
    const wordsB = wordSet(b);
    if (wordsA.size === 0 || wordsB.size === 0) return 0;

    let intersection = 0;
    for (const word of wordsA) {
        if (wordsB.has(word)) intersection++;
    }
    const union = wordsA.size + wordsB.size - intersection;
    return (intersection / union) * 100;
}

function yearTerm(a: number | undefined, b: number | undefined): number {
    if (a === undefined || b === undefined) return 0;
    if (a === b) return 20;
    return Math.abs(a - b) <= 1 ? 10 : 0;
}

function firstAuthor(authors: string | undefined): string {
    return (authors ?? '').toLowerCase().split(';')[0]?.trim() ?? '';
}

function authorTerm(a: string | undefined, b: string | undefined): number {
    const left = firstAuthor(a);
    const right = firstAuthor(b);
    if (!left || !right) return 0;
    if (left.slice(0, 10) === right.slice(0, 10)) return 20;
    return left.split(/\s+/).at(-1) === right.split(/\s+/).at(-1) ? 10 : 0;
}

function venueTerm(a: string | undefined, b: string | undefined): number {
    const venue = (a ?? '').toLowerCase().trim();
    const candidate = (b ?? '').toLowerCase();
    if (!venue || !candidate) return 0;
    return venue.split(/\s+/).slice(0, 3).some((word) => candidate.includes(word)) ? 20 : 0;
}

/**
 * How well a catalog candidate matches what was extracted from the file, 0 to 100.
 */
export function scoreCandidate(extracted: ExtractedFields, candidate: ExtractedFields): number {
    const score =
        TITLE_WEIGHT * titleSimilarity(extracted.title, candidate.title) +
        yearTerm(extracted.year, candidate.year) +
        authorTerm(extracted.authors, candidate.authors) +
        venueTerm(extracted.venue, candidate.venue);
    return Math.min(score, MAX_SCORE);
}

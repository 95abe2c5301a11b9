/**
 * Shared utilities for catalog adapters.
 */

const CJK = /[\u4e00-\u9fff]/;

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | undefined {
    if (!doi) return undefined;
    return doi.trim().replace(/^https?:\/\/(?:dx\.)?doi\.org\//i, '') || undefined;
}

/**
 * Crossref name parts to "Family, Given". CJK names are printed family-first
 * without a separator.
 */
export function formatAuthorFromParts(family: string | undefined, given: string | undefined): string | undefined {
    const f = (family ?? '').trim();
    const g = (given ?? '').trim();
    if (CJK.test(f + g)) {
        return f + g || undefined;
    }
    if (f && g) return `${f}, ${g}`;
    return f || g || undefined;
}

/**
 * "First Middle Last" to "Last, First Middle". CJK names are left as they are.
 */
export function formatAuthorFromDisplayName(name: string | null | undefined): string | undefined {
    const trimmed = (name ?? '').trim();
    if (!trimmed) return undefined;
    if (CJK.test(trimmed)) return trimmed;

    const parts = trimmed.split(/\s+/);
    if (parts.length < 2) return trimmed;
    return `${parts[parts.length - 1]}, ${parts.slice(0, -1).join(' ')}`;
}

/**
 * Clean and normalize a paper title for comparison.
 */
export function normalizeTitle(title: string): string {
    return title
        .toLowerCase()
        .replace(/[^\p{L}\p{N}_\s]/gu, '')  // Remove punctuation
        .replace(/\s+/g, ' ')              // Collapse whitespace
        .trim();
}

/**
 * Empty and whitespace-only strings become undefined.
 */
export function nonEmpty(value: string | null | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

/**
 * Path segments of a DOI are escaped individually so the slash survives.
 */
export function encodeDoiPath(doi: string): string {
    return doi.split('/').map(encodeURIComponent).join('/');
}

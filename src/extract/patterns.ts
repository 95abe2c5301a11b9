import {
    cleanAuthorLine,
    correctOcrText,
    isChineseText,
    isInstitutionLine,
    splitLines,
} from './text.js';

/**
 * One step of a cascade: a value, or undefined to fall through to the next step.
 */
export type Pattern<T> = (text: string) => T | undefined;

/**
 * Evaluate patterns in order; the first defined result wins.
 */
export function firstMatch<T>(patterns: readonly Pattern<T>[], text: string): T | undefined {
    for (const pattern of patterns) {
        const value = pattern(text);
        if (value !== undefined) return value;
    }
    return undefined;
}

const DOI_PATTERN = /\b(10\.\d{4,}\/[-a-zA-Z0-9._%+]+)\b/gi;
const YEAR_PATTERN = /\b(19[5-9]\d|20[0-2]\d)\b/g;
const EMAIL_PATTERN = /([a-zA-Z0-9._-]+@[\w.-]+\.\w+)/g;
const CJK_CHAR = /[\u4e00-\u9fff]/;

/** Everything except letters, digits, whitespace and dashes */
const TITLE_NOISE = /[^\p{L}\p{N}_\s\-–—]/gu;
/** As above, also keeping colons and parentheses */
const OCR_TITLE_NOISE = /[^\p{L}\p{N}_\s\-–—:()]/gu;

const VENUE_KEYWORDS = [
    'conference', 'proceedings', 'journal', 'symposium', 'workshop',
    'lecture notes', 'acm', 'ieee', 'springer', 'elsevier', 'arxiv',
];

const OCR_TITLE_SKIP = ['index terms', 'keywords', 'doi:', 'copyright'];

function cleanedLength(line: string, noise: RegExp): number {
    return line.replace(noise, '').length;
}

/**
 * First well-formed DOI among the first ten matches, lower-cased.
 */
export function extractDoi(text: string): string | undefined {
    const matches = Array.from(text.matchAll(DOI_PATTERN)).slice(0, 10);
    for (const match of matches) {
        const doi = match[1];
        if (doi && doi.includes('/') && doi.length > 10) {
            return doi.toLowerCase();
        }
    }
    return undefined;
}

/**
 * Publication year: a year printed at least twice wins (earliest on ties);
 * otherwise the first year found, if it is plausible for a modern paper.
 */
export function extractYear(text: string): number | undefined {
    const years = Array.from(text.matchAll(YEAR_PATTERN), (match) => Number(match[1]));
    if (years.length === 0) return undefined;

    const counts = new Map<number, number>();
    for (const year of years) {
        counts.set(year, (counts.get(year) ?? 0) + 1);
    }

    let best: number | undefined;
    let bestCount = 0;
    for (const [year, count] of counts) {
        if (count > bestCount) {
            best = year;
            bestCount = count;
        }
    }
    if (best !== undefined && bestCount >= 2) return best;

    // Every count is 1 here, so the tie goes to document order
    const first = years[0];
    if (first !== undefined && first >= 1990 && first <= 2025) return first;
    return undefined;
}

/**
 * Title from the text layer of a paper's first page.
 *
 * A candidate must start a block: a line directly under another non-blank
 * line is taken to be a continuation and skipped.
 */
export function extractTitle(text: string): string | undefined {
    const rawLines = text.split('\n').map((line) => line.trim());
    const candidates = rawLines
        .map((line, index) => ({ line, index }))
        .filter(({ line }) => line.length > 0);

    const chinese = isChineseText(text);
    const limit = chinese ? 10 : 8;
    const [min, max] = chinese ? [10, 200] : [15, 400];

    for (const { line, index } of candidates.slice(0, limit)) {
        const length = cleanedLength(line, TITLE_NOISE);
        if (length <= min || length >= max || line.toLowerCase().startsWith('http')) continue;
        if (index > 0 && (rawLines[index - 1] ?? '') !== '') continue;
        return line;
    }

    if (!chinese) {
        for (const { line } of candidates.slice(0, 10)) {
            const length = cleanedLength(line, TITLE_NOISE);
            if (length > 20 && length < 300) return line;
        }
    }

    return undefined;
}

/**
 * Author line from the text layer. `title`, when known, is never returned as authors.
 */
export function extractAuthors(text: string, title?: string): string | undefined {
    const lines = splitLines(text)
        .slice(0, 15)
        .filter((line) => line !== title);

    if (isChineseText(text)) {
        for (const line of lines) {
            const lower = line.toLowerCase();
            if (['@', 'mailto', 'http', 'www'].some((marker) => lower.includes(marker))) continue;
            if (line.length >= 4 && line.length <= 100 && CJK_CHAR.test(line)) return line;
        }
        return undefined;
    }

    for (const line of lines) {
        const lower = line.toLowerCase();
        if (['university', 'institute', '@', 'mailto'].some((marker) => lower.includes(marker))) continue;
        const parts = line.split(/\s+/);
        if (parts.length < 2 || parts.length > 8) continue;
        const withLetters = parts.filter((part) => /[a-zA-Z]/.test(part)).length;
        if (withLetters >= 2) return line;
    }
    return undefined;
}

/**
 * First of the first 50 lines that names a venue or publisher.
 */
export function extractVenue(text: string): string | undefined {
    for (const line of splitLines(text).slice(0, 50)) {
        const lower = line.toLowerCase();
        if (line.length > 5 && line.length < 150 && VENUE_KEYWORDS.some((keyword) => lower.includes(keyword))) {
            return line;
        }
    }
    return undefined;
}

/**
 * Title from OCR output: the first substantial line that is not a section
 * heading, a keyword block, or a numbered heading. Markdown heading markers are dropped.
 */
export function extractTitleFromOcr(text: string): string | undefined {
    for (const rawLine of splitLines(text).slice(0, 50)) {
        const line = rawLine.replace(/^#+\s*/, '');
        const lower = line.toLowerCase();
        if (cleanedLength(line, OCR_TITLE_NOISE) < 20) continue;
        if (lower.startsWith('abstract') || lower.startsWith('introduction')) continue;
        if (OCR_TITLE_SKIP.some((keyword) => lower.includes(keyword))) continue;
        if (line.startsWith('I.') || /^\d+\.\s/.test(line)) continue;
        return line;
    }
    return undefined;
}

function looksLikeName(line: string): boolean {
    const words = line.split(' ');
    return (
        words.length <= 4 &&
        /^[\p{L}' -]+$/u.test(line) &&
        /^\p{Lu}/u.test(line)
    );
}

/**
 * Authors from OCR output, anchored on e-mail addresses: for each address, the
 * nearest name-like line above it (within ten lines) that is not an affiliation.
 */
export function extractAuthorsFromOcr(text: string): string | undefined {
    const lines = splitLines(text);
    const nameByEmail = new Map<string, string>();

    lines.forEach((line, i) => {
        const email = line.match(/([a-zA-Z0-9._-]+@[\w.-]+\.\w+)/)?.[1]?.toLowerCase();
        if (!email) return;

        for (let j = i - 1; j >= Math.max(0, i - 10); j--) {
            const candidate = cleanAuthorLine(lines[j] ?? '');
            if (candidate.length < 2 || candidate.includes('@')) continue;
            if (isInstitutionLine(candidate)) continue;

            if (CJK_CHAR.test(candidate) || looksLikeName(candidate)) {
                nameByEmail.set(email, candidate);
                break;
            }
        }
    });

    const seen = new Set<string>();
    const authors: string[] = [];
    for (const name of nameByEmail.values()) {
        const corrected = correctOcrText(name);
        const key = corrected.toLowerCase();
        if (!seen.has(key)) {
            seen.add(key);
            authors.push(corrected);
        }
    }

    return authors.length > 0 ? authors.join('; ') : undefined;
}

/**
 * Distinct e-mail addresses, lower-cased, in order of appearance.
 */
export function extractEmails(text: string): string[] {
    const emails = Array.from(text.matchAll(EMAIL_PATTERN), (match) => (match[1] ?? '').toLowerCase());
    return [...new Set(emails)].filter((email) => email.length > 0);
}

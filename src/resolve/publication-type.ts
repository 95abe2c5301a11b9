import type { EntryType, PublicationType } from '../types/index.js';
import { CONFERENCE_KEYWORDS, INPROCEEDINGS_KEYWORDS, JOURNAL_KEYWORDS } from './venue-keywords.js';

/**
 * Whole-word matchers, so that "sp" does not fire inside "springer".
 */
function matchers(words: readonly string[]): RegExp[] {
    return words.map((word) => new RegExp(`\\b${word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}\\b`));
}

const CONFERENCE = matchers(CONFERENCE_KEYWORDS);
const JOURNAL = matchers(JOURNAL_KEYWORDS);
const INPROCEEDINGS = matchers(INPROCEEDINGS_KEYWORDS);

function mentions(venue: string | undefined, patterns: RegExp[]): boolean {
    const lower = (venue ?? '').toLowerCase().trim();
    return lower.length > 0 && patterns.some((pattern) => pattern.test(lower));
}

/**
 * Conference keywords are tested before journal ones: "IEEE Symposium on ..." is a conference.
 */
export function detectPublicationType(venue: string | undefined): PublicationType {
    if (mentions(venue, CONFERENCE)) return 'conference';
    if (mentions(venue, JOURNAL)) return 'journal';
    return 'other';
}

export function detectEntryType(venue: string | undefined): EntryType {
    return mentions(venue, INPROCEEDINGS) ? 'inproceedings' : 'article';
}

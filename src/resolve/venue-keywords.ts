/**
 * Venue keywords, lower-case, matched as whole words.
 */
export const CONFERENCE_KEYWORDS: readonly string[] = [
    'proceedings', 'conference', 'ccs', 'ndss', 'sp', 'oakland',
    'usenix security', 'ieee symposium', 'acm conference',
    'icml', 'neurips', 'cvpr', 'iccv', 'eccv', 'iclr',
    'acl', 'emnlp', 'naacl', 'ijcai', 'aaai', 'sigir',
    'kdd', 'www', 'icde', 'vldb', 'sigmod', 'icdm',
    'icassp', 'interspeech', 'icra', 'iros',
    'workshop', 'symposium', 'colloquium',
];

export const JOURNAL_KEYWORDS: readonly string[] = [
    'journal', 'transactions', 'letters', 'ieee', 'acm',
    'elsevier', 'springer', 'wiley', 'taylor', 'francis',
    'scie', 'sci', 'nature', 'science', 'cell',
    'physica', 'applied physics', 'review',
];

/** Venues that make an entry `inproceedings` */
export const INPROCEEDINGS_KEYWORDS: readonly string[] = ['proceedings', 'conference', 'ccs', 'ndss', 'symposium'];

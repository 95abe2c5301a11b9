/**
 * Line and character helpers shared by the pattern extractors.
 */

const CJK = /[\u4e00-\u9fff]/;

/**
 * Known systematic misreads of the OCR service, applied in order.
 */
const OCR_CORRECTIONS: ReadonlyArray<readonly [string, string]> = [
    ["n'", "'"],
    ['Chin', 'China'],
    ['Hfi', 'Hefei'],
    ["Xi'n", "Xi'an"],
    ["Jin'o", "Jin'ao"],
    ['Tin', 'Ting'],
    ['Hichun', 'Haichuan'],
    ['Zhn', 'Zhang'],
    ['Shn', 'Shang'],
    ['Zin', 'Zian'],
    ['Zisn', 'Zisen'],
    ['Shilon', 'Shilong'],
    ["Ji'o", "Jin'ao"],
    ['Yn Liu', 'Yang Liu'],
    ['Liu Yn', 'Yang Liu'],
];

const OCR_CORRECTION_PATTERNS = OCR_CORRECTIONS.map(([wrong, right]) => {
    const escaped = wrong.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    // Capitalised misreads are whole tokens; all of them must not run into a following letter
    const before = /^\p{Lu}/u.test(wrong) ? '(?<!\\p{L})' : '';
    return { pattern: new RegExp(`${before}${escaped}(?!\\p{L})`, 'gu'), right };
});

/**
 * Lines that mark an affiliation rather than a person.
 */
export const INSTITUTION_KEYWORDS = [
    'university', 'institute', 'college', 'school', 'technology',
    'department', 'research', 'laboratory', 'center', 'centre',
    'jiaotong', 'science', 'china', 'hefei', 'ustc', 'stu.', 'mail.',
    // frequent OCR misspellings
    'jiot', 'univsity', 'scinc', 'tchnoloy',
] as const;

/**
 * Trimmed, non-blank lines.
 */
export function splitLines(text: string): string[] {
    return text
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
}

export function isChineseText(text: string): boolean {
    return CJK.test(text);
}

export function correctOcrText(text: string): string {
    let corrected = text;
    for (const { pattern, right } of OCR_CORRECTION_PATTERNS) {
        corrected = corrected.replace(pattern, right);
    }
    return corrected;
}

/**
 * Drop markup characters OCR tends to leave around names, and collapse whitespace.
 */
export function cleanAuthorLine(line: string): string {
    return line
        .replace(/[$*^#{}\\|]/g, '')
        .replace(/\s+/g, ' ')
        .trim();
}

export function isInstitutionLine(line: string): boolean {
    const lower = line.toLowerCase();
    return INSTITUTION_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/**
 * Remove all whitespace; certificate fields are printed with spaced-out CJK characters.
 */
export function squash(value: string): string {
    return value.replace(/\s+/g, '');
}

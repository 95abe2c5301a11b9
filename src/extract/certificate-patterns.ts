import type {
    CertificateKind,
    PatentFields,
    PatentNumberValidation,
    PatentType,
    SoftwareFields,
} from '../types/index.js';
import { firstMatch, type Pattern } from './patterns.js';
import { squash } from './text.js';

/**
 * Field-label keywords. CJK labels match with whitespace between characters,
 * since certificate PDFs often space them out ("发 明 人").
 */
const PATENT_MARKERS = ['专利号', '授权公告号', '发明名称', '发明人', '专利权人', '申请日', '授权公告日', 'ZL'];
const SOFTWARE_MARKERS = ['软件名称', '登记号', '著作权人', '开发完成日期', 'SR', '软著'];
const MIN_MARKERS = 3;

/** Fields counted by the OCR remedy */
export const PATENT_REMEDY_FIELDS = [
    'patentNumber', 'title', 'inventors', 'patentee', 'grantNumber', 'applicationDate', 'grantDate',
] as const satisfies ReadonlyArray<keyof PatentFields>;
export const SOFTWARE_REMEDY_FIELDS = [
    'softwareName', 'registrationNumber', 'copyrightHolder', 'developmentDate', 'version',
] as const satisfies ReadonlyArray<keyof SoftwareFields>;

/** Fields a record needs to be considered complete */
const PATENT_REQUIRED_FIELDS = ['patentNumber', 'title', 'inventors', 'patentee'] as const;
const SOFTWARE_REQUIRED_FIELDS = ['softwareName', 'registrationNumber', 'copyrightHolder', 'developmentDate'] as const;

const PATENT_NUMBER_SHAPE = /ZL\d{11,13}\.[0-9X]/;
const DATE = '(\\d{4}[年\\-/.]\\s*\\d{1,2}[月\\-/.]\\s*\\d{1,2}\\s*日?)';
const VERSION_PATTERN = /[Vv]\d+(?:\.\d+)*(?:版)?/;

function markerPattern(marker: string): RegExp {
    return /[^\x00-\x7f]/.test(marker) ? new RegExp(Array.from(marker).join('\\s*')) : new RegExp(marker);
}

const PATENT_MARKER_PATTERNS = PATENT_MARKERS.map(markerPattern);
const SOFTWARE_MARKER_PATTERNS = SOFTWARE_MARKERS.map(markerPattern);

function countMarkers(text: string, patterns: RegExp[]): number {
    return patterns.filter((pattern) => pattern.test(text)).length;
}

export function isPatentCertificate(text: string): boolean {
    return countMarkers(text, PATENT_MARKER_PATTERNS) >= MIN_MARKERS;
}

export function isSoftwareCertificate(text: string): boolean {
    return countMarkers(text, SOFTWARE_MARKER_PATTERNS) >= MIN_MARKERS;
}

/**
 * Patent is tested first; a text that reads as both is a patent.
 */
export function classifyCertificate(text: string): CertificateKind {
    if (isPatentCertificate(text)) return 'patent';
    if (isSoftwareCertificate(text)) return 'software';
    return 'neither';
}

/**
 * Pattern returning capture group 1 run through `clean`; empty results fall through.
 */
function capture(regex: RegExp, clean: (value: string) => string | undefined = squash): Pattern<string> {
    return (text) => {
        const value = regex.exec(text)?.[1];
        if (value === undefined) return undefined;
        const cleaned = clean(value.trim());
        return cleaned ? cleaned : undefined;
    };
}

/**
 * Canonical patent number, or undefined when the candidate does not contain one.
 * Upper-cases, drops whitespace and `。`, and inserts the check-digit separator when missing.
 */
export function normalizePatentNumber(candidate: string): string | undefined {
    let value = candidate.toUpperCase().replace(/[\s。]+/g, '');
    if (!value.includes('.') && value.length >= 14) {
        value = `${value.slice(0, -1)}.${value.slice(-1)}`;
    }
    return PATENT_NUMBER_SHAPE.exec(value)?.[0];
}

// A number never continues onto the next line
const patentNumberPatterns: Pattern<string>[] = [
    capture(/专\s*利\s*号[：:\s]*((?:ZL|zl)[ \t\d.X]+)/i, normalizePatentNumber),
    capture(/(ZL[ \t]*\d{4}[ \t]*\d[ \t]*\d{6,8}[ \t]*[.。]?[ \t]*[X\d])/i, normalizePatentNumber),
    capture(/专利号[:\s]*((?:ZL|zl)\d{9,15}[.X\d]?)/i, normalizePatentNumber),
    capture(/专利号[：:\s]*((?:ZL|zl)\d{4,6}\d{5,8}[.X\d]?)/i, normalizePatentNumber),
    // year, type and serial printed as separate groups
    (text) => {
        const match = /(?:ZL|zl)[ \t]*(\d{4})[ \t]*(\d)[ \t]*(\d{6,8})[ \t]*[.。]?[ \t]*([X\d])/i.exec(text);
        if (!match) return undefined;
        const [, year, type, serial, check] = match;
        return normalizePatentNumber(`ZL${year}${type}${serial}.${check}`);
    },
];

const grantNumberPatterns: Pattern<string>[] = [
    capture(/授\s*权\s*公\s*告\s*号[：:\s]*((?:CN|cn)[\s\d]+[A-Za-z]?)/, (value) => squash(value).toUpperCase()),
    capture(/授权公告号[:\s]*([A-Z]{2}\d+[A-Z]?)/i, (value) => squash(value).toUpperCase()),
];

const limit = (max: number) => (value: string) => squash(value).slice(0, max);

const patentTitlePatterns: Pattern<string>[] = [
    capture(/(?:发\s*明\s*名\s*称|专\s*利\s*名\s*称)[：:\s]*([^\n]+?)(?=\n专|\n发|\n地|\n申)/, limit(200)),
    capture(/(?:发\s*明\s*名\s*称|专\s*利\s*名\s*称)[：:\s]*([^\n]+)/, limit(200)),
];

function cleanInventors(value: string): string | undefined {
    const inventors = squash(value)
        .replace(/[,，、]+/g, ';')
        .replace(/^;+|;+$/g, '');
    return inventors.length > 1 ? inventors.slice(0, 500) : undefined;
}

const inventorPatterns: Pattern<string>[] = [
    capture(
        /发\s*明\s*人[：:\s]*([^专地授国]+?)(?=专\s*利|地\s*址|授\s*权|国家知识|申请日时申请人|$)/i,
        cleanInventors
    ),
    capture(/申请日时发明人[：:\s]*([^国专地]+?)(?=国家知识|专利权|地址|$)/i, cleanInventors),
    // unlabelled `name;name;name` list after a colon
    (text) => {
        for (const match of text.matchAll(/[：:]\s*([^;；\n]{1,15}(?:[;；][^;；\n]{1,15})+)/g)) {
            const inventors = squash(match[1] ?? '');
            const parts = inventors.split(/[;；]/).filter((part) => part.length > 0);
            if (parts.length >= 2 && parts.every((part) => part.length <= 15)) {
                return inventors.slice(0, 500);
            }
        }
        return undefined;
    },
];

const patenteePatterns: Pattern<string>[] = [
    capture(/专\s*利\s*权\s*人[：:\s]*([^\n]+?)(?=\n|地\s*址|$)/i, limit(200)),
    capture(/申请日时申请人[：:\s]*([^\n]+?)(?=\n|申请日时发明人|$)/i, limit(200)),
];

const applicationDatePatterns: Pattern<string>[] = [
    capture(new RegExp(`(?:专\\s*利\\s*)?申\\s*请\\s*日[：:\\s]*${DATE}`)),
];

const grantDatePatterns: Pattern<string>[] = [
    capture(new RegExp(`授\\s*权\\s*公?\\s*告?\\s*日[：:\\s]*${DATE}`)),
];

function detectPatentType(text: string): PatentType {
    if (text.includes('实用新型')) return '实用新型';
    if (text.includes('外观设计')) return '外观设计';
    return '发明';
}

/**
 * Pull patent-certificate fields out of direct-text or OCR output.
 */
export function extractPatentFields(text: string): PatentFields {
    return {
        patentNumber: firstMatch(patentNumberPatterns, text),
        grantNumber: firstMatch(grantNumberPatterns, text),
        title: firstMatch(patentTitlePatterns, text),
        inventors: firstMatch(inventorPatterns, text),
        patentee: firstMatch(patenteePatterns, text),
        applicationDate: firstMatch(applicationDatePatterns, text),
        grantDate: firstMatch(grantDatePatterns, text),
        patentType: detectPatentType(text),
    };
}

const softwareNamePatterns: Pattern<string>[] = [
    capture(/软\s*件\s*名\s*称[：:\s]*([^\n]+?)(?=\n|简称|V\d|著)/),
    capture(/软件名称[：:\s]*([^\n;；]+)/),
];

const registrationNumberPatterns: Pattern<string>[] = [
    capture(/登\s*记\s*号[：:\s]*(\d{4}SR\d+)/),
    capture(/(\d{4}SR\d+)/),
];

const copyrightHolderPatterns: Pattern<string>[] = [
    capture(/著\s*作\s*权\s*人[：:\s]*([^\n]+?)(?=\n|开发|首次)/),
    capture(/著作权人[：:\s]*([^\n;；]+)/),
];

const developmentDatePatterns: Pattern<string>[] = [
    capture(new RegExp(`开\\s*发\\s*完\\s*成\\s*日\\s*期[：:\\s]*${DATE}`)),
];

/**
 * Pull software-registration fields. The version is searched in the whole text
 * and removed from the software name.
 */
export function extractSoftwareFields(text: string): SoftwareFields {
    const version = VERSION_PATTERN.exec(text)?.[0];
    let softwareName = firstMatch(softwareNamePatterns, text);
    if (softwareName && version) {
        softwareName = softwareName.replace(new RegExp(VERSION_PATTERN.source, 'g'), '').trim() || undefined;
    }

    return {
        softwareName,
        version,
        registrationNumber: firstMatch(registrationNumberPatterns, text),
        copyrightHolder: firstMatch(copyrightHolderPatterns, text),
        developmentDate: firstMatch(developmentDatePatterns, text),
    };
}

export function countMissing<T extends object>(fields: T, keys: ReadonlyArray<keyof T>): number {
    return keys.filter((key) => !fields[key]).length;
}

export function isPatentComplete(fields: PatentFields): boolean {
    return countMissing(fields, PATENT_REQUIRED_FIELDS) === 0;
}

export function isSoftwareComplete(fields: SoftwareFields): boolean {
    return countMissing(fields, SOFTWARE_REQUIRED_FIELDS) === 0;
}

/**
 * Check a patent number against the `ZL202211551727.X` format.
 */
export function validatePatentNumber(patentNumber: string): PatentNumberValidation {
    if (!patentNumber.trim()) {
        return { valid: false, reason: 'Patent number must not be empty' };
    }

    const value = patentNumber.trim().toUpperCase();
    if (!value.startsWith('ZL')) {
        return { valid: false, reason: "Patent number must start with 'ZL'" };
    }

    const compact = value.replace(/ /g, '');
    if (compact.length !== 16) {
        return { valid: false, reason: `Patent number must be 16 characters, got ${compact.length}` };
    }

    if (!/^ZL\d{4}[1-9]\d{6,7}[.][X\d]$/.test(compact)) {
        return { valid: false, reason: 'Patent number is malformed, expected a value like ZL202211551727.X' };
    }

    return { valid: true, reason: '' };
}

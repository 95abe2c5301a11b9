import type { PatentFields, SoftwareFields } from './certificate.js';
import type { ExtractedFields, ProcessingStatus, ResolutionSource } from './fields.js';

/**
 * A file found by the directory scanner.
 */
export interface FileDescriptor {
    /** Absolute path */
    path: string;
    /** Path relative to the scan root; the store's key */
    relPath: string;
    filename: string;
    size: number;
    mtime: number;
    sha256: string;
}

/**
 * A source file as the store last saw it.
 */
export interface StoredFile {
    id: number;
    path: string;
    sha256: string;
    size: number;
    mtime: number;
    status: ProcessingStatus;
    error: string | null;
}

export type EntryType = 'article' | 'inproceedings';
export type PublicationType = 'journal' | 'conference' | 'other';

/**
 * Provenance of a paper row: a resolver outcome, or `pdf`/`ocr` when the
 * resolver was not consulted.
 */
export type PaperSource = ResolutionSource | 'pdf' | 'ocr';

export interface PaperRecord extends ExtractedFields {
    title: string;
    entryType: EntryType;
    publicationType: PublicationType;
    confidence: number;
    source: PaperSource;
}

export interface PatentRecord extends PatentFields {
    title: string;
    filePath: string;
    needsReview: boolean;
}

export interface SoftwareRecord extends SoftwareFields {
    title: string;
    filePath: string;
    needsReview: boolean;
}

/**
 * Persistence seam consumed by the scan orchestrator.
 */
export interface RecordStore {
    getFileByPath(relPath: string): StoredFile | undefined;

    /** Files in `status`, in path order */
    getFilesByStatus(status: ProcessingStatus): StoredFile[];

    /** A paper record points at this file */
    isFileLinked(fileId: number): boolean;

    /** Paper linked to the file, if any */
    getLinkedPaperId(fileId: number): number | undefined;

    /** A patent or software record already points at this file */
    isCertificateLinked(relPath: string): boolean;

    /** Insert or refresh the file row and return its id */
    upsertFile(file: FileDescriptor, status: ProcessingStatus, error?: string): number;

    setStatus(fileId: number, status: ProcessingStatus, error?: string): void;

    /**
     * Save a paper and return its id. A row with the same DOI wins; otherwise
     * `existingId` is updated in place, DOI included.
     */
    upsertPaper(paper: PaperRecord, existingId?: number): number;

    linkPaperFile(paperId: number, fileId: number): void;

    unlinkFile(fileId: number): void;

    upsertPatent(patent: PatentRecord): number;

    upsertSoftware(software: SoftwareRecord): number;

    /** Run `fn` atomically */
    transaction<T>(fn: () => T): T;
}

import type { ProcessingStatus } from './fields.js';

/**
 * What a file turned out to be. `certificate` is a certificate candidate that
 * was skipped or failed before classification; `unclassified` matched neither type.
 */
export type ScanOutcomeKind = 'paper' | 'patent' | 'software' | 'certificate' | 'unclassified';

export type ScanState = 'done' | 'skipped' | 'failed';

/**
 * Yielded once per file by the scan generator.
 */
export interface ScanProgress {
    /** 1-based */
    index: number;
    total: number;
    /** Relative to the scan root */
    path: string;
    message: string;
    state: ScanState;
}

export interface ScanOutcome {
    path: string;
    kind: ScanOutcomeKind;
    state: ScanState;
    /** Paper files only */
    status?: ProcessingStatus;
    recordId?: number;
    confidence?: number;
    error?: string;
}

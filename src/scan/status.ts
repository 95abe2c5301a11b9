import type { ProcessingStatus } from '../types/index.js';

/**
 * Terminal status of a paper file. Text too short to trust always means
 * `needs_ocr`, whatever the resolver would have said.
 */
export function decidePaperStatus(
    outcome: { needsOcr: boolean; confidence: number },
    acceptConfidence: number
): ProcessingStatus {
    if (outcome.needsOcr) return 'needs_ocr';
    if (outcome.confidence >= acceptConfidence) return 'success';
    if (outcome.confidence > 0) return 'needs_review';
    return 'needs_ocr';
}

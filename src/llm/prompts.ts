/**
 * Instruction sent ahead of the paper text. The reply format is what
 * `parseMetadataReply` reads back.
 */
export const METADATA_PROMPT = `The following is text from the first page of an academic paper. Extract:
1. The paper title
2. The author list, separated by semicolons
3. The journal or conference name
4. The publication year

Only return information you can identify with certainty, in exactly this format and without any explanation:
Title: xxx
Authors: xxx; xxx; xxx
Venue: xxx
Year: xxxx

If an item cannot be identified, write "unknown" on that line.`;

export function buildMetadataPrompt(text: string, maxChars: number): string {
    return `${METADATA_PROMPT}\n\nPaper text:\n${text.slice(0, maxChars)}`;
}

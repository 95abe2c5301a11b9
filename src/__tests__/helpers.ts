import { Response } from 'undici';
import type {
    BibliographicQuery,
    BibliographicSource,
    CandidateRecord,
    DocumentInfo,
    DocumentLoader,
    FileDescriptor,
    PaperRecord,
    PatentRecord,
    PipelineConfig,
    ProcessingStatus,
    RawDocument,
    RecordStore,
    SoftwareRecord,
    StoredFile,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import type { OcrService } from '../ocr/ocr-gateway.js';

export function testConfig(): PipelineConfig {
    return structuredClone(DEFAULT_CONFIG);
}

export interface FakePage {
    text: string;
    info?: DocumentInfo;
    pageCount?: number;
}

/**
 * Serves documents from memory, keyed by path. Unknown paths fail to open.
 */
export class FakeLoader implements DocumentLoader {
    readonly opened: string[] = [];
    closed = 0;

    constructor(private readonly pages: Record<string, FakePage> = {}) {}

    set(path: string, page: FakePage): void {
        this.pages[path] = page;
    }

    async open(path: string): Promise<RawDocument> {
        const page = this.pages[path];
        if (!page) throw new Error(`cannot open ${path}`);
        this.opened.push(path);

        const onClose = (): void => {
            this.closed++;
        };
        return {
            path,
            format: path.endsWith('.pdf') ? 'pdf' : 'text',
            pageCount: page.pageCount ?? 1,
            info: page.info ?? {},
            text: async () => page.text,
            pageImage: async () => new Uint8Array([1, 2, 3]),
            close: onClose,
        };
    }
}

/**
 * Returns `text` for every call and records what was asked.
 */
export class FakeOcr implements OcrService {
    readonly calls: Array<{ path: string; pageIndex: number | undefined }> = [];

    constructor(public text = '', private readonly configured = true) {}

    isConfigured(): boolean {
        return this.configured;
    }

    async recognize(path: string, pageIndex?: number): Promise<string> {
        this.calls.push({ path, pageIndex });
        return this.text;
    }
}

export class FakeCatalogs implements BibliographicSource {
    lookups: string[] = [];
    searches: BibliographicQuery[] = [];

    constructor(
        private readonly byDoi: Record<string, CandidateRecord> = {},
        private readonly hits: CandidateRecord[] = []
    ) {}

    async lookup(doi: string): Promise<CandidateRecord | null> {
        this.lookups.push(doi);
        return this.byDoi[doi] ?? null;
    }

    async search(query: BibliographicQuery): Promise<CandidateRecord[]> {
        this.searches.push(query);
        return this.hits;
    }

    get calls(): number {
        return this.lookups.length + this.searches.length;
    }
}

interface MemoryFile extends StoredFile {
    filename: string;
}

/**
 * RecordStore kept in maps. `writes` counts every mutating call. Papers are
 * replaced whole, so field-level merging needs `LibraryDatabase`.
 */
export class MemoryStore implements RecordStore {
    writes = 0;
    readonly files = new Map<string, MemoryFile>();
    readonly papers = new Map<number, PaperRecord>();
    /** file id to linked paper ids */
    readonly links = new Map<number, Set<number>>();
    readonly patents = new Map<string, PatentRecord & { id: number }>();
    readonly softwares = new Map<string, SoftwareRecord & { id: number }>();
    private nextId = 1;

    getFileByPath(relPath: string): StoredFile | undefined {
        return this.files.get(relPath);
    }

    getFilesByStatus(status: ProcessingStatus): StoredFile[] {
        return [...this.files.values()]
            .filter((file) => file.status === status)
            .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    }

    isFileLinked(fileId: number): boolean {
        return this.getLinkedPaperId(fileId) !== undefined;
    }

    getLinkedPaperId(fileId: number): number | undefined {
        const ids = [...(this.links.get(fileId) ?? [])];
        return ids.length > 0 ? Math.min(...ids) : undefined;
    }

    isCertificateLinked(relPath: string): boolean {
        return this.patents.has(relPath) || this.softwares.has(relPath);
    }

    upsertFile(file: FileDescriptor, status: ProcessingStatus, error?: string): number {
        this.writes++;
        const id = this.files.get(file.relPath)?.id ?? this.nextId++;
        this.files.set(file.relPath, {
            id,
            path: file.relPath,
            filename: file.filename,
            sha256: file.sha256,
            size: file.size,
            mtime: file.mtime,
            status,
            error: error ?? null,
        });
        return id;
    }

    setStatus(fileId: number, status: ProcessingStatus, error?: string): void {
        this.writes++;
        for (const file of this.files.values()) {
            if (file.id === fileId) {
                file.status = status;
                file.error = error ?? null;
            }
        }
    }

    upsertPaper(paper: PaperRecord, existingId?: number): number {
        this.writes++;
        const byDoi = paper.doi
            ? [...this.papers.entries()].find(([, stored]) => stored.doi === paper.doi)?.[0]
            : undefined;
        const id = byDoi ?? existingId ?? this.nextId++;
        this.papers.set(id, paper);
        return id;
    }

    linkPaperFile(paperId: number, fileId: number): void {
        this.writes++;
        const linked = this.links.get(fileId) ?? new Set<number>();
        linked.add(paperId);
        this.links.set(fileId, linked);
    }

    unlinkFile(fileId: number): void {
        this.writes++;
        this.links.delete(fileId);
    }

    upsertPatent(patent: PatentRecord): number {
        this.writes++;
        const id = this.patents.get(patent.filePath)?.id ?? this.nextId++;
        this.patents.set(patent.filePath, { ...patent, id });
        return id;
    }

    upsertSoftware(software: SoftwareRecord): number {
        this.writes++;
        const id = this.softwares.get(software.filePath)?.id ?? this.nextId++;
        this.softwares.set(software.filePath, { ...software, id });
        return id;
    }

    transaction<T>(fn: () => T): T {
        return fn();
    }

    paperFor(relPath: string): PaperRecord | undefined {
        const file = this.files.get(relPath);
        const paperId = file ? this.getLinkedPaperId(file.id) : undefined;
        return paperId === undefined ? undefined : this.papers.get(paperId);
    }
}

export function candidate(overrides: Partial<CandidateRecord> = {}): CandidateRecord {
    return { catalog: 'crossref', score: 1, ...overrides };
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json', ...headers },
    });
}

export function textResponse(body: string, status: number): Response {
    return new Response(body, { status, headers: { 'content-type': 'text/plain' } });
}

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CertificateExtractor } from '../extract/certificate-extractor.js';
import { ExtractionEngine } from '../extract/extraction-engine.js';
import { BibliographicResolver } from '../resolve/resolver.js';
import { describeFile, isCertificateCandidate, isPathExcluded, listFiles } from '../scan/file-source.js';
import { ScanOrchestrator } from '../scan/scan-orchestrator.js';
import { LibraryDatabase } from '../storage/database.js';
import type { ScanOutcome, ScanProgress } from '../types/index.js';
import { FILLER as CERT_FILLER, PATENT_TEXT } from './fixtures/certificates.js';
import { candidate, FakeCatalogs, FakeLoader, FakeOcr, MemoryStore, testConfig } from './helpers.js';

const FILLER = 'We study how scanned papers can be parsed reliably.\n'.repeat(5);
const TITLE = 'Graph Neural Networks for Citation Parsing';

const DOI_RECORD = candidate({
    doi: '10.1000/meta.2020',
    title: 'Deep Learning for Document Metadata Extraction',
    authors: 'Smith, Alice; Jones, Bob',
    year: 2020,
    venue: 'Journal of Document Analysis',
});

const REVIEW_CANDIDATE = candidate({
    doi: '10.1000/graph.2021',
    title: 'Graph Neural Networks for Reference String Parsing',
    authors: 'Alice Smith',
    year: 2021,
    venue: 'Pattern Recognition Letters',
});

async function collect(
    run: AsyncGenerator<ScanProgress, ScanOutcome[], void>
): Promise<{ progress: ScanProgress[]; outcomes: ScanOutcome[] }> {
    const progress: ScanProgress[] = [];
    let step = await run.next();
    while (!step.done) {
        progress.push(step.value);
        step = await run.next();
    }
    return { progress, outcomes: step.value };
}

function runScan(
    orchestrator: ScanOrchestrator,
    root: string,
    signal?: AbortSignal
): Promise<{ progress: ScanProgress[]; outcomes: ScanOutcome[] }> {
    return collect(orchestrator.scan(root, signal));
}

describe('ScanOrchestrator', () => {
    let root: string;
    let loader: FakeLoader;
    let ocr: FakeOcr;
    let catalogs: FakeCatalogs;
    let store: MemoryStore;
    let orchestrator: ScanOrchestrator;

    function addFile(name: string, content = name): string {
        const filePath = path.join(root, name);
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, content);
        return filePath;
    }

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'scholarscan-scan-'));
        const config = testConfig();
        loader = new FakeLoader();
        ocr = new FakeOcr();
        catalogs = new FakeCatalogs({ '10.1000/meta.2020': DOI_RECORD }, [REVIEW_CANDIDATE]);
        store = new MemoryStore();
        orchestrator = new ScanOrchestrator(
            {
                store,
                extraction: new ExtractionEngine(loader, ocr, config.thresholds),
                certificates: new CertificateExtractor(loader, ocr, config.thresholds),
                resolver: new BibliographicResolver(catalogs, config.thresholds.acceptConfidence),
            },
            config
        );
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    describe('papers', () => {
        it('should resolve a native PDF with a DOI by direct lookup', async () => {
            const filePath = addFile('paper-a.pdf');
            loader.set(filePath, {
                text: `Deep Learning for Document Metadata Extraction\n\nhttps://doi.org/10.1000/meta.2020\n\n${FILLER}`,
            });

            const { progress, outcomes } = await runScan(orchestrator, root);

            expect(outcomes).toHaveLength(1);
            expect(outcomes[0]).toMatchObject({ path: 'paper-a.pdf', kind: 'paper', state: 'done', status: 'success', confidence: 100 });
            expect(progress).toEqual([
                { index: 1, total: 1, path: 'paper-a.pdf', message: 'Scanned paper-a.pdf (success)', state: 'done' },
            ]);
            expect(store.getFileByPath('paper-a.pdf')?.status).toBe('success');
            expect(store.paperFor('paper-a.pdf')).toMatchObject({
                doi: '10.1000/meta.2020',
                title: 'Deep Learning for Document Metadata Extraction',
                venue: 'Journal of Document Analysis',
                entryType: 'article',
                publicationType: 'journal',
                confidence: 100,
                source: 'doi_lookup',
            });
        });

        it('should send a scanned PDF to needs_ocr without asking the catalogs', async () => {
            const filePath = addFile('scan-b.pdf');
            loader.set(filePath, { text: 'Page 1\n' });

            const { outcomes } = await runScan(orchestrator, root);

            expect(outcomes[0]).toMatchObject({ status: 'needs_ocr', confidence: 0 });
            expect(catalogs.calls).toBe(0);
            expect(store.getFileByPath('scan-b.pdf')).toMatchObject({ status: 'needs_ocr', error: 'Text too short' });
            expect(store.paperFor('scan-b.pdf')).toMatchObject({ title: 'scan-b.pdf', confidence: 0, source: 'pdf' });
        });

        it('should leave a weak match for review without persisting its DOI', async () => {
            const filePath = addFile('paper-c.pdf');
            loader.set(filePath, {
                text: `Accepted 2021. Published 2021.\n${FILLER}`,
                info: { title: TITLE, author: 'Alice Smith' },
            });

            const { outcomes } = await runScan(orchestrator, root);

            expect(outcomes[0]?.status).toBe('needs_review');
            expect(outcomes[0]?.confidence).toBeCloseTo(65, 6);
            const paper = store.paperFor('paper-c.pdf');
            expect(paper?.source).toBe('review');
            expect(paper?.doi).toBeUndefined();
            expect(paper?.venue).toBe('Pattern Recognition Letters');
        });

        it('should not write anything when rescanning an unchanged file', async () => {
            const filePath = addFile('paper-a.pdf');
            loader.set(filePath, {
                text: `Deep Learning for Document Metadata Extraction\n\nhttps://doi.org/10.1000/meta.2020\n\n${FILLER}`,
            });
            await runScan(orchestrator, root);
            const writes = store.writes;

            const { progress, outcomes } = await runScan(orchestrator, root);

            expect(store.writes).toBe(writes);
            expect(outcomes).toEqual([{ path: 'paper-a.pdf', kind: 'paper', state: 'skipped', status: 'success' }]);
            expect(progress[0]?.message).toBe('Skipped paper-a.pdf');
            expect(loader.opened).toHaveLength(1);
        });

        it('should update the linked paper in place when the file changes', async () => {
            const filePath = addFile('paper-a.pdf', 'first version');
            loader.set(filePath, {
                text: `Deep Learning for Document Metadata Extraction\n\nhttps://doi.org/10.1000/meta.2020\n\n${FILLER}`,
            });
            const first = await runScan(orchestrator, root);

            fs.writeFileSync(filePath, 'second version');
            const second = await runScan(orchestrator, root);

            expect(second.outcomes[0]?.state).toBe('done');
            expect(second.outcomes[0]?.recordId).toBe(first.outcomes[0]?.recordId);
            expect(store.papers.size).toBe(1);
        });

        it('should mark a file that cannot be read as failed and unlinked', async () => {
            const filePath = addFile('broken.pdf');

            const { outcomes } = await runScan(orchestrator, root);

            expect(outcomes).toEqual([
                {
                    path: 'broken.pdf',
                    kind: 'paper',
                    state: 'failed',
                    status: 'failed',
                    error: `cannot open ${filePath}`,
                },
            ]);
            const stored = store.getFileByPath('broken.pdf');
            expect(stored).toMatchObject({ status: 'failed', error: `cannot open ${filePath}` });
            expect(store.links.size).toBe(0);
        });

        it('should continue with the next file after a failure', async () => {
            addFile('a-broken.pdf');
            const good = addFile('b-scan.pdf');
            loader.set(good, { text: 'short' });

            const { outcomes } = await runScan(orchestrator, root);

            expect(outcomes.map((outcome) => outcome.state)).toEqual(['failed', 'done']);
        });
    });

    describe('OCR remedy', () => {
        it('should resolve a needs_ocr paper from its OCR text and keep the same record', async () => {
            const filePath = addFile('scan-b.pdf');
            loader.set(filePath, { text: 'Page 1\n' });
            const { outcomes } = await runScan(orchestrator, root);
            ocr.text = 'Deep Learning for Document Metadata Extraction\ndoi:10.1000/meta.2020';

            const outcome = await orchestrator.remedyWithOcr(await describeFile(root, filePath));

            expect(outcome).toMatchObject({ status: 'success', confidence: 100, recordId: outcomes[0]?.recordId });
            expect(store.paperFor('scan-b.pdf')).toMatchObject({ doi: '10.1000/meta.2020', source: 'doi_lookup' });
            expect(store.papers.size).toBe(1);
        });

        it('should go on with the other pending files when one has been removed', async () => {
            const gone = addFile('a-gone.pdf');
            loader.set(gone, { text: 'Page 1\n' });
            loader.set(addFile('b-scan.pdf'), { text: 'Page 1\n' });
            await runScan(orchestrator, root);
            fs.rmSync(gone);
            ocr.text = 'Deep Learning for Document Metadata Extraction\ndoi:10.1000/meta.2020';

            const { progress, outcomes } = await collect(orchestrator.remedyPending(root));

            expect(outcomes).toHaveLength(2);
            expect(outcomes[0]).toMatchObject({ path: 'a-gone.pdf', state: 'failed', status: 'failed' });
            expect(outcomes[0]?.error).toMatch(/^ENOENT/);
            expect(outcomes[1]).toMatchObject({ path: 'b-scan.pdf', state: 'done', status: 'success' });
            expect(progress.map((step) => step.index)).toEqual([1, 2]);
            expect(store.getFileByPath('a-gone.pdf')?.status).toBe('failed');
            expect(store.paperFor('a-gone.pdf')).toBeUndefined();
            expect(ocr.calls).toEqual([{ path: path.join(root, 'b-scan.pdf'), pageIndex: 0 }]);
        });

        it('should stay in needs_ocr when OCR returns nothing', async () => {
            const filePath = addFile('scan-b.pdf');
            ocr.text = '[OCR Error] OCR service is not configured';

            const outcome = await orchestrator.remedyWithOcr(await describeFile(root, filePath));

            expect(outcome.status).toBe('needs_ocr');
            expect(store.getFileByPath('scan-b.pdf')).toMatchObject({ status: 'needs_ocr', error: 'OCR produced no text' });
            expect(store.paperFor('scan-b.pdf')).toMatchObject({ source: 'ocr', confidence: 0 });
        });
    });

    describe('certificates', () => {
        it('should record a patent certificate and skip it afterwards', async () => {
            const filePath = addFile('patent-certificate.pdf');
            loader.set(filePath, { text: `${PATENT_TEXT}\n${CERT_FILLER}` });

            const first = await runScan(orchestrator, root);
            const second = await runScan(orchestrator, root);

            expect(first.outcomes[0]).toMatchObject({ kind: 'patent', state: 'done' });
            expect(store.patents.get('patent-certificate.pdf')).toMatchObject({
                title: '一种文档元数据抽取方法',
                patentNumber: 'ZL202211551727.X',
                needsReview: false,
            });
            expect(second.outcomes).toEqual([{ path: 'patent-certificate.pdf', kind: 'certificate', state: 'skipped' }]);
        });

        it('should not record unclassified certificates so they are retried', async () => {
            addFile('scan.png');
            ocr.text = 'A photo of a whiteboard';

            const first = await runScan(orchestrator, root);
            await runScan(orchestrator, root);

            expect(first.outcomes).toEqual([{ path: 'scan.png', kind: 'unclassified', state: 'done' }]);
            expect(store.writes).toBe(0);
            expect(ocr.calls).toHaveLength(2);
        });
    });

    describe('cancellation', () => {
        it('should stop between files once aborted', async () => {
            for (const name of ['a.pdf', 'b.pdf', 'c.pdf']) {
                loader.set(addFile(name), { text: 'short' });
            }
            const controller = new AbortController();
            const run = orchestrator.scan(root, controller.signal);

            const first = await run.next();
            controller.abort();
            const last = await run.next();

            expect(first.done).toBe(false);
            if (!last.done) throw new Error('scan should have finished');
            expect(last.value.map((outcome) => outcome.path)).toEqual(['a.pdf']);
        });
    });
});

describe('ScanOrchestrator with the SQLite store', () => {
    let root: string;
    let loader: FakeLoader;
    let ocr: FakeOcr;
    let db: LibraryDatabase;
    let orchestrator: ScanOrchestrator;

    function addFile(name: string, content = name): string {
        const filePath = path.join(root, name);
        fs.writeFileSync(filePath, content);
        return filePath;
    }

    function paperRows(): Array<{ title: string; doi: string | null; source: string; confidence: number }> {
        return db
            .getRawDb()
            .prepare<[], { title: string; doi: string | null; source: string; confidence: number }>(
                'SELECT title, doi, source, confidence FROM papers ORDER BY id'
            )
            .all();
    }

    function links(): Array<{ path: string; doi: string | null }> {
        return db
            .getRawDb()
            .prepare<[], { path: string; doi: string | null }>(`
      SELECT f.path AS path, p.doi AS doi FROM paper_files pf
      JOIN papers p ON p.id = pf.paper_id
      JOIN pdf_files f ON f.id = pf.file_id
      ORDER BY f.path, p.doi
    `)
            .all();
    }

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'scholarscan-sqlite-'));
        const config = testConfig();
        loader = new FakeLoader();
        ocr = new FakeOcr();
        const catalogs = new FakeCatalogs({
            '10.1000/aaa.1': candidate({ doi: '10.1000/aaa.1', title: 'First Catalogued Paper', year: 2020 }),
            '10.1000/bbb.2': candidate({ doi: '10.1000/bbb.2', title: 'Second Catalogued Paper', year: 2021 }),
        });
        db = new LibraryDatabase(path.join(root, 'library.db'));
        orchestrator = new ScanOrchestrator(
            {
                store: db,
                extraction: new ExtractionEngine(loader, ocr, config.thresholds),
                certificates: new CertificateExtractor(loader, ocr, config.thresholds),
                resolver: new BibliographicResolver(catalogs, config.thresholds.acceptConfidence),
            },
            config
        );
    });

    afterEach(() => {
        db.close();
        fs.rmSync(root, { recursive: true, force: true });
    });

    it('should keep the recorded paper when the OCR remedy fails', async () => {
        const filePath = addFile('scan.pdf');
        loader.set(filePath, { text: 'Page 1\n', info: { title: 'Real Metadata Title' } });
        await runScan(orchestrator, root);
        ocr.text = '[OCR Error] down';

        const outcome = await orchestrator.remedyWithOcr(await describeFile(root, filePath));

        expect(outcome.status).toBe('needs_ocr');
        expect(paperRows()).toEqual([{ title: 'Real Metadata Title', doi: null, source: 'pdf', confidence: 0 }]);
        expect(db.getFileByPath('scan.pdf')).toMatchObject({ status: 'needs_ocr', error: 'OCR produced no text' });
        expect(links()).toEqual([{ path: 'scan.pdf', doi: null }]);
    });

    it('should move a changed file to the paper that owns its new DOI', async () => {
        loader.set(addFile('a.pdf'), { text: `First Catalogued Paper\n\ndoi:10.1000/aaa.1\n\n${FILLER}` });
        const second = addFile('b.pdf');
        loader.set(second, { text: `Second Catalogued Paper\n\ndoi:10.1000/bbb.2\n\n${FILLER}` });
        await runScan(orchestrator, root);

        fs.writeFileSync(second, 'rewritten');
        loader.set(second, { text: `First Catalogued Paper\n\ndoi:10.1000/aaa.1\n\n${FILLER}` });
        const { outcomes } = await runScan(orchestrator, root);

        expect(outcomes.map((outcome) => outcome.state)).toEqual(['skipped', 'done']);
        expect(links()).toEqual([
            { path: 'a.pdf', doi: '10.1000/aaa.1' },
            { path: 'b.pdf', doi: '10.1000/aaa.1' },
        ]);
    });
});

describe('file source', () => {
    let root: string;

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'scholarscan-files-'));
        for (const name of ['b.pdf', 'a.PDF', 'notes.txt', 'skip/c.pdf', 'sub/d.png']) {
            fs.mkdirSync(path.dirname(path.join(root, name)), { recursive: true });
            fs.writeFileSync(path.join(root, name), name);
        }
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    it('should list scanned extensions in name order outside excluded folders', async () => {
        const config = { ...testConfig().scan, excludedFolders: ['skip/'] };

        const files = await listFiles(root, config);

        expect(files.map((file) => path.relative(root, file).split(path.sep).join('/'))).toEqual([
            'a.PDF',
            'b.pdf',
            'sub/d.png',
        ]);
    });

    it('should describe a file relative to the root with its SHA-256', async () => {
        const file = await describeFile(root, path.join(root, 'sub', 'd.png'));

        expect(file.relPath).toBe('sub/d.png');
        expect(file.filename).toBe('d.png');
        expect(file.size).toBe(9);
        expect(file.sha256).toMatch(/^[0-9a-f]{64}$/);
    });

    it('should match excluded folders on whole path segments', () => {
        expect(isPathExcluded('skip/c.pdf', ['skip'])).toBe(true);
        expect(isPathExcluded('skipped/c.pdf', ['skip'])).toBe(false);
    });

    it('should route images and keyword file names to the certificate flow', () => {
        const keywords = testConfig().scan.certificateKeywords;
        expect(isCertificateCandidate('/x/photo.JPG', keywords)).toBe(true);
        expect(isCertificateCandidate('/x/软著登记.pdf', keywords)).toBe(true);
        expect(isCertificateCandidate('/x/Patent-2023.pdf', keywords)).toBe(true);
        expect(isCertificateCandidate('/x/paper.pdf', keywords)).toBe(false);
    });
});

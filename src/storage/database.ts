import Database from 'better-sqlite3';
import type {
    FileDescriptor,
    PaperRecord,
    PatentRecord,
    ProcessingStatus,
    RecordStore,
    SoftwareRecord,
    StoredFile,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 * Source files, the three record types, and the paper/file links.
 */
const MIGRATION_V1 = `
-- Source files seen by the scanner, keyed by path relative to the scan root
CREATE TABLE IF NOT EXISTS pdf_files (
  id INTEGER PRIMARY KEY,
  path TEXT NOT NULL UNIQUE,
  filename TEXT,
  sha256 TEXT NOT NULL,
  size INTEGER NOT NULL,
  mtime REAL NOT NULL,
  status TEXT NOT NULL DEFAULT 'pending'
    CHECK (status IN ('pending', 'needs_ocr', 'needs_review', 'success', 'failed')),
  error TEXT,
  added_at TEXT NOT NULL DEFAULT (datetime('now')),
  last_scanned_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Papers: one row per work; DOI is NULL when unknown
CREATE TABLE IF NOT EXISTS papers (
  id INTEGER PRIMARY KEY,
  title TEXT NOT NULL,
  authors TEXT,
  year INTEGER,
  venue TEXT,
  doi TEXT UNIQUE,
  url TEXT,
  volume TEXT,
  issue TEXT,
  pages TEXT,
  entry_type TEXT NOT NULL DEFAULT 'article' CHECK (entry_type IN ('article', 'inproceedings')),
  publication_type TEXT NOT NULL DEFAULT 'other' CHECK (publication_type IN ('journal', 'conference', 'other')),
  confidence REAL NOT NULL DEFAULT 0,
  source TEXT NOT NULL DEFAULT 'pdf',
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Paper-file junction
CREATE TABLE IF NOT EXISTS paper_files (
  paper_id INTEGER NOT NULL REFERENCES papers(id) ON DELETE CASCADE,
  file_id INTEGER NOT NULL REFERENCES pdf_files(id) ON DELETE CASCADE,
  PRIMARY KEY (paper_id, file_id)
);

-- Patent certificates, one per certificate file
CREATE TABLE IF NOT EXISTS patents (
  id INTEGER PRIMARY KEY,
  title TEXT NOT NULL,
  patent_type TEXT NOT NULL DEFAULT '发明',
  patent_number TEXT,
  grant_number TEXT,
  inventors TEXT,
  patentee TEXT,
  application_date TEXT,
  grant_date TEXT,
  file_path TEXT NOT NULL UNIQUE,
  needs_review INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Software copyright registrations, one per certificate file
CREATE TABLE IF NOT EXISTS softwares (
  id INTEGER PRIMARY KEY,
  title TEXT NOT NULL,
  software_name TEXT,
  version TEXT,
  registration_number TEXT,
  copyright_holder TEXT,
  development_date TEXT,
  file_path TEXT NOT NULL UNIQUE,
  needs_review INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS idx_pdf_files_status ON pdf_files(status);
CREATE INDEX IF NOT EXISTS idx_paper_files_file ON paper_files(file_id);
CREATE INDEX IF NOT EXISTS idx_papers_title ON papers(title);
CREATE INDEX IF NOT EXISTS idx_patents_number ON patents(patent_number);
CREATE INDEX IF NOT EXISTS idx_softwares_number ON softwares(registration_number);
`;

interface FileRow {
    id: number;
    path: string;
    sha256: string;
    size: number;
    mtime: number;
    status: ProcessingStatus;
    error: string | null;
}

interface IdRow {
    id: number;
}

interface CountRow {
    count: number;
}

export interface LibraryStats {
    files: number;
    papers: number;
    patents: number;
    softwares: number;
    filesByStatus: Partial<Record<ProcessingStatus, number>>;
    certificatesNeedingReview: number;
}

/**
 * Library database wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and the record store operations.
 */
export class LibraryDatabase implements RecordStore {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        // Run migrations
        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = Number(this.db.pragma('user_version', { simple: true }));

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }
    }

    // ─── Files ────────────────────────────────────────────────

    getFileByPath(relPath: string): StoredFile | undefined {
        return this.db
            .prepare<[string], FileRow>('SELECT id, path, sha256, size, mtime, status, error FROM pdf_files WHERE path = ?')
            .get(relPath);
    }

    getFilesByStatus(status: ProcessingStatus): StoredFile[] {
        return this.db
            .prepare<[string], FileRow>(
                'SELECT id, path, sha256, size, mtime, status, error FROM pdf_files WHERE status = ? ORDER BY path'
            )
            .all(status);
    }

    upsertFile(file: FileDescriptor, status: ProcessingStatus, error?: string): number {
        const row = this.db
            .prepare<[Record<string, string | number | null>], IdRow>(`
      INSERT INTO pdf_files (path, filename, sha256, size, mtime, status, error)
      VALUES (@path, @filename, @sha256, @size, @mtime, @status, @error)
      ON CONFLICT(path) DO UPDATE SET
        filename = excluded.filename,
        sha256 = excluded.sha256,
        size = excluded.size,
        mtime = excluded.mtime,
        status = excluded.status,
        error = excluded.error,
        last_scanned_at = datetime('now')
      RETURNING id
    `)
            .get({
                path: file.relPath,
                filename: file.filename,
                sha256: file.sha256,
                size: file.size,
                mtime: file.mtime,
                status,
                error: error ?? null,
            });
        if (!row) throw new Error(`Failed to upsert file ${file.relPath}`);
        return row.id;
    }

    setStatus(fileId: number, status: ProcessingStatus, error?: string): void {
        this.db
            .prepare("UPDATE pdf_files SET status = ?, error = ?, last_scanned_at = datetime('now') WHERE id = ?")
            .run(status, error ?? null, fileId);
    }

    // ─── Papers ───────────────────────────────────────────────

    /**
     * A row carrying the same DOI always wins, so a DOI is never stored twice.
     * Otherwise `existingId` is updated in place, or a new row is inserted.
     * The DOI is written as given, so an update can clear it.
     */
    upsertPaper(paper: PaperRecord, existingId?: number): number {
        const params = {
            title: paper.title,
            authors: paper.authors ?? null,
            year: paper.year ?? null,
            venue: paper.venue ?? null,
            doi: paper.doi ?? null,
            url: paper.url ?? null,
            volume: paper.volume ?? null,
            issue: paper.issue ?? null,
            pages: paper.pages ?? null,
            entry_type: paper.entryType,
            publication_type: paper.publicationType,
            confidence: paper.confidence,
            source: paper.source,
        };

        const byDoi = paper.doi
            ? this.db.prepare<[string], IdRow>('SELECT id FROM papers WHERE doi = ?').get(paper.doi)?.id
            : undefined;
        const targetId = byDoi ?? existingId;

        if (targetId !== undefined) {
            this.db
                .prepare(`
      UPDATE papers SET
        title = @title,
        authors = COALESCE(@authors, authors),
        year = COALESCE(@year, year),
        venue = COALESCE(@venue, venue),
        doi = @doi,
        url = COALESCE(@url, url),
        volume = COALESCE(@volume, volume),
        issue = COALESCE(@issue, issue),
        pages = COALESCE(@pages, pages),
        entry_type = @entry_type,
        publication_type = @publication_type,
        confidence = @confidence,
        source = @source,
        updated_at = datetime('now')
      WHERE id = @id
    `)
                .run({ ...params, id: targetId });
            return targetId;
        }

        const row = this.db
            .prepare<[typeof params], IdRow>(`
      INSERT INTO papers (title, authors, year, venue, doi, url, volume, issue, pages, entry_type, publication_type, confidence, source)
      VALUES (@title, @authors, @year, @venue, @doi, @url, @volume, @issue, @pages, @entry_type, @publication_type, @confidence, @source)
      RETURNING id
    `)
            .get(params);
        if (!row) throw new Error(`Failed to insert paper "${paper.title}"`);
        return row.id;
    }

    isFileLinked(fileId: number): boolean {
        return this.getLinkedPaperId(fileId) !== undefined;
    }

    getLinkedPaperId(fileId: number): number | undefined {
        return this.db
            .prepare<[number], { paper_id: number }>(
                'SELECT paper_id FROM paper_files WHERE file_id = ? ORDER BY paper_id LIMIT 1'
            )
            .get(fileId)?.paper_id;
    }

    linkPaperFile(paperId: number, fileId: number): void {
        this.db.prepare('INSERT OR IGNORE INTO paper_files (paper_id, file_id) VALUES (?, ?)').run(paperId, fileId);
    }

    unlinkFile(fileId: number): void {
        this.db.prepare('DELETE FROM paper_files WHERE file_id = ?').run(fileId);
    }

    // ─── Certificates ─────────────────────────────────────────

    isCertificateLinked(relPath: string): boolean {
        const row = this.db
            .prepare<[string, string], { found: number }>(`
      SELECT 1 AS found FROM patents WHERE file_path = ?
      UNION ALL
      SELECT 1 AS found FROM softwares WHERE file_path = ?
      LIMIT 1
    `)
            .get(relPath, relPath);
        return row !== undefined;
    }

    upsertPatent(patent: PatentRecord): number {
        const row = this.db
            .prepare<[Record<string, string | number | null>], IdRow>(`
      INSERT INTO patents (title, patent_type, patent_number, grant_number, inventors, patentee, application_date, grant_date, file_path, needs_review)
      VALUES (@title, @patent_type, @patent_number, @grant_number, @inventors, @patentee, @application_date, @grant_date, @file_path, @needs_review)
      ON CONFLICT(file_path) DO UPDATE SET
        title = excluded.title,
        patent_type = excluded.patent_type,
        patent_number = excluded.patent_number,
        grant_number = excluded.grant_number,
        inventors = excluded.inventors,
        patentee = excluded.patentee,
        application_date = excluded.application_date,
        grant_date = excluded.grant_date,
        needs_review = excluded.needs_review,
        updated_at = datetime('now')
      RETURNING id
    `)
            .get({
                title: patent.title,
                patent_type: patent.patentType,
                patent_number: patent.patentNumber ?? null,
                grant_number: patent.grantNumber ?? null,
                inventors: patent.inventors ?? null,
                patentee: patent.patentee ?? null,
                application_date: patent.applicationDate ?? null,
                grant_date: patent.grantDate ?? null,
                file_path: patent.filePath,
                needs_review: patent.needsReview ? 1 : 0,
            });
        if (!row) throw new Error(`Failed to upsert patent for ${patent.filePath}`);
        return row.id;
    }

    upsertSoftware(software: SoftwareRecord): number {
        const row = this.db
            .prepare<[Record<string, string | number | null>], IdRow>(`
      INSERT INTO softwares (title, software_name, version, registration_number, copyright_holder, development_date, file_path, needs_review)
      VALUES (@title, @software_name, @version, @registration_number, @copyright_holder, @development_date, @file_path, @needs_review)
      ON CONFLICT(file_path) DO UPDATE SET
        title = excluded.title,
        software_name = excluded.software_name,
        version = excluded.version,
        registration_number = excluded.registration_number,
        copyright_holder = excluded.copyright_holder,
        development_date = excluded.development_date,
        needs_review = excluded.needs_review,
        updated_at = datetime('now')
      RETURNING id
    `)
            .get({
                title: software.title,
                software_name: software.softwareName ?? null,
                version: software.version ?? null,
                registration_number: software.registrationNumber ?? null,
                copyright_holder: software.copyrightHolder ?? null,
                development_date: software.developmentDate ?? null,
                file_path: software.filePath,
                needs_review: software.needsReview ? 1 : 0,
            });
        if (!row) throw new Error(`Failed to upsert software for ${software.filePath}`);
        return row.id;
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): LibraryStats {
        const count = (sql: string): number => this.db.prepare<[], CountRow>(sql).get()?.count ?? 0;

        const filesByStatus: LibraryStats['filesByStatus'] = {};
        const statusRows = this.db
            .prepare<[], { status: ProcessingStatus; count: number }>(
                'SELECT status, COUNT(*) AS count FROM pdf_files GROUP BY status'
            )
            .all();
        for (const row of statusRows) {
            filesByStatus[row.status] = row.count;
        }

        return {
            files: count('SELECT COUNT(*) AS count FROM pdf_files'),
            papers: count('SELECT COUNT(*) AS count FROM papers'),
            patents: count('SELECT COUNT(*) AS count FROM patents'),
            softwares: count('SELECT COUNT(*) AS count FROM softwares'),
            filesByStatus,
            certificatesNeedingReview:
                count('SELECT COUNT(*) AS count FROM patents WHERE needs_review = 1') +
                count('SELECT COUNT(*) AS count FROM softwares WHERE needs_review = 1'),
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Execute a function within a transaction.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}

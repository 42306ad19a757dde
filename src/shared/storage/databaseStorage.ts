/**
 * Database Storage
 *
 * SQLite implementation of ResumeStore over better-sqlite3.
 *
 * Schema:
 *   resumes(id, name, target_role, resume_data, created_at, updated_at)
 *   cover_letters(id, resume_id -> resumes.id ON DELETE CASCADE, company_name,
 *                 job_title, content, created_at, updated_at)
 *
 * Resume data is stored as an opaque JSON blob.
 */

import Database from 'better-sqlite3';
import { ErrorHandler } from '../errors';
import { loggers } from '../logging';
import type {
  CoverLetterRecord,
  ExportDocument,
  ResumeRecord,
  ResumeSummary,
  SaveCoverLetterInput,
  SaveResumeInput
} from '../types';
import { ExportDocumentSchema, parseWithSchema } from '../validation';
import { ImportCounts, ResumeStore } from './interface';

// ============================================================================
// Types
// ============================================================================

export interface DatabaseStorageOptions {
  /**
   * Path to the SQLite database file
   * Use ':memory:' for an in-memory database (useful for testing)
   */
  databasePath: string;

  /**
   * Enable WAL mode for file databases
   * Default: true
   */
  walMode?: boolean;

  /** Clock used for created/updated timestamps */
  now?: () => Date;
}

interface ResumeRow {
  id: number;
  name: string;
  target_role: string | null;
  resume_data: string;
  created_at: string;
  updated_at: string;
}

type ResumeSummaryRow = Omit<ResumeRow, 'resume_data'>;

interface CoverLetterRow {
  id: number;
  resume_id: number | null;
  company_name: string;
  job_title: string;
  content: string;
  created_at: string;
  updated_at: string;
}

// ============================================================================
// Schema Migration
// ============================================================================

const SCHEMA_VERSION = 1;

const MIGRATIONS: Record<number, string[]> = {
  1: [
    `CREATE TABLE IF NOT EXISTS resumes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      target_role TEXT,
      resume_data TEXT NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )`,
    `CREATE TABLE IF NOT EXISTS cover_letters (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      resume_id INTEGER REFERENCES resumes(id) ON DELETE CASCADE,
      company_name TEXT NOT NULL DEFAULT '',
      job_title TEXT NOT NULL,
      content TEXT NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )`,
    `CREATE INDEX IF NOT EXISTS idx_resumes_updated ON resumes(updated_at)`,
    `CREATE INDEX IF NOT EXISTS idx_cover_letters_resume ON cover_letters(resume_id)`,
  ],
};

const RESUME_COLUMNS = 'id, name, target_role, created_at, updated_at';
const COVER_LETTER_COLUMNS = 'id, resume_id, company_name, job_title, content, created_at, updated_at';
const NEWEST_FIRST = 'ORDER BY updated_at DESC, id DESC';

function isForeignKeyViolation(error: unknown): boolean {
  return typeof error === 'object'
    && error !== null
    && 'code' in error
    && error.code === 'SQLITE_CONSTRAINT_FOREIGNKEY';
}

function toResumeSummary(row: ResumeSummaryRow): ResumeSummary {
  return {
    id: row.id,
    name: row.name,
    targetRole: row.target_role,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function toCoverLetter(row: CoverLetterRow): CoverLetterRecord {
  return {
    id: row.id,
    resumeId: row.resume_id,
    companyName: row.company_name,
    jobTitle: row.job_title,
    content: row.content,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function normalizeTargetRole(targetRole: string | null | undefined): string | null {
  const trimmed = targetRole?.trim();
  return trimmed ? trimmed : null;
}

// ============================================================================
// Database Storage Implementation
// ============================================================================

export class DatabaseStorage implements ResumeStore {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(options: DatabaseStorageOptions) {
    this.now = options.now ?? (() => new Date());
    this.db = new Database(options.databasePath);

    if (options.walMode !== false && options.databasePath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');

    this.runMigrations();
  }

  private runMigrations(): void {
    this.db.exec('CREATE TABLE IF NOT EXISTS schema_version (version INTEGER PRIMARY KEY)');

    const row = this.db
      .prepare<[], { version: number }>('SELECT version FROM schema_version ORDER BY version DESC LIMIT 1')
      .get();
    const currentVersion = row?.version ?? 0;

    for (let v = currentVersion + 1; v <= SCHEMA_VERSION; v++) {
      const statements = MIGRATIONS[v];
      if (statements) {
        const transaction = this.db.transaction(() => {
          for (const sql of statements) {
            this.db.exec(sql);
          }
          this.db.prepare('INSERT OR REPLACE INTO schema_version (version) VALUES (?)').run(v);
        });
        transaction();
        loggers.db.info({ version: v }, 'Migrated database schema');
      }
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  /**
   * Run a store operation, turning driver errors into STORAGE AppErrors
   */
  private run<T>(operation: string, action: () => T): T {
    return ErrorHandler.handle(action, (error) => {
      if (isForeignKeyViolation(error)) {
        return ErrorHandler.createValidationError(
          'The linked resume does not exist',
          error instanceof Error ? error.message : String(error),
          { operation }
        );
      }
      return ErrorHandler.createStorageError(
        'Could not access saved data',
        error instanceof Error ? error.message : String(error),
        { operation }
      );
    });
  }

  // ============================================================================
  // Resumes
  // ============================================================================

  saveResume(input: SaveResumeInput): number {
    return this.run('saveResume', () => {
      const name = input.name.trim();
      if (!name) {
        throw ErrorHandler.createValidationError('Resume name is required', 'name is blank');
      }

      const targetRole = normalizeTargetRole(input.targetRole);
      const data = JSON.stringify(input.data ?? null);
      const timestamp = this.timestamp();

      if (input.id !== undefined) {
        const result = this.db
          .prepare(`UPDATE resumes SET name = ?, target_role = ?, resume_data = ?, updated_at = ? WHERE id = ?`)
          .run(name, targetRole, data, timestamp, input.id);
        if (result.changes === 0) {
          throw ErrorHandler.createNotFoundError(`Resume ${input.id} not found`, { id: input.id });
        }
        loggers.db.debug({ id: input.id }, 'Resume updated');
        return input.id;
      }

      const result = this.db
        .prepare(`INSERT INTO resumes (name, target_role, resume_data, created_at, updated_at) VALUES (?, ?, ?, ?, ?)`)
        .run(name, targetRole, data, timestamp, timestamp);
      const id = Number(result.lastInsertRowid);
      loggers.db.debug({ id }, 'Resume created');
      return id;
    });
  }

  getResume(id: number): ResumeRecord | null {
    return this.run('getResume', () => {
      const row = this.db
        .prepare<[number], ResumeRow>(`SELECT ${RESUME_COLUMNS}, resume_data FROM resumes WHERE id = ?`)
        .get(id);
      if (!row) return null;

      const data: unknown = JSON.parse(row.resume_data);
      return { ...toResumeSummary(row), data };
    });
  }

  listResumes(): ResumeSummary[] {
    return this.run('listResumes', () =>
      this.db
        .prepare<[], ResumeSummaryRow>(`SELECT ${RESUME_COLUMNS} FROM resumes ${NEWEST_FIRST}`)
        .all()
        .map(toResumeSummary)
    );
  }

  deleteResume(id: number): boolean {
    return this.run('deleteResume', () => {
      const remove = this.db.transaction((resumeId: number) => {
        this.db.prepare('DELETE FROM cover_letters WHERE resume_id = ?').run(resumeId);
        return this.db.prepare('DELETE FROM resumes WHERE id = ?').run(resumeId).changes > 0;
      });
      return remove(id);
    });
  }

  // ============================================================================
  // Cover letters
  // ============================================================================

  saveCoverLetter(input: SaveCoverLetterInput): number {
    return this.run('saveCoverLetter', () => {
      const resumeId = input.resumeId ?? null;
      const timestamp = this.timestamp();

      if (input.id !== undefined) {
        // An omitted resumeId keeps the stored link; only an explicit null clears it
        const result = input.resumeId === undefined
          ? this.db
            .prepare(`UPDATE cover_letters SET company_name = ?, job_title = ?, content = ?, updated_at = ? WHERE id = ?`)
            .run(input.companyName, input.jobTitle, input.content, timestamp, input.id)
          : this.db
            .prepare(`UPDATE cover_letters SET resume_id = ?, company_name = ?, job_title = ?, content = ?, updated_at = ? WHERE id = ?`)
            .run(resumeId, input.companyName, input.jobTitle, input.content, timestamp, input.id);
        if (result.changes === 0) {
          throw ErrorHandler.createNotFoundError(`Cover letter ${input.id} not found`, { id: input.id });
        }
        return input.id;
      }

      const result = this.db
        .prepare(`INSERT INTO cover_letters (resume_id, company_name, job_title, content, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)`)
        .run(resumeId, input.companyName, input.jobTitle, input.content, timestamp, timestamp);
      return Number(result.lastInsertRowid);
    });
  }

  getCoverLetter(id: number): CoverLetterRecord | null {
    return this.run('getCoverLetter', () => {
      const row = this.db
        .prepare<[number], CoverLetterRow>(`SELECT ${COVER_LETTER_COLUMNS} FROM cover_letters WHERE id = ?`)
        .get(id);
      return row ? toCoverLetter(row) : null;
    });
  }

  listCoverLetters(): CoverLetterRecord[] {
    return this.run('listCoverLetters', () =>
      this.db
        .prepare<[], CoverLetterRow>(`SELECT ${COVER_LETTER_COLUMNS} FROM cover_letters ${NEWEST_FIRST}`)
        .all()
        .map(toCoverLetter)
    );
  }

  listCoverLettersForResume(resumeId: number): CoverLetterRecord[] {
    return this.run('listCoverLettersForResume', () =>
      this.db
        .prepare<[number], CoverLetterRow>(
          `SELECT ${COVER_LETTER_COLUMNS} FROM cover_letters WHERE resume_id = ? ${NEWEST_FIRST}`
        )
        .all(resumeId)
        .map(toCoverLetter)
    );
  }

  deleteCoverLetter(id: number): boolean {
    return this.run('deleteCoverLetter', () =>
      this.db.prepare('DELETE FROM cover_letters WHERE id = ?').run(id).changes > 0
    );
  }

  // ============================================================================
  // Backup
  // ============================================================================

  exportAll(): string {
    return this.run('exportAll', () => {
      const resumes = this.db
        .prepare<[], ResumeRow>(`SELECT ${RESUME_COLUMNS}, resume_data FROM resumes ORDER BY id`)
        .all()
        .map((row): ResumeRecord => {
          const data: unknown = JSON.parse(row.resume_data);
          return { ...toResumeSummary(row), data };
        });
      const coverLetters = this.db
        .prepare<[], CoverLetterRow>(`SELECT ${COVER_LETTER_COLUMNS} FROM cover_letters ORDER BY id`)
        .all()
        .map(toCoverLetter);

      const document: ExportDocument = { exportDate: this.timestamp(), resumes, coverLetters };
      return JSON.stringify(document, null, 2);
    });
  }

  /**
   * Validate an export document and replace all stored data with it,
   * keeping ids and timestamps. Nothing changes when validation fails.
   */
  importAll(json: string): ImportCounts {
    return this.run('importAll', () => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(json);
      } catch (error) {
        throw ErrorHandler.createValidationError(
          'Import file is not valid JSON',
          error instanceof Error ? error.message : String(error)
        );
      }
      const document = parseWithSchema(ExportDocumentSchema, parsed, 'export document');

      const replace = this.db.transaction(() => {
        this.db.prepare('DELETE FROM cover_letters').run();
        this.db.prepare('DELETE FROM resumes').run();

        const insertResume = this.db.prepare(
          `INSERT INTO resumes (id, name, target_role, resume_data, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)`
        );
        for (const resume of document.resumes) {
          insertResume.run(
            resume.id,
            resume.name,
            resume.targetRole,
            JSON.stringify(resume.data),
            resume.createdAt,
            resume.updatedAt
          );
        }

        const insertCoverLetter = this.db.prepare(
          `INSERT INTO cover_letters (id, resume_id, company_name, job_title, content, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?, ?)`
        );
        for (const letter of document.coverLetters) {
          insertCoverLetter.run(
            letter.id,
            letter.resumeId,
            letter.companyName,
            letter.jobTitle,
            letter.content,
            letter.createdAt,
            letter.updatedAt
          );
        }
      });
      replace();

      const counts = { resumes: document.resumes.length, coverLetters: document.coverLetters.length };
      loggers.db.info(counts, 'Imported export document');
      return counts;
    });
  }

  clear(): void {
    this.run('clear', () => {
      this.db.transaction(() => {
        this.db.prepare('DELETE FROM cover_letters').run();
        this.db.prepare('DELETE FROM resumes').run();
      })();
    });
  }

  close(): void {
    this.db.close();
  }
}


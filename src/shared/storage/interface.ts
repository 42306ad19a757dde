/**
 * Resume Store Interface
 *
 * Persistence for saved resumes and cover letters. Operations are
 * synchronous; each one is a single statement or transaction.
 */

import type {
  CoverLetterRecord,
  ResumeRecord,
  ResumeSummary,
  SaveCoverLetterInput,
  SaveResumeInput
} from '../types';

export interface ImportCounts {
  resumes: number;
  coverLetters: number;
}

export interface ResumeStore {
  /**
   * Insert a resume, or update it when `id` is given
   * @returns The record id
   * @throws NOT_FOUND AppError when updating an id that does not exist
   */
  saveResume(input: SaveResumeInput): number;

  getResume(id: number): ResumeRecord | null;

  /** Most recently updated first */
  listResumes(): ResumeSummary[];

  /** Deletes the resume and every cover letter linked to it */
  deleteResume(id: number): boolean;

  /**
   * @throws VALIDATION AppError when `resumeId` names a missing resume
   */
  saveCoverLetter(input: SaveCoverLetterInput): number;

  getCoverLetter(id: number): CoverLetterRecord | null;

  listCoverLetters(): CoverLetterRecord[];

  listCoverLettersForResume(resumeId: number): CoverLetterRecord[];

  deleteCoverLetter(id: number): boolean;

  /** Serialize everything to a single JSON document */
  exportAll(): string;

  /** Replace all data with the contents of an export document */
  importAll(json: string): ImportCounts;

  clear(): void;

  close(): void;
}

/**
 * Resume routes - CRUD over saved resumes and their linked cover letters.
 */

import { Router, Request, Response } from 'express';
import type { ResumeStore } from '../../shared/storage';
import { ErrorHandler } from '../../shared/errors';
import { loggers } from '../../shared/logging';
import { parseWithSchema, RecordIdSchema, SaveResumeInputSchema } from '../../shared/validation';

const resumeLogger = loggers.api;

export function parseRecordId(value: unknown): number {
  return parseWithSchema(RecordIdSchema, value, 'id');
}

export function createResumesRouter(storage: ResumeStore): Router {
  const router = Router();

  /**
   * GET /api/resumes
   * List saved resumes, most recently updated first (without their data)
   */
  router.get('/', (_req: Request, res: Response) => {
    res.json({ success: true, resumes: storage.listResumes() });
  });

  /**
   * GET /api/resumes/:id
   */
  router.get('/:id', (req: Request, res: Response) => {
    const id = parseRecordId(req.params.id);
    const resume = storage.getResume(id);
    if (!resume) {
      throw ErrorHandler.createNotFoundError(`Resume ${id} not found`, { id });
    }
    res.json({ success: true, resume });
  });

  /**
   * POST /api/resumes
   * Create a resume, or update one when the body carries an id.
   *
   * Request body:
   * - id?: number
   * - name: string
   * - targetRole?: string
   * - data: resume snapshot
   */
  router.post('/', (req: Request, res: Response) => {
    const input = parseWithSchema(SaveResumeInputSchema, req.body, 'resume');
    const id = storage.saveResume(input);
    resumeLogger.info({ id, updated: input.id !== undefined }, 'Resume saved');
    res.status(input.id === undefined ? 201 : 200).json({ success: true, id });
  });

  /**
   * DELETE /api/resumes/:id
   * Also deletes every cover letter linked to the resume
   */
  router.delete('/:id', (req: Request, res: Response) => {
    const id = parseRecordId(req.params.id);
    if (!storage.deleteResume(id)) {
      throw ErrorHandler.createNotFoundError(`Resume ${id} not found`, { id });
    }
    res.json({ success: true });
  });

  /**
   * GET /api/resumes/:id/cover-letters
   */
  router.get('/:id/cover-letters', (req: Request, res: Response) => {
    const id = parseRecordId(req.params.id);
    if (!storage.getResume(id)) {
      throw ErrorHandler.createNotFoundError(`Resume ${id} not found`, { id });
    }
    res.json({ success: true, coverLetters: storage.listCoverLettersForResume(id) });
  });

  return router;
}

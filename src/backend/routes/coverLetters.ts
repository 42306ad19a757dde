/**
 * Cover letter routes - CRUD over saved cover letters.
 */

import { Router, Request, Response } from 'express';
import type { ResumeStore } from '../../shared/storage';
import { ErrorHandler } from '../../shared/errors';
import { parseWithSchema, SaveCoverLetterInputSchema } from '../../shared/validation';
import { parseRecordId } from './resumes';

export function createCoverLettersRouter(storage: ResumeStore): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ success: true, coverLetters: storage.listCoverLetters() });
  });

  router.get('/:id', (req: Request, res: Response) => {
    const id = parseRecordId(req.params.id);
    const coverLetter = storage.getCoverLetter(id);
    if (!coverLetter) {
      throw ErrorHandler.createNotFoundError(`Cover letter ${id} not found`, { id });
    }
    res.json({ success: true, coverLetter });
  });

  /**
   * POST /api/cover-letters
   * Create, or update when the body carries an id. A resumeId that names
   * no saved resume is rejected with 400.
   */
  router.post('/', (req: Request, res: Response) => {
    const input = parseWithSchema(SaveCoverLetterInputSchema, req.body, 'cover letter');
    const id = storage.saveCoverLetter(input);
    res.status(input.id === undefined ? 201 : 200).json({ success: true, id });
  });

  router.delete('/:id', (req: Request, res: Response) => {
    const id = parseRecordId(req.params.id);
    if (!storage.deleteCoverLetter(id)) {
      throw ErrorHandler.createNotFoundError(`Cover letter ${id} not found`, { id });
    }
    res.json({ success: true });
  });

  return router;
}

/**
 * AI routes - content generation on behalf of the resume and cover letter forms.
 *
 * API keys stay on the server. Every generation endpoint answers 200 with
 * the generator outcome, `{ success: true, content }` or
 * `{ success: false, error }`; only malformed requests get an error status.
 */

import { Router, Request, Response } from 'express';
import type { ContentGenerator } from '../../shared/generation';
import { ErrorHandler } from '../../shared/errors';
import { loggers } from '../../shared/logging';
import type { ResumeStore } from '../../shared/storage';
import type { ResumeSnapshot } from '../../shared/types';
import {
  BulletsRequestSchema,
  CoverLetterRequestSchema,
  parseResumeSnapshot,
  parseWithSchema,
  ProjectRequestSchema,
  ResumeSnapshotSchema,
  SkillsRequestSchema,
  SummaryRequestSchema
} from '../../shared/validation';
import { asyncHandler } from '../middleware/errorHandler';

const aiLogger = loggers.generation;

export interface AiRouterDeps {
  generator: ContentGenerator;
  storage: ResumeStore;
}

export function createAiRouter({ generator, storage }: AiRouterDeps): Router {
  const router = Router();

  /**
   * GET /api/ai/status
   */
  router.get('/status', (_req: Request, res: Response) => {
    const provider = generator.getProviderName();
    res.json({ success: true, provider, ready: provider !== 'None' });
  });

  router.post('/summary', asyncHandler(async (req: Request, res: Response) => {
    const request = parseWithSchema(SummaryRequestSchema, req.body, 'summary request');
    res.json(await generator.generateSummary(request));
  }));

  router.post('/bullets', asyncHandler(async (req: Request, res: Response) => {
    const request = parseWithSchema(BulletsRequestSchema, req.body, 'bullet point request');
    res.json(await generator.generateExperienceBullets(request));
  }));

  router.post('/project', asyncHandler(async (req: Request, res: Response) => {
    const request = parseWithSchema(ProjectRequestSchema, req.body, 'project request');
    res.json(await generator.enhanceProjectDescription(request));
  }));

  router.post('/skills', asyncHandler(async (req: Request, res: Response) => {
    const request = parseWithSchema(SkillsRequestSchema, req.body, 'skills request');
    res.json(await generator.suggestSkills(request));
  }));

  /**
   * POST /api/ai/analyze
   * Body: resume snapshot
   */
  router.post('/analyze', asyncHandler(async (req: Request, res: Response) => {
    const snapshot = parseWithSchema(ResumeSnapshotSchema, req.body, 'resume data');
    res.json(await generator.analyzeResumeQuality(snapshot));
  }));

  /**
   * POST /api/ai/optimize
   * Body: resume snapshot. Returns the regenerated fields; the input is not saved.
   */
  router.post('/optimize', asyncHandler(async (req: Request, res: Response) => {
    const snapshot = parseWithSchema(ResumeSnapshotSchema, req.body, 'resume data');
    const outcome = await generator.optimizeResume(snapshot);
    aiLogger.info({ success: outcome.success }, 'Resume optimization requested');
    res.json(outcome);
  }));

  /**
   * POST /api/ai/cover-letter
   *
   * Request body:
   * - jobTitle: string
   * - companyName?, jobDescription?, additionalNotes?: string
   * - resumeId?: number - saved resume to draw context from
   * - resume?: snapshot - used when no resumeId is given
   */
  router.post('/cover-letter', asyncHandler(async (req: Request, res: Response) => {
    const { resumeId, resume, ...request } = parseWithSchema(
      CoverLetterRequestSchema,
      req.body,
      'cover letter request'
    );

    let snapshot: ResumeSnapshot | undefined = resume;
    if (resumeId !== undefined) {
      const record = storage.getResume(resumeId);
      if (!record) {
        throw ErrorHandler.createNotFoundError(`Resume ${resumeId} not found`, { id: resumeId });
      }
      snapshot = parseResumeSnapshot(record.data);
    }

    res.json(await generator.generateCoverLetter({ ...request, resume: snapshot }));
  }));

  return router;
}

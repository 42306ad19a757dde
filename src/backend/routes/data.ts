/**
 * Data routes - full backup and restore of the store.
 */

import { Router, Request, Response } from 'express';
import type { ResumeStore } from '../../shared/storage';

export function createDataRouter(storage: ResumeStore): Router {
  const router = Router();

  /**
   * GET /api/data/export
   * Download every resume and cover letter as one JSON document
   */
  router.get('/export', (_req: Request, res: Response) => {
    const document = storage.exportAll();
    res
      .type('application/json')
      .attachment('resume-backup.json')
      .send(document);
  });

  /**
   * POST /api/data/import
   * Body: a document produced by /export. Replaces all stored data.
   */
  router.post('/import', (req: Request, res: Response) => {
    const imported = storage.importAll(JSON.stringify(req.body));
    res.json({ success: true, imported });
  });

  return router;
}

import { Router, Request, Response, NextFunction } from 'express';
import { FhirEPI } from '../epi.js';
import { ValidationError } from '../errors.js';
import { processBundle } from '../operations.js';
import { TraversalOptions, isRecord } from '../types.js';

function readBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return body;
}

/**
 * Create API routes for ePI processing.
 * Every route parses its own copy of the posted bundle.
 */
export function createApiRoutes(options: TraversalOptions = {}): Router {
  const router = Router();

  /**
   * POST /api/epi/process
   * Apply operations to a bundle and return the edited bundle
   * Body: { bundle, operations: [{ op: 'updateSectionHtml', sectionTitle, html }, ...] }
   */
  router.post('/epi/process', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { bundle, operations } = readBody(req);
      res.json(processBundle(bundle, operations, options));
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/epi/html-content
   * Composition narrative plus every section's narrative, in document order
   */
  router.post('/epi/html-content', (req: Request, res: Response, next: NextFunction) => {
    try {
      const epi = FhirEPI.fromDict(readBody(req)['bundle'], options);
      res.json(epi.getAllHtmlContent());
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/epi/links
   * HtmlElementLinks declared on the Composition
   */
  router.post('/epi/links', (req: Request, res: Response, next: NextFunction) => {
    try {
      const epi = FhirEPI.fromDict(readBody(req)['bundle'], options);
      res.json(epi.listHtmlElementLinks());
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/epi/structure
   * Tag and class counts of the Composition narrative
   */
  router.post('/epi/structure', (req: Request, res: Response, next: NextFunction) => {
    try {
      const epi = FhirEPI.fromDict(readBody(req)['bundle'], options);
      res.json(epi.getHtmlStructureSummary());
    } catch (err) {
      next(err);
    }
  });

  return router;
}

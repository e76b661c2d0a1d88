/**
 * POST /api/search          { query, topK?, filters?, strictLocation?, allowLexicalFallback?, withAnswer? }
 * POST /api/search/explain  { query }
 */
import express, { type NextFunction, type Request, type Response } from 'express';
import type { RetrievalContext } from '@/services/pipeline-deps';
import { createErrorResponse, createSuccessResponse } from '@/utils/errorResponse';
import { validateExplainRequest, validateSearchRequest } from './validation';

export function createSearchRouter(ctx: RetrievalContext): express.Router {
  const router = express.Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateSearchRequest(req.body);
    if (!validation.success) {
      res.status(400).json(createErrorResponse('Invalid search request', validation.error, 'VALIDATION_ERROR'));
      return;
    }

    const { query, topK, filters, strictLocation, allowLexicalFallback, withAnswer } = validation.data;
    try {
      const detailed = await ctx.retriever.searchDetailed(query, { topK, filters, strictLocation, allowLexicalFallback });
      const answer = withAnswer && ctx.answerComposer ? await ctx.answerComposer.compose(query, detailed.results) : null;
      res.json(createSuccessResponse({ ...detailed, answer }));
    } catch (err) {
      next(err);
    }
  });

  router.post('/explain', (req: Request, res: Response) => {
    const validation = validateExplainRequest(req.body);
    if (!validation.success) {
      res.status(400).json(createErrorResponse('Invalid explain request', validation.error, 'VALIDATION_ERROR'));
      return;
    }
    res.json(createSuccessResponse(ctx.retriever.explain(validation.data.query)));
  });

  return router;
}

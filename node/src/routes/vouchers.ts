/**
 * POST /api/vouchers      { vouchers: VoucherSourceRecord[] } → batch report
 * GET  /api/vouchers/:id
 */
import express, { type NextFunction, type Request, type Response } from 'express';
import type { RetrievalContext } from '@/services/pipeline-deps';
import { createErrorResponse, createSuccessResponse } from '@/utils/errorResponse';
import { validateIngestRequest } from './validation';

export function createVoucherRouter(ctx: RetrievalContext): express.Router {
  const router = express.Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateIngestRequest(req.body);
    if (!validation.success) {
      res.status(400).json(createErrorResponse('Invalid voucher batch', validation.error, 'VALIDATION_ERROR'));
      return;
    }

    try {
      const report = await ctx.indexer.indexBatch(validation.data.vouchers, { concurrency: ctx.config.ingest.concurrency });
      res.status(report.failed.length > 0 ? 207 : 200).json(createSuccessResponse(report));
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const doc = await ctx.store.get(req.params.id);
      if (!doc) {
        res.status(404).json(createErrorResponse(`Voucher ${req.params.id} not found`, undefined, 'NOT_FOUND'));
        return;
      }
      const { embeddings: _embeddings, ...rest } = doc;
      res.json(createSuccessResponse(rest));
    } catch (err) {
      next(err);
    }
  });

  return router;
}

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { createSearchRouter } from '@/routes/search';
import { createVoucherRouter } from '@/routes/vouchers';
import type { RetrievalContext } from '@/services/pipeline-deps';
import { logger } from '@/services/logger';

export function createApp(ctx: RetrievalContext): express.Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({ origin: process.env.CORS_ORIGIN?.split(',') ?? ['http://localhost:3000'] }));

  // Rate limiting stays off outside production
  if (ctx.config.nodeEnv === 'production') {
    app.use(
      rateLimit({
        windowMs: 60 * 1000,
        max: 100,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
    logger.info('rate limiting enabled');
  }

  app.use(express.json({ limit: '10mb' }));

  app.get('/health', async (_req, res, next) => {
    try {
      res.status(200).json({
        status: 'OK',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        environment: ctx.config.nodeEnv,
        vouchers: await ctx.store.count(),
      });
    } catch (err) {
      next(err);
    }
  });

  app.use('/api/search', createSearchRouter(ctx));
  app.use('/api/vouchers', createVoucherRouter(ctx));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}

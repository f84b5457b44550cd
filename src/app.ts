/**
 * SMC Trade Analyst - HTTP API
 *
 * Endpoints:
 * GET  /api/health      - Health check
 * GET  /api/session     - Active trading session (UTC)
 * POST /api/analyze     - Analyze one instrument from supplied bars
 * GET  /api/review      - Performance review of recent outcomes
 * POST /api/outcomes    - Record the outcome of a trade plan
 */

import express, { type Express } from 'express';
import cors from 'cors';

import type { EngineContext } from './engine/decisionEngine.js';
import { analyzeMarket, persistAnalysis } from './engine/decisionEngine.js';
import { formatPerformanceReview, generatePerformanceReview } from './engine/performanceReview.js';
import type { AnalysisStore, NewsProvider } from './types/collaborators.js';
import type { NewsProximity } from './types/analysis.js';
import {
  AnalyzeRequestSchema,
  OutcomeRequestSchema,
  ReviewQuerySchema,
  type AnalyzeRequest,
  type OutcomeRequest,
} from './validation/schemas.js';
import { validateBody, validateQuery } from './middleware/validate.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { getInstrumentByName } from './config/universe.js';
import { UnknownPlanError } from './storage/analysisStore.js';
import { formatUtcTime } from './utils/timeUtils.js';
import { createLogger } from './services/logger.js';

const logger = createLogger('Server');

export const VERSION = '1.0.0';

export interface AppOptions {
  context: EngineContext;
  store: AnalysisStore;
  news?: NewsProvider;
  reviewMinSample?: number;
  clock?: () => Date;
}

export function createApp(options: AppOptions): Express {
  const { context, store } = options;
  const clock = options.clock ?? (() => new Date());
  const app = express();

  // ═══════════════════════════════════════════════════════════════
  // MIDDLEWARE
  // ═══════════════════════════════════════════════════════════════

  app.use(cors());
  app.use(express.json({ limit: '5mb' }));
  app.use(requestIdMiddleware);

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.debug(`[${req.id}] ${req.method} ${req.path} ${res.statusCode} ${duration}ms`);
    });
    next();
  });

  // ═══════════════════════════════════════════════════════════════
  // API ROUTES
  // ═══════════════════════════════════════════════════════════════

  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      timestamp: clock().toISOString(),
      scorer: context.scorer.source,
    });
  });

  app.get('/api/session', (_req, res) => {
    const now = clock();
    res.json({
      session: context.validator.sessionFor(now),
      time: formatUtcTime(now),
      timestamp: now.toISOString(),
    });
  });

  /**
   * Analyze a single instrument. News proximity from the request wins over
   * the configured calendar.
   */
  app.post('/api/analyze', validateBody(AnalyzeRequestSchema), async (req, res, next) => {
    const body: AnalyzeRequest = req.body;
    const now = clock();

    try {
      let news: NewsProximity | null = body.news ?? null;
      if (!news && options.news) {
        news = await options.news.nearestHighImpact(now);
      }

      const configured = getInstrumentByName(context.config, body.symbol);
      const result = analyzeMarket({
        symbol: configured?.symbol ?? body.symbol,
        instrument: body.symbol,
        assetClass: body.assetClass ?? configured?.assetClass,
        direction: body.direction,
        bars: body.bars,
        spread: body.spread,
        news,
        riskState: body.riskState,
        now,
      }, context);

      let planId: number | null = null;
      try {
        planId = await persistAnalysis(store, result);
      } catch (error) {
        logger.error(`Failed to persist analysis for ${result.instrument}`, { error });
      }

      res.json({ ...result, planId });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/review', validateQuery(ReviewQuerySchema), async (_req, res, next) => {
    const limit = ReviewQuerySchema.parse(res.locals.query).limit;

    try {
      const outcomes = await store.recentOutcomes(limit);
      const review = generatePerformanceReview(
        outcomes,
        options.reviewMinSample !== undefined ? { minSample: options.reviewMinSample } : {}
      );

      if (review.sufficient) {
        await store.saveReview(review);
      }

      res.json({ ...review, report: formatPerformanceReview(review) });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/outcomes', validateBody(OutcomeRequestSchema), async (req, res, next) => {
    const body: OutcomeRequest = req.body;

    try {
      const id = await store.recordOutcome(body);
      logger.info(`Recorded ${body.outcome} for plan #${body.planId}`, { realizedR: body.realizedR });
      res.status(201).json({ id });
    } catch (error) {
      if (error instanceof UnknownPlanError) {
        res.status(404).json({ error: error.message });
        return;
      }
      next(error);
    }
  });

  // ═══════════════════════════════════════════════════════════════
  // ERROR HANDLING
  // ═══════════════════════════════════════════════════════════════

  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error('Unhandled error', { requestId: req.id, error: err.message, stack: err.stack });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

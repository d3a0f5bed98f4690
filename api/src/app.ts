/**
 * Express app factory — middleware stack, docs and routes, without listening.
 */
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import rateLimit from 'express-rate-limit';
import slowDown from 'express-slow-down';
import helmet from 'helmet';
import swaggerUi from 'swagger-ui-express';

import { createRoutes } from './routes.js';
import { MapService } from './services/index.js';
import { API_CONFIG, logger } from './utils/index.js';

export interface AppOptions {
  mapService?: MapService;
  maxRows?: number;
}

export function createApp(options: AppOptions = {}): express.Express {
  const app = express();
  const isTest = process.env.NODE_ENV === 'test';

  // ===== MIDDLEWARE =====

  app.set('trust proxy', 1);
  app.use(
    helmet({
      contentSecurityPolicy: false, // API returns JSON, not HTML
      crossOriginResourcePolicy: { policy: 'cross-origin' },
    }),
  );
  app.use(cors({ origin: API_CONFIG.corsOrigin }));
  app.use(compression());
  app.use(express.json({ limit: API_CONFIG.bodyLimit }));

  // ── Rate limiting (disabled in test) ─────────────────────
  // Map requests are CPU-bound, so the budget is tighter than for a plain read API

  const speedLimiter = slowDown({
    windowMs: 15 * 60 * 1000,
    delayAfter: 50,
    delayMs: (hits) => (hits - 50) * 500,
    maxDelayMs: 20_000,
    skip: () => isTest,
  });

  const apiLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    max: API_CONFIG.rateLimitMax,
    standardHeaders: true,
    legacyHeaders: false,
    message: { success: false, error: 'Too many requests, please try again later' },
    skip: () => isTest,
  });

  const burstLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: API_CONFIG.rateLimitBurst,
    standardHeaders: false,
    legacyHeaders: false,
    message: { success: false, error: 'Too many requests per minute, slow down' },
    skip: () => isTest,
  });

  app.use('/api', burstLimiter, speedLimiter, apiLimiter);

  // Request logging (skip /health to avoid noise)
  app.use((req, res, next) => {
    if (req.path === '/health') return next();
    const start = Date.now();
    res.on('finish', () => {
      const ms = Date.now() - start;
      const level = res.statusCode >= 400 ? 'warn' : 'info';
      logger[level](`${req.method} ${req.path} → ${res.statusCode}`, { module: 'HTTP', duration: `${ms}ms` });
    });
    next();
  });

  // ===== SWAGGER / OPENAPI =====
  const __dirname = path.dirname(fileURLToPath(import.meta.url));
  const swaggerSpec: Record<string, unknown> = JSON.parse(readFileSync(path.join(__dirname, '..', 'openapi.json'), 'utf-8'));
  swaggerSpec.servers = [{ url: '/', description: 'Current host' }];
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));

  // ===== ROOT =====
  app.get('/', (_, res) =>
    res.json({
      name: 'EffMap',
      version: '1.0.0',
      endpoints: {
        maps: 'POST /api/v1/maps',
        areaRatios: 'POST /api/v1/area-ratios[?format=csv]',
        docs: '/api-docs',
        health: '/health',
      },
    }),
  );

  app.use('/', createRoutes({ mapService: options.mapService ?? new MapService(), maxRows: options.maxRows }));

  // Malformed JSON bodies surface here from express.json()
  app.use((err: Error & { status?: number; type?: string }, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (err.type === 'entity.parse.failed') return void res.status(400).json({ success: false, error: 'Malformed JSON body' });
    if (err.type === 'entity.too.large') return void res.status(413).json({ success: false, error: 'Request body too large' });
    next(err);
  });

  return app;
}

import express from 'express';
import cors from 'cors';
import type { AxiosInstance } from 'axios';
import { createScrapeRouter } from './routes/scrape.js';
import { getEnv } from './env.js';
import { createLogger, type Logger } from './logger.js';
import { LatestResultStore } from './repositories/resultStore.js';
import { loadSelectors, type ListingSelectors } from './scraper/selectors.js';

export interface AppOptions {
  logger?: Logger;
  store?: LatestResultStore;
  selectors?: ListingSelectors;
  http?: AxiosInstance;
}

export function createApp(options: AppOptions = {}) {
  const env = getEnv();

  const logger = options.logger ?? createLogger({ dir: env.LOG_DIR, fileName: env.LOG_FILE });
  const store = options.store ?? new LatestResultStore();
  const selectors = options.selectors ?? loadSelectors(env.SCRAPER_SELECTORS_FILE);

  const normalizeOrigin = (value: string) => value.trim().replace(/\/+$/, '');
  const allowedOrigins = (env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : [])
    .map((o) => o.trim())
    .filter(Boolean)
    .map(normalizeOrigin);

  const app = express();
  app.use(express.json({ limit: '100kb' }));

  app.use(
    cors({
      origin: (origin, callback) => {
        // Non-browser requests (curl/health checks) may omit Origin.
        if (!origin) return callback(null, true);

        if (allowedOrigins.length === 0) return callback(null, true);

        const normalized = normalizeOrigin(origin);
        return callback(null, allowedOrigins.includes(normalized));
      },
      exposedHeaders: ['Content-Disposition']
    })
  );

  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.use(
    createScrapeRouter({
      logger,
      store,
      selectors,
      userAgent: env.SCRAPER_USER_AGENT,
      http: options.http
    })
  );

  return app;
}

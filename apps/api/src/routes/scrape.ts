import { Router } from 'express';
import { z } from 'zod';
import { SPREADSHEET_FILE_NAME, SPREADSHEET_MIME_TYPE, toSpreadsheet } from '../export/spreadsheet.js';
import { toPropertyRows } from '../presenter.js';
import type { LatestResultStore } from '../repositories/resultStore.js';
import { scrapeListings, type ScrapeDeps } from '../scraper/pipeline.js';
import { PROPERTY_COLUMNS, type ScrapeResult } from '../types.js';

export interface ScrapeRouterDeps extends ScrapeDeps {
  store: LatestResultStore;
}

const scrapeBodySchema = z.object({
  url: z.string().optional()
});

function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function toResponse(result: ScrapeResult) {
  return {
    url: result.url,
    retrievedAt: result.retrievedAt,
    columns: PROPERTY_COLUMNS,
    properties: toPropertyRows(result.records)
  };
}

export function createScrapeRouter(deps: ScrapeRouterDeps): Router {
  const router = Router();

  router.post('/v1/scrape', async (req, res) => {
    const parsed = scrapeBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    }

    try {
      const outcome = await scrapeListings(parsed.data.url, deps);

      switch (outcome.status) {
        case 'no-input':
          return res.status(400).json({ error: 'NO_INPUT', message: 'Please enter a valid URL.' });
        case 'fetch-failed':
          return res
            .status(502)
            .json({ error: 'FETCH_FAILED', message: 'Failed to retrieve the HTML content.' });
        case 'empty':
          return res.json({
            url: outcome.url,
            columns: PROPERTY_COLUMNS,
            properties: [],
            message: 'No properties found or parsed. Check selectors.'
          });
        case 'ok':
          deps.store.save(outcome.result);
          return res.json(toResponse(outcome.result));
      }
    } catch (err) {
      const message = errorMessage(err);
      deps.logger.error(`Scrape failed: ${message}`);
      return res.status(500).json({ error: 'SCRAPE_FAILED', message });
    }
  });

  router.get('/v1/scrape/latest', (_req, res) => {
    const result = deps.store.latest();
    if (!result) return res.status(404).json({ error: 'NOT_FOUND' });
    return res.json(toResponse(result));
  });

  router.get('/v1/scrape/latest/export', async (_req, res) => {
    const result = deps.store.latest();
    if (!result) return res.status(404).json({ error: 'NOT_FOUND' });

    try {
      const data = await toSpreadsheet(toPropertyRows(result.records));
      res.attachment(SPREADSHEET_FILE_NAME);
      res.setHeader('Content-Type', SPREADSHEET_MIME_TYPE);
      return res.send(Buffer.from(data));
    } catch (err) {
      const message = errorMessage(err);
      deps.logger.error(`Export failed: ${message}`);
      return res.status(500).json({ error: 'EXPORT_FAILED', message });
    }
  });

  return router;
}

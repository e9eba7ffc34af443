import type { AxiosInstance } from 'axios';
import type { Logger } from '../logger.js';
import type { ScrapeOutcome } from '../types.js';
import { extractListings } from './extractor.js';
import { fetchHtml } from './fetcher.js';
import type { ListingSelectors } from './selectors.js';

export interface ScrapeDeps {
  logger: Logger;
  selectors?: ListingSelectors;
  userAgent?: string;
  http?: AxiosInstance;
}

export async function scrapeListings(url: string | undefined, deps: ScrapeDeps): Promise<ScrapeOutcome> {
  const target = url?.trim() ?? '';
  if (!target) return { status: 'no-input' };

  const html = await fetchHtml(target, {
    logger: deps.logger,
    userAgent: deps.userAgent,
    http: deps.http
  });
  if (html === null) return { status: 'fetch-failed', url: target };

  const records = extractListings(html, { logger: deps.logger, selectors: deps.selectors });
  deps.logger.info(`Extracted ${records.length} listing(s) from ${target}`);
  if (records.length === 0) return { status: 'empty', url: target };

  return {
    status: 'ok',
    result: { url: target, retrievedAt: new Date().toISOString(), records }
  };
}

import type { ScrapeResult } from '../types.js';

// Holds only the most recent successful scrape; each save replaces it.
export class LatestResultStore {
  private result: ScrapeResult | undefined;

  save(result: ScrapeResult): void {
    this.result = result;
  }

  latest(): ScrapeResult | undefined {
    return this.result;
  }
}

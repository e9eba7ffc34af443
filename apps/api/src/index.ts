import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { getEnv } from './env.js';
import { createApp } from './app.js';
import { createLogger } from './logger.js';
import { loadSelectors } from './scraper/selectors.js';

const apiRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

// Repo-root .env first, then apps/api/.env on top of it.
dotenv.config({ path: path.resolve(apiRoot, '../../.env') });
dotenv.config({ path: path.resolve(apiRoot, '.env'), override: true });

const env = getEnv();
const logger = createLogger({ dir: env.LOG_DIR, fileName: env.LOG_FILE });

const selectors = loadSelectors(env.SCRAPER_SELECTORS_FILE);
if (env.SCRAPER_SELECTORS_FILE) {
  logger.info(`Using listing selectors from ${env.SCRAPER_SELECTORS_FILE}`);
}

createApp({ logger, selectors }).listen(env.PORT, () => {
  logger.info(`Scraper API listening on http://localhost:${env.PORT}`);
});

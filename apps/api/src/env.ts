import { z } from 'zod';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:91.0) Gecko/20100101 Firefox/91.0';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().optional(),

  LOG_DIR: z.string().min(1).default('logs'),
  LOG_FILE: z.string().min(1).default('scraper.log'),

  SCRAPER_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  SCRAPER_SELECTORS_FILE: z.string().optional()
});

export type Env = z.infer<typeof envSchema>;

export function getEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new Error(`Invalid environment variables: ${parsed.error.message}`);
  }
  return parsed.data;
}

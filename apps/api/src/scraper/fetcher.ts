import axios, { type AxiosInstance } from 'axios';
import { DEFAULT_USER_AGENT } from '../env.js';
import type { Logger } from '../logger.js';

export interface FetchOptions {
  logger: Logger;
  userAgent?: string;
  http?: AxiosInstance;
}

function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Single GET with a desktop browser identity. Returns the body on HTTP 200 and
 * `null` otherwise; failures are logged, never thrown.
 */
export async function fetchHtml(url: string, options: FetchOptions): Promise<string | null> {
  const http = options.http ?? axios;

  try {
    const res = await http.get<string>(url, {
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT
      },
      responseType: 'text',
      // Status handling happens below, not in axios.
      validateStatus: () => true
    });

    if (res.status !== 200) {
      options.logger.error(`Failed to fetch page: ${res.status}`);
      return null;
    }

    return typeof res.data === 'string' ? res.data : String(res.data);
  } catch (err) {
    options.logger.error(`Failed to fetch page: ${errorMessage(err)}`);
    return null;
  }
}

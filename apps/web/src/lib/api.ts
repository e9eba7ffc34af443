import type { ScrapeResponse } from './types';

const API_BASE_URL = process.env.NEXT_PUBLIC_API_BASE_URL ?? 'http://localhost:4000';

export const EXPORT_FILE_NAME = 'properties_data.xlsx';

type ApiError = Error & { status?: number; payload?: unknown };

async function tryReadJson(res: Response): Promise<unknown | undefined> {
  try {
    return await res.json();
  } catch {
    return undefined;
  }
}

function getErrorMessage(payload: unknown): string | undefined {
  if (!payload || typeof payload !== 'object') return undefined;
  const record = payload as Record<string, unknown>;
  const message = record.message;
  const error = record.error;
  if (typeof message === 'string' && message.trim()) return message;
  if (typeof error === 'string' && error.trim()) return error;
  return undefined;
}

export async function runScrape(url: string): Promise<ScrapeResponse> {
  const res = await fetch(`${API_BASE_URL}/v1/scrape`, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json'
    },
    body: JSON.stringify({ url })
  });

  if (!res.ok) {
    const payload = await tryReadJson(res);
    const message = getErrorMessage(payload) ?? `Request failed (${res.status})`;
    const error: ApiError = new Error(message);
    error.status = res.status;
    error.payload = payload;
    throw error;
  }

  return (await res.json()) as ScrapeResponse;
}

export function exportUrl(): string {
  return `${API_BASE_URL}/v1/scrape/latest/export`;
}

import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { vi } from 'vitest';
import type { Logger } from '../src/logger.js';

export interface CardFields {
  title?: string;
  price?: string;
  carpetArea?: string;
  // Writes the carpet-area entry with its label but without the value element.
  carpetAreaLabelOnly?: boolean;
  superArea?: string;
  soldBy?: string;
}

export function card(fields: CardFields): string {
  const parts: string[] = [];
  if (fields.title !== undefined) {
    parts.push(`<h2 class="mb-srp__card--title" title="${fields.title}">${fields.title}</h2>`);
  }
  if (fields.price !== undefined) {
    parts.push(
      `<div class="mb-srp__card__price"><div class="mb-srp__card__price--amount">${fields.price}</div></div>`
    );
  }
  const summary: string[] = [];
  if (fields.superArea !== undefined) {
    summary.push(
      `<div class="mb-srp__card__summary__list--item" data-summary="super-area">` +
        `<div class="mb-srp__card__summary--label">Super Area</div>` +
        `<div class="mb-srp__card__summary--value">${fields.superArea}</div></div>`
    );
  }
  if (fields.carpetArea !== undefined) {
    summary.push(
      `<div class="mb-srp__card__summary__list--item" data-summary="carpet-area">` +
        `<div class="mb-srp__card__summary--label">Carpet Area</div>` +
        `<div class="mb-srp__card__summary--value">${fields.carpetArea}</div></div>`
    );
  }
  if (fields.carpetAreaLabelOnly) {
    summary.push(
      `<div class="mb-srp__card__summary__list--item" data-summary="carpet-area">` +
        `<div class="mb-srp__card__summary--label">Carpet Area</div></div>`
    );
  }
  parts.push(`<div class="mb-srp__card__summary__list">${summary.join('')}</div>`);
  if (fields.soldBy !== undefined) {
    parts.push(`<div class="mb-srp__card__ads__info--name">${fields.soldBy}</div>`);
  }
  return `<div class="mb-srp__list"><div class="mb-srp__card">${parts.join('')}</div></div>`;
}

export function page(...cards: string[]): string {
  return `<!doctype html><html><head><title>Results</title></head><body><main>${cards.join('')}</main></body></html>`;
}

export function fakeLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

export function fakeHttp(status: number, data: string) {
  const adapter = vi.fn(async (config: InternalAxiosRequestConfig) => ({
    data,
    status,
    statusText: '',
    headers: {},
    config
  }));
  const http: AxiosInstance = axios.create({ adapter });
  return { http, adapter };
}

export const ANDHERI_CARD: CardFields = {
  title: '2 BHK Flat for Sale in Andheri West',
  price: '₹1.25 Cr',
  carpetArea: '650 sqft',
  soldBy: 'Sharma Realty'
};

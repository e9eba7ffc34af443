import * as cheerio from 'cheerio';
import type { Logger } from '../logger.js';
import type { ListingRecord } from '../types.js';
import { DEFAULT_SELECTORS, toCssSelector, type ListingSelectors } from './selectors.js';

export interface ExtractOptions {
  logger: Logger;
  selectors?: ListingSelectors;
}

function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Reads location, property type and bedroom count out of a listing title such
 * as "2 BHK Flat for Sale in Andheri West".
 */
export function parseTitle(title: string): Pick<ListingRecord, 'location' | 'propertyType' | 'bedrooms'> {
  const inIndex = title.indexOf(' in ');
  const location = inIndex === -1 ? undefined : title.slice(inIndex + ' in '.length);

  // No reordering when "for" comes before "BHK": the slice is then empty.
  const bhkIndex = title.indexOf('BHK');
  const forIndex = title.indexOf('for');
  const propertyType =
    bhkIndex !== -1 && forIndex !== -1 ? title.slice(bhkIndex + 3, forIndex).trim() : undefined;

  const trimmed = title.trim();
  const bedrooms = trimmed ? trimmed.split(/\s+/)[0] : undefined;

  return { location, propertyType, bedrooms };
}

export function extractListings(html: string, options: ExtractOptions): ListingRecord[] {
  const selectors = options.selectors ?? DEFAULT_SELECTORS;
  const $ = cheerio.load(html);
  const records: ListingRecord[] = [];

  $(toCssSelector(selectors.listing)).each((_, el) => {
    try {
      const listing = $(el);

      const textOf = (selector: string): string | undefined => {
        const found = listing.find(selector).first();
        return found.length ? normalizeWhitespace(found.text()) : undefined;
      };

      const titleText =
        listing.find(toCssSelector(selectors.title)).first().attr(selectors.title.attribute) ?? '';

      const sizeEntry = listing.find(toCssSelector(selectors.sizeEntry)).first();
      const sizeValue = sizeEntry.find(toCssSelector(selectors.sizeValue)).first();

      records.push({
        ...parseTitle(titleText),
        price: textOf(toCssSelector(selectors.price)),
        size: sizeValue.length ? normalizeWhitespace(sizeValue.text()) : undefined,
        soldBy: textOf(toCssSelector(selectors.soldBy))
      });
    } catch (err) {
      options.logger.error(`Failed to parse listing: ${errorMessage(err)}`);
    }
  });

  return records;
}

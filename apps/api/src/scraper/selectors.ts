import fs from 'node:fs';
import { z } from 'zod';

const elementSelectorSchema = z.object({
  tag: z.string().regex(/^[A-Za-z][A-Za-z0-9-]*$/),
  className: z.string().regex(/^-?[_A-Za-z][_A-Za-z0-9-]*$/),
  attributes: z.record(z.string().regex(/^[A-Za-z_][A-Za-z0-9_:.-]*$/), z.string()).optional()
});

const listingSelectorsSchema = z.object({
  listing: elementSelectorSchema,
  title: elementSelectorSchema.extend({ attribute: z.string().min(1).default('title') }),
  price: elementSelectorSchema,
  sizeEntry: elementSelectorSchema,
  sizeValue: elementSelectorSchema,
  soldBy: elementSelectorSchema
});

export type ElementSelector = z.infer<typeof elementSelectorSchema>;
export type ListingSelectors = z.infer<typeof listingSelectorsSchema>;

// Markup of the MagicBricks search results page.
export const DEFAULT_SELECTORS: ListingSelectors = {
  listing: { tag: 'div', className: 'mb-srp__list' },
  title: { tag: 'h2', className: 'mb-srp__card--title', attribute: 'title' },
  price: { tag: 'div', className: 'mb-srp__card__price--amount' },
  sizeEntry: {
    tag: 'div',
    className: 'mb-srp__card__summary__list--item',
    attributes: { 'data-summary': 'carpet-area' }
  },
  sizeValue: { tag: 'div', className: 'mb-srp__card__summary--value' },
  soldBy: { tag: 'div', className: 'mb-srp__card__ads__info--name' }
};

export function toCssSelector(selector: ElementSelector): string {
  const attrs = Object.entries(selector.attributes ?? {})
    .map(([name, value]) => `[${name}="${value.replace(/["\\]/g, '\\$&')}"]`)
    .join('');
  return `${selector.tag}.${selector.className}${attrs}`;
}

export function parseSelectors(input: unknown): ListingSelectors {
  const parsed = listingSelectorsSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid selector configuration: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function loadSelectors(filePath: string | undefined): ListingSelectors {
  if (!filePath) return DEFAULT_SELECTORS;
  const raw = fs.readFileSync(filePath, { encoding: 'utf8' });
  return parseSelectors(JSON.parse(raw));
}

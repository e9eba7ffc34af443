export interface ListingRecord {
  location?: string;
  propertyType?: string;
  price?: string;
  size?: string;
  bedrooms?: string;
  soldBy?: string;
}

export const PROPERTY_COLUMNS = [
  'location',
  'property_type',
  'price',
  'size',
  'bedrooms',
  'sold_by'
] as const;

export type PropertyColumn = (typeof PROPERTY_COLUMNS)[number];

// Every column is always populated; missing values carry a sentinel.
export type PropertyRow = Record<PropertyColumn, string>;

export interface ScrapeResult {
  url: string;
  retrievedAt: string; // ISO
  records: ListingRecord[];
}

export type ScrapeOutcome =
  | { status: 'no-input' }
  | { status: 'fetch-failed'; url: string }
  | { status: 'empty'; url: string }
  | { status: 'ok'; result: ScrapeResult };

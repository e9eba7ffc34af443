export const PROPERTY_COLUMNS = [
  'location',
  'property_type',
  'price',
  'size',
  'bedrooms',
  'sold_by'
] as const;

export type PropertyColumn = (typeof PROPERTY_COLUMNS)[number];

export type PropertyRow = Record<PropertyColumn, string>;

export interface ScrapeResponse {
  url: string;
  retrievedAt?: string;
  columns: PropertyColumn[];
  properties: PropertyRow[];
  message?: string;
}

import type { ListingRecord, PropertyColumn, PropertyRow } from './types.js';

export const SENTINELS: Record<PropertyColumn, string> = {
  location: 'Location Not Available',
  property_type: 'Property Type Not Available',
  price: 'Price Not Available',
  size: 'Size Not Available',
  bedrooms: 'Bedrooms Not Available',
  sold_by: 'Sold By Not Available'
};

// Control characters XML 1.0 cannot carry; xlsx writers drop them silently.
const XML_INVALID_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

function cell(value: string | undefined, sentinel: string): string {
  return value === undefined ? sentinel : value.replace(XML_INVALID_CHARS, '');
}

export function toPropertyRow(record: ListingRecord): PropertyRow {
  return {
    location: cell(record.location, SENTINELS.location),
    property_type: cell(record.propertyType, SENTINELS.property_type),
    price: cell(record.price, SENTINELS.price),
    size: cell(record.size, SENTINELS.size),
    bedrooms: cell(record.bedrooms, SENTINELS.bedrooms),
    sold_by: cell(record.soldBy, SENTINELS.sold_by)
  };
}

export function toPropertyRows(records: ListingRecord[]): PropertyRow[] {
  return records.map(toPropertyRow);
}

/**
 * Shipping Rate Catalog
 *
 * One linear rate per shipping mode. Strategies price against these
 * constants; the catalog is what the API and quotes expose.
 */

import { ShippingMode, ShippingRate } from '../types/shipping';

export const GROUND_UNIT_PRICE = 1.5;
export const AIR_UNIT_PRICE = 3.0;

const CATALOG_ENTRIES: ShippingRate[] = [
  {
    mode: 'Ground',
    name: 'Ground Shipping',
    unit_price: GROUND_UNIT_PRICE,
    currency: 'USD',
  },
  {
    mode: 'Air',
    name: 'Air Shipping',
    unit_price: AIR_UNIT_PRICE,
    currency: 'USD',
  },
];

/** Entries are frozen: lookups return the catalog's own objects */
export const SHIPPING_CATALOG: readonly ShippingRate[] = Object.freeze(
  CATALOG_ENTRIES.map((rate) => Object.freeze(rate))
);

/**
 * Get the rate for a shipping mode
 */
export function getShippingRate(mode: string): ShippingRate | undefined {
  return SHIPPING_CATALOG.find((rate) => rate.mode === mode);
}

/**
 * Get all shipping rates
 */
export function getAllShippingRates(): ShippingRate[] {
  return [...SHIPPING_CATALOG];
}

/**
 * Get all mode codes, in catalog order
 */
export function getShippingModes(): ShippingMode[] {
  return SHIPPING_CATALOG.map((rate) => rate.mode);
}

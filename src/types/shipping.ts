/**
 * Shipping Types
 */

export type ShippingMode = 'Ground' | 'Air';

export interface ShippingRate {
  /** Mode discriminator accepted by the strategy factory */
  readonly mode: ShippingMode;
  /** Human-readable name */
  readonly name: string;
  /** Price per unit of weight */
  readonly unit_price: number;
  /** Currency code (e.g., "USD") */
  readonly currency: string;
}

/**
 * A pricing algorithm for one shipping mode.
 * Implementations are pure: the same weight always yields the same cost.
 */
export interface ShippingStrategy {
  readonly mode: ShippingMode;
  calculateShippingCost(weight: number): number;
}

export interface ShippingQuoteParams {
  mode: string;
  weight: number;
}

export interface ShippingQuote {
  /** Unique quote identifier */
  quote_id: string;
  mode: ShippingMode;
  weight: number;
  /** Rate applied per unit of weight */
  unit_price: number;
  /** Cost rounded to cents */
  cost: number;
  currency: string;
  /** When the quote was generated (Unix ms) */
  generated_at: number;
}

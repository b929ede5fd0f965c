/**
 * Shipping Quotes
 *
 * Prices a shipment through the strategy factory and stamps it
 * as a quote the API can return.
 */

import { v4 as uuidv4 } from 'uuid';
import { getShippingRate } from '../config/shipping';
import { ShippingQuote, ShippingQuoteParams } from '../types/shipping';
import { createStrategy } from './factory';
import { ShippingService } from './shipping';

/**
 * Quote a shipment
 *
 * Example: 10 units by Air → 10 × $3.00 = $30.00
 */
export function quoteShipping(params: ShippingQuoteParams): ShippingQuote {
  const { mode, weight } = params;

  const strategy = createStrategy(mode);
  const rate = getShippingRate(strategy.mode);
  if (!rate) {
    throw new Error(`No rate configured for mode: ${strategy.mode}`);
  }

  const service = new ShippingService(strategy);
  const cost = service.calculateCost(weight);

  return {
    quote_id: `qt_${uuidv4().slice(0, 8)}`,
    mode: strategy.mode,
    weight,
    unit_price: rate.unit_price,
    cost: Math.round(cost * 100) / 100,  // Round to cents
    currency: rate.currency,
    generated_at: Date.now(),
  };
}

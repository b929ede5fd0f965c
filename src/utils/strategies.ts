/**
 * Shipping Strategies
 *
 * Linear pricing: cost = weight × unit price for the mode.
 * No rounding here; quotes round to cents.
 */

import { AIR_UNIT_PRICE, GROUND_UNIT_PRICE } from '../config/shipping';
import { ShippingStrategy } from '../types/shipping';

export class GroundShipping implements ShippingStrategy {
  readonly mode = 'Ground';

  calculateShippingCost(weight: number): number {
    return weight * GROUND_UNIT_PRICE;
  }
}

export class AirShipping implements ShippingStrategy {
  readonly mode = 'Air';

  calculateShippingCost(weight: number): number {
    return weight * AIR_UNIT_PRICE;
  }
}

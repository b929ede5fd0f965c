/**
 * Shipping Strategy Factory
 *
 * Resolves a mode discriminator (e.g. "Ground") to a strategy instance.
 * Matching is exact: "ground" and "GROUND" are rejected.
 */

import { getShippingModes } from '../config/shipping';
import { ShippingMode, ShippingStrategy } from '../types/shipping';
import { InvalidModeError } from './errors';
import { AirShipping, GroundShipping } from './strategies';

const STRATEGIES: Record<ShippingMode, () => ShippingStrategy> = {
  Ground: () => new GroundShipping(),
  Air: () => new AirShipping(),
};

export function isShippingMode(value: string): value is ShippingMode {
  return Object.prototype.hasOwnProperty.call(STRATEGIES, value);
}

/**
 * Create the strategy for a mode
 *
 * @throws InvalidModeError when the mode is not recognized
 */
export function createStrategy(mode: string): ShippingStrategy {
  if (!isShippingMode(mode)) {
    throw new InvalidModeError(mode);
  }

  return STRATEGIES[mode]();
}

export function getSupportedModes(): ShippingMode[] {
  return getShippingModes();
}

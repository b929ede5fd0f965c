import { ShippingStrategy } from '../types/shipping';

/**
 * Shipping cost calculator.
 *
 * Holds one active strategy at all times. Swapping it with setStrategy()
 * affects subsequent calculations only. Not safe for concurrent
 * setStrategy/calculateCost from multiple owners; give each caller its own
 * instance.
 */
export class ShippingService {
  private strategy: ShippingStrategy;

  constructor(strategy: ShippingStrategy) {
    this.strategy = strategy;
  }

  setStrategy(strategy: ShippingStrategy): void {
    this.strategy = strategy;
  }

  getStrategy(): ShippingStrategy {
    return this.strategy;
  }

  /**
   * Weight is expected to be non-negative; callers validate it.
   */
  calculateCost(weight: number): number {
    return this.strategy.calculateShippingCost(weight);
  }
}

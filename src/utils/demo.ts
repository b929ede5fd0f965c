/**
 * Strategy/Factory walkthrough
 *
 * Builds the demo output: the same 10-unit shipment priced first with
 * strategies constructed directly, then with strategies from the factory.
 */

import { createStrategy } from './factory';
import { ShippingService } from './shipping';
import { AirShipping, GroundShipping } from './strategies';

export const DEMO_WEIGHT = 10;

/**
 * Whole amounts keep one decimal place (15 → "15.0"); fractions print as-is.
 */
export function formatCost(cost: number): string {
  return Number.isInteger(cost) ? cost.toFixed(1) : String(cost);
}

export function buildDemoLines(weight: number = DEMO_WEIGHT): string[] {
  const lines: string[] = [];

  lines.push('Strategy Pattern without Factory:');

  const shippingService = new ShippingService(new GroundShipping());
  lines.push(`Ground shipping cost: ${formatCost(shippingService.calculateCost(weight))}`);

  shippingService.setStrategy(new AirShipping());
  lines.push(`Air shipping cost: ${formatCost(shippingService.calculateCost(weight))}`);

  lines.push('');
  lines.push('Strategy Pattern with Factory:');

  const factoryShippingService = new ShippingService(createStrategy('Ground'));
  lines.push(
    `Factory-created Ground shipping cost: ${formatCost(factoryShippingService.calculateCost(weight))}`
  );

  factoryShippingService.setStrategy(createStrategy('Air'));
  lines.push(
    `Factory-created Air shipping cost: ${formatCost(factoryShippingService.calculateCost(weight))}`
  );

  return lines;
}

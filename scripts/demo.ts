/**
 * Shipping Cost Demo
 *
 * Prices a 10-unit shipment by Ground and Air, first with strategies
 * constructed directly, then with strategies from the factory.
 *
 * Usage: npm run demo
 */

import { buildDemoLines } from '../src/utils/demo';

function main() {
  for (const line of buildDemoLines()) {
    console.log(line);
  }
}

main();

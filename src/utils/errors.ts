import { getShippingModes } from '../config/shipping';

/**
 * Raised when a mode string does not name a known shipping strategy.
 */
export class InvalidModeError extends Error {
  readonly mode: string;

  constructor(mode: string) {
    super(`Invalid shipping mode: ${mode}. Supported modes: ${getShippingModes().join(', ')}`);
    this.name = 'InvalidModeError';
    this.mode = mode;
  }
}

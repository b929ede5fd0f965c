import { QuoteRequest } from './schemas';

export interface ValidationResult {
  valid: boolean;
  reason?: string;
}

/** Largest weight a single quote accepts */
export const MAX_WEIGHT = 100000;

/**
 * Validate a quote request beyond schema validation
 */
export function validateQuoteRequest(request: QuoteRequest): ValidationResult {
  if (!Number.isFinite(request.weight)) {
    return {
      valid: false,
      reason: 'Weight must be a finite number',
    };
  }

  if (request.weight < 0) {
    return {
      valid: false,
      reason: 'Weight must not be negative',
    };
  }

  if (request.weight > MAX_WEIGHT) {
    return {
      valid: false,
      reason: `Weight exceeds maximum of ${MAX_WEIGHT}`,
    };
  }

  return { valid: true };
}

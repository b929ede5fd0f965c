import { Type, Static } from '@sinclair/typebox';

/**
 * Shipping mode schema
 */
export const ShippingModeSchema = Type.Union([Type.Literal('Ground'), Type.Literal('Air')]);

/**
 * Shipping rate schema
 */
export const ShippingRateSchema = Type.Object({
  mode: ShippingModeSchema,
  name: Type.String(),
  unit_price: Type.Number(),
  currency: Type.String(),
});

/**
 * Rate list response schema
 */
export const RateListResponseSchema = Type.Object({
  rates: Type.Array(ShippingRateSchema),
});

/**
 * Rate lookup params schema
 */
export const RateParamsSchema = Type.Object({
  mode: Type.String({ minLength: 1 }),
});

/**
 * Quote request schema (body)
 *
 * mode stays a plain string so unknown modes reach the factory
 * and come back as InvalidModeError rather than a schema failure.
 */
export const QuoteRequestSchema = Type.Object({
  mode: Type.String({ minLength: 1, maxLength: 50 }),
  weight: Type.Number({ minimum: 0 }),
});

/**
 * Quote response schema
 */
export const QuoteResponseSchema = Type.Object({
  quote_id: Type.String(),
  mode: ShippingModeSchema,
  weight: Type.Number(),
  unit_price: Type.Number(),
  cost: Type.Number(),
  currency: Type.String(),
  generated_at: Type.Number(),
});

/**
 * Error response schema
 */
export const ErrorResponseSchema = Type.Object({
  error: Type.String(),
});

/**
 * Health response schema
 */
export const HealthResponseSchema = Type.Object({
  status: Type.Literal('ok'),
});

export type QuoteRequest = Static<typeof QuoteRequestSchema>;
export type QuoteResponse = Static<typeof QuoteResponseSchema>;
export type ErrorResponse = Static<typeof ErrorResponseSchema>;

import Fastify, { FastifyServerOptions } from 'fastify';
import { TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import {
  ErrorResponseSchema,
  HealthResponseSchema,
  QuoteRequestSchema,
  QuoteResponseSchema,
  RateListResponseSchema,
  RateParamsSchema,
  ShippingRateSchema,
} from './schemas';
import { validateQuoteRequest } from './validation';
import { getAllShippingRates, getShippingRate } from '../config/shipping';
import { InvalidModeError } from '../utils/errors';
import { quoteShipping } from '../utils/quote';

export function buildServer(options: FastifyServerOptions = { logger: true }) {
  const app = Fastify(options).withTypeProvider<TypeBoxTypeProvider>();

  // Unknown modes from the factory and schema failures are client errors
  app.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      return reply.status(400).send({ error: error.message });
    }

    if (error instanceof InvalidModeError) {
      request.log.info({ mode: error.mode }, 'rejected unknown shipping mode');
      return reply.status(400).send({ error: error.message });
    }

    return reply.send(error);
  });

  /**
   * GET /v1/shipping/rates - List all shipping rates
   */
  app.get(
    '/v1/shipping/rates',
    {
      schema: {
        response: {
          200: RateListResponseSchema,
        },
      },
    },
    async () => {
      return { rates: getAllShippingRates() };
    }
  );

  /**
   * GET /v1/shipping/rates/:mode - Get the rate for one mode
   */
  app.get(
    '/v1/shipping/rates/:mode',
    {
      schema: {
        params: RateParamsSchema,
        response: {
          200: ShippingRateSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { mode } = request.params;
      const rate = getShippingRate(mode);

      if (!rate) {
        return reply.status(404).send({ error: `Shipping rate not found for mode: ${mode}` });
      }

      return reply.status(200).send(rate);
    }
  );

  /**
   * POST /v1/shipping/quote - Price a shipment
   *
   * 1. Schema validation (automatic via Fastify)
   * 2. Business validation (weight bounds)
   * 3. Strategy resolved by the factory; unknown modes → 400
   */
  app.post(
    '/v1/shipping/quote',
    {
      schema: {
        body: QuoteRequestSchema,
        response: {
          200: QuoteResponseSchema,
          400: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const validation = validateQuoteRequest(request.body);

      if (!validation.valid) {
        return reply.status(400).send({ error: validation.reason ?? 'Invalid quote request' });
      }

      const { mode, weight } = request.body;
      const quote = quoteShipping({ mode, weight });

      return reply.status(200).send(quote);
    }
  );

  // Health check endpoint
  app.get(
    '/health',
    {
      schema: {
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    async () => {
      return { status: 'ok' as const };
    }
  );

  return app;
}

import { type FastifyInstance, type FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import rateLimit from '@fastify/rate-limit';

// ---------------------------------------------------------------------------
// Rate limit tiers:
//   Default:       100 req/min per IP
//   File uploads:  10 req/min per IP
// ---------------------------------------------------------------------------

export interface RateLimitPluginOptions {
  /** Override default max for testing. */
  defaultMax?: number;
}

async function rateLimitPlugin(app: FastifyInstance, opts: RateLimitPluginOptions) {
  const defaultMax = opts.defaultMax ?? 100;

  await app.register(rateLimit, {
    max: defaultMax,
    timeWindow: '1 minute',
    keyGenerator: (request: FastifyRequest) => request.ip,
    // Thrown by the plugin and rendered by the error handler envelope
    errorResponseBuilder: (_request, context) => ({
      statusCode: context.statusCode,
      code: 'RATE_LIMITED',
      message: `Rate limit exceeded. Retry after ${Math.ceil(context.ttl / 1000)} seconds.`,
    }),
  });
}

// ---------------------------------------------------------------------------
// Route-level rate limit config factories
// ---------------------------------------------------------------------------

/**
 * File upload rate limiting: 10 req/min per IP.
 * Use as route-level config: { config: { rateLimit: uploadRateLimit() } }
 */
export function uploadRateLimit() {
  return {
    max: 10,
    timeWindow: '1 minute',
    keyGenerator: (request: FastifyRequest) => request.ip,
  };
}

// ---------------------------------------------------------------------------
// Export
// ---------------------------------------------------------------------------

export const rateLimitPluginFp = fp(rateLimitPlugin, {
  name: 'rate-limit-plugin',
});

export { rateLimitPlugin };

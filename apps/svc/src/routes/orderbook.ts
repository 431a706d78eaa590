import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '@depthcost/core';
import { topLevels } from '@depthcost/core-orderbook';
import type { ServiceContext } from '../server.js';
import { handleServiceError } from './errors.js';

const DepthQuery = z.object({
  depth: z.coerce
    .number({ invalid_type_error: 'depth must be a number' })
    .int('depth must be an integer')
    .min(1, 'depth must be at least 1')
    .max(500, 'depth must be at most 500')
    .default(10),
});

function parseDepth(query: unknown): number {
  const result = DepthQuery.safeParse(query ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError('invalid orderbook query', {
      depth: issue?.message ?? 'invalid depth',
    });
  }
  return result.data.depth;
}

export function registerOrderbookRoutes(
  app: FastifyInstance,
  ctx: ServiceContext,
): void {
  app.get('/v1/orderbook', async (request, reply) => {
    try {
      const depth = parseDepth(request.query);
      const snapshot = ctx.feed.snapshot();
      const { asks, bids } = topLevels(snapshot, depth);
      reply.send({
        capturedAt: snapshot.capturedAt,
        parseLatencyMs: snapshot.parseLatencyMs,
        asks,
        bids,
      });
    } catch (err) {
      handleServiceError(reply, err);
      return;
    }
  });

  app.get('/v1/orderbook/summary', async () => ctx.pipeline.summary());

  app.get('/v1/feed/status', async () => ctx.feed.status());
}

import type { FastifyInstance } from 'fastify';
import { toTradeRequest } from '@depthcost/estimator';
import type { ServiceContext } from '../server.js';
import { handleServiceError } from './errors.js';

export function registerEstimateRoutes(
  app: FastifyInstance,
  ctx: ServiceContext,
): void {
  app.get('/v1/fee-tiers', async () => ({ tiers: ctx.fees.tiers() }));

  app.post('/v1/estimate', async (request, reply) => {
    try {
      const trade = toTradeRequest(request.body ?? {});
      const estimate = ctx.pipeline.estimate(trade);
      if (!estimate.success) {
        request.log.warn(
          { reason: estimate.reason },
          'trade estimate unavailable',
        );
        reply.status(409).send(estimate);
        return;
      }
      reply.send(estimate);
    } catch (err) {
      handleServiceError(reply, err);
      return;
    }
  });

  app.get('/v1/latency', async () => ({
    operations: ctx.pipeline.latencyStats(),
  }));
}

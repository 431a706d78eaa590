import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { SnapshotSource } from '@depthcost/core-orderbook';
import type { CostEstimationPipeline, FeeModel } from '@depthcost/estimator';
import type { StreamStatus } from '@depthcost/feed';
import { registerEstimateRoutes } from './routes/estimate.js';
import { registerOrderbookRoutes } from './routes/orderbook.js';

export interface FeedHandle extends SnapshotSource {
  status(): StreamStatus;
}

export interface ServiceContext {
  feed: FeedHandle;
  pipeline: CostEstimationPipeline;
  fees: FeeModel;
}

export interface ServerOptions {
  logger?: boolean | FastifyBaseLogger;
  /** Allowed browser origins; empty allows any. */
  corsOrigins?: string[];
}

export async function createServer(
  ctx: ServiceContext,
  options: ServerOptions = {},
): Promise<FastifyInstance> {
  const app: FastifyInstance = Fastify({ logger: options.logger ?? true });
  const allowedOrigins = options.corsOrigins ?? [];

  await app.register(cors, {
    origin(origin, callback) {
      if (!allowedOrigins.length || !origin) {
        callback(null, true);
        return;
      }
      if (allowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }
      callback(new Error('origin not allowed'), false);
    },
  });

  app.get('/v1/health', async () => ({ status: 'ok' }));

  registerOrderbookRoutes(app, ctx);
  registerEstimateRoutes(app, ctx);

  return app;
}

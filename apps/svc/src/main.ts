import {
  ConnectionError,
  createLogger,
  describeError,
  LatencyInstrument,
} from '@depthcost/core';
import { CostEstimationPipeline, FeeModel } from '@depthcost/estimator';
import { OrderbookStream } from '@depthcost/feed';
import { loadConfig } from './config.js';
import { createServer } from './server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger('depthcost-svc', { level: config.logLevel });

  const stream = new OrderbookStream({
    ...config.feed,
    logger: logger.child({ scope: 'orderbook-stream' }),
  });
  const fees = new FeeModel({ logger: logger.child({ scope: 'fee-model' }) });
  const pipeline = new CostEstimationPipeline(stream, {
    fees,
    latency: new LatencyInstrument({
      maxSamples: config.latency.maxSamples,
      logger: logger.child({ scope: 'latency' }),
    }),
    logger: logger.child({ scope: 'cost-pipeline' }),
  });

  const app = await createServer(
    { feed: stream, pipeline, fees },
    { logger, corsOrigins: config.http.corsOrigins },
  );

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'shutting down');
    await stream.stop();
    await app.close();
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ error: describeError(err) }, 'shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  await app.listen({ port: config.http.port, host: config.http.host });
  logger.info(
    { host: config.http.host, port: config.http.port },
    'depthcost service listening',
  );

  stream.start().catch((err: unknown) => {
    if (err instanceof ConnectionError) {
      logger.fatal({ error: describeError(err) }, 'feed unavailable, exiting');
    } else {
      logger.error({ error: describeError(err) }, 'feed stopped unexpectedly');
    }
    const exit = () => process.exit(1);
    app.close().then(exit, exit);
  });
}

main().catch((err: unknown) => {
  createLogger('depthcost-svc').error(
    { error: describeError(err) },
    'failed to start service',
  );
  process.exit(1);
});

import '../lib/load-env';
import { createLogger } from '@wordclip/overlay';
import { closeQueues } from '@wordclip/queue';

const logger = createLogger('worker-main');

async function main() {
  logger.info({ event: 'workers_starting' });

  const { startCompositeRenderWorker } = await import('./composite-render');
  const worker = startCompositeRenderWorker();

  logger.info({ event: 'workers_started', workers: ['composite-render'] });

  // Graceful shutdown
  const shutdown = async () => {
    logger.info({ event: 'workers_shutting_down' });
    await worker.close();
    await closeQueues();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      logger.error({ event: 'workers_shutdown_failed', error: err });
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  logger.error({ event: 'workers_fatal', error: err });
  process.exit(1);
});

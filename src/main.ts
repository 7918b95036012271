import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createServer } from './server.js';
import { createReaper, createServices, createWorker } from './services.js';

async function start() {
  const config = loadConfig();
  const log = createLogger(config, { service: 'media-jobs', role: config.role });
  const services = createServices(config, log);

  const runsWorker = config.role === 'worker' || config.role === 'all';
  const worker = runsWorker ? createWorker(services, config, log) : undefined;
  const reaper = runsWorker ? createReaper(services, config, log) : undefined;

  const shutdownTasks: Array<() => Promise<void>> = [];

  if (config.role === 'api' || config.role === 'all') {
    const app = await createServer({ config, ...services, worker, reaper });
    await app.listen({ port: config.server.port, host: config.server.host });
    app.log.info({ port: config.server.port }, 'Jobs API started');
    shutdownTasks.push(() => app.close());
  } else {
    shutdownTasks.push(async () => {
      reaper?.stop();
      await worker?.stop();
    });
  }

  await worker?.start();
  reaper?.start();

  // Graceful shutdown
  const signals = ['SIGINT', 'SIGTERM'] as const;
  for (const signal of signals) {
    process.once(signal, () => {
      log.info({ signal }, 'Shutting down');
      Promise.all(shutdownTasks.map(task => task()))
        .then(() => process.exit(0))
        .catch(error => {
          log.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        });
    });
  }
}

start().catch((error) => {
  console.error('Failed to start:', error);
  process.exit(1);
});

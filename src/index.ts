import { loadConfig } from './config.js';
import { createApp, createServices, initStores, startBackgroundJobs, stopBackgroundJobs } from './app.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const services = createServices(config);
  await initStores(services);

  startBackgroundJobs(services, config);

  const app = createApp(services);
  const server = app.listen(config.port, () => {
    console.log(`🚀 Staff presence service listening on http://localhost:${config.port}`);
  });

  const shutdown = async (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    await stopBackgroundJobs(services);
    server.close();
    await services.pool?.end();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error) => {
        console.error('[Server] Shutdown failed:', error);
        process.exitCode = 1;
      });
    });
  }
}

main().catch((error) => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});

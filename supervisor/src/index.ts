import { getConfig } from './config.js';
import { buildServer } from './server.js';
import { TaskRegistry } from './services/task-registry.js';

async function main() {
  const config = getConfig();

  console.log('=================================');
  console.log('  aria2 Task Supervisor');
  console.log('=================================');
  console.log(`Port: ${config.port}`);
  console.log(`aria2c: ${config.aria2Path}`);
  console.log(`Download path: ${config.downloadPath}`);
  console.log(`Kill grace period: ${config.killGracePeriodMs}ms`);
  console.log('');

  const registry = new TaskRegistry({
    executable: config.aria2Path,
    downloadPath: config.downloadPath,
    killGracePeriodMs: config.killGracePeriodMs,
    maxLogLines: config.maxLogLines,
    debug: config.debug,
    taskDefaults: config.taskDefaults,
  });

  const fastify = await buildServer(registry);

  // Stop running downloads before exiting
  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[Server] ${signal} received, shutting down`);
    try {
      await registry.shutdown();
      await fastify.close();
      process.exit(0);
    } catch (error) {
      console.error('[Server] Error during shutdown:', error);
      process.exit(1);
    }
  };
  process.on('SIGINT', (signal) => void shutdown(signal));
  process.on('SIGTERM', (signal) => void shutdown(signal));

  try {
    await fastify.listen({ port: config.port, host: config.host });
    console.log(`Server listening on http://${config.host}:${config.port}`);
  } catch (err) {
    console.error('Error starting server:', err);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('[Server] Fatal error:', error);
  process.exit(1);
});

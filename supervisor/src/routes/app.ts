import { FastifyInstance } from 'fastify';
import { getConfig } from '../config.js';
import { TaskRegistry } from '../services/task-registry.js';

export interface AppRoutesOptions {
  registry: TaskRegistry;
}

export async function appRoutes(fastify: FastifyInstance, opts: AppRoutesOptions): Promise<void> {
  const { registry } = opts;

  fastify.get('/api/health', async () => {
    return {
      status: 'ok',
      tasks: registry.size,
      running: registry.runningCount(),
    };
  });

  // Defaults applied to new tasks
  fastify.get('/api/app/preferences', async () => {
    const config = getConfig();
    return {
      aria2Path: config.aria2Path,
      downloadPath: config.downloadPath,
      killGracePeriodMs: config.killGracePeriodMs,
      maxLogLines: config.maxLogLines,
      taskDefaults: config.taskDefaults,
    };
  });
}

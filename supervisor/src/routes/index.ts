import { FastifyInstance } from 'fastify';
import { appRoutes } from './app.js';
import { tasksRoutes } from './tasks.js';
import { TaskRegistry } from '../services/task-registry.js';

export async function registerRoutes(fastify: FastifyInstance, registry: TaskRegistry): Promise<void> {
  await fastify.register(appRoutes, { registry });
  await fastify.register(tasksRoutes, { registry });
}

import Fastify, { FastifyInstance } from 'fastify';
import fastifyFormbody from '@fastify/formbody';
import { registerRoutes } from './routes/index.js';
import { TaskRegistry } from './services/task-registry.js';

export async function buildServer(registry: TaskRegistry): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false,
  });

  // Register plugins
  await fastify.register(fastifyFormbody);

  // Register API routes
  await registerRoutes(fastify, registry);

  fastify.setNotFoundHandler(async (_request, reply) => {
    return reply.status(404).send({ success: false, error: 'Not found' });
  });

  return fastify;
}

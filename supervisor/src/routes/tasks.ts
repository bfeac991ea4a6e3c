import { FastifyInstance, FastifyReply } from 'fastify';
import { DEFAULT_LOG_LINES, TaskRegistry } from '../services/task-registry.js';
import {
  errorMessage,
  InvalidOperationError,
  InvalidTaskConfigError,
  TaskNotFoundError,
} from '../utils/errors.js';
import type { LifecycleVerb, TaskOptions } from '../types/task.js';

export interface TasksRoutesOptions {
  registry: TaskRegistry;
}

type ControlVerb = Exclude<LifecycleVerb, 'delete'>;

interface AddTaskBody {
  url: string;
  outputDir?: string;
  outputName?: string;
  // Headers may come as one newline-separated block, as typed in a form
  options?: Partial<Omit<TaskOptions, 'headers'>> & { headers?: string | string[] };
  autoStart?: boolean;
}

const idParams = {
  type: 'object',
  properties: {
    id: { type: 'integer', minimum: 1 },
  },
  required: ['id'],
} as const;

const addTaskSchema = {
  body: {
    type: 'object',
    required: ['url'],
    properties: {
      url: { type: 'string', minLength: 1 },
      outputDir: { type: 'string' },
      outputName: { type: 'string' },
      autoStart: { type: 'boolean' },
      options: {
        type: 'object',
        properties: {
          continue: { type: 'boolean' },
          split: { type: 'integer', minimum: 1 },
          maxConnectionPerServer: { type: 'integer', minimum: 1 },
          maxTries: { type: 'integer', minimum: 0 },
          retryWait: { type: 'integer', minimum: 0 },
          maxDownloadLimit: { type: 'string' },
          maxUploadLimit: { type: 'string' },
          referer: { type: 'string' },
          userAgent: { type: 'string' },
          headers: {
            anyOf: [
              { type: 'string' },
              { type: 'array', items: { type: 'string' } },
            ],
          },
          fileAllocation: { type: 'string' },
          extraArgs: { type: 'string' },
        },
      },
    },
  },
} as const;

function sendError(reply: FastifyReply, error: unknown): { success: false; error: string } {
  if (error instanceof TaskNotFoundError) {
    reply.status(404);
  } else if (error instanceof InvalidOperationError) {
    reply.status(409);
  } else if (error instanceof InvalidTaskConfigError) {
    reply.status(400);
  } else {
    console.error('[API] Unexpected error:', error);
    reply.status(500);
  }
  return { success: false, error: errorMessage(error) };
}

function splitHeaders(headers: string | string[] | undefined): string[] | undefined {
  if (typeof headers === 'string') {
    return headers.split(/\r?\n/);
  }
  return headers;
}

export async function tasksRoutes(fastify: FastifyInstance, opts: TasksRoutesOptions): Promise<void> {
  const { registry } = opts;

  // List tasks in the order they were added
  fastify.get('/api/tasks', async () => {
    return registry.list();
  });

  // Add a task (waiting unless autoStart is set)
  fastify.post<{ Body: AddTaskBody }>('/api/tasks', { schema: addTaskSchema }, async (request, reply) => {
    const { url, outputDir, outputName, options, autoStart } = request.body;

    let id: number;
    try {
      id = registry.add({
        url,
        outputDir,
        outputName,
        options: options ? { ...options, headers: splitHeaders(options.headers) } : undefined,
      });
    } catch (error) {
      return sendError(reply, error);
    }

    reply.status(201);
    if (autoStart) {
      const result = await registry.dispatch(id, 'start');
      return { success: true, id, started: result.success };
    }
    return { success: true, id };
  });

  fastify.get<{ Params: { id: number } }>(
    '/api/tasks/:id',
    { schema: { params: idParams } },
    async (request, reply) => {
      try {
        return registry.details(request.params.id);
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  fastify.get<{ Params: { id: number }; Querystring: { lines: number } }>(
    '/api/tasks/:id/log',
    {
      schema: {
        params: idParams,
        querystring: {
          type: 'object',
          properties: {
            lines: { type: 'integer', minimum: 0, default: DEFAULT_LOG_LINES },
          },
        },
      },
    },
    async (request, reply) => {
      const { id } = request.params;
      try {
        return { id, lines: registry.getLog(id, request.query.lines) };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  // start / pause / resume / stop
  fastify.post<{ Params: { id: number; verb: ControlVerb } }>(
    '/api/tasks/:id/:verb',
    {
      schema: {
        params: {
          type: 'object',
          properties: {
            id: { type: 'integer', minimum: 1 },
            verb: { type: 'string', enum: ['start', 'pause', 'resume', 'stop'] },
          },
          required: ['id', 'verb'],
        },
      },
    },
    async (request, reply) => {
      const { id, verb } = request.params;
      try {
        const result = await registry.dispatch(id, verb);
        return result.success
          ? { success: true, message: result.message }
          : { success: false, error: result.message };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  fastify.delete<{ Params: { id: number } }>(
    '/api/tasks/:id',
    { schema: { params: idParams } },
    async (request, reply) => {
      try {
        registry.remove(request.params.id);
        return { success: true };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );
}

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import multipart from '@fastify/multipart';
import type { ClipboardAgent } from './agents/clipboardAgent.js';
import type { ModelMode } from './llm/types.js';
import type { MemoryStore } from './memory/memoryStore.js';
import { agentRoutes } from './routes/agent.js';
import { healthRoutes } from './routes/health.js';
import { memoryRoutes } from './routes/memory.js';

export interface AppDependencies {
  agent: ClipboardAgent;
  memoryStore: MemoryStore;
  mode: () => ModelMode;
}

export interface AppOptions {
  /** Pino level, or false to silence the HTTP logger (tests). */
  logLevel: string | false;
  maxImageBytes: number;
}

export async function buildApp(deps: AppDependencies, options: AppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logLevel === false ? false : { level: options.logLevel },
  });

  await app.register(multipart, { limits: { fileSize: options.maxImageBytes, files: 1 } });

  // Anything unexpected is logged and reported without details
  app.setErrorHandler((error: FastifyError, _request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      app.log.error(error);
      reply.status(statusCode).send({ error: 'Internal server error' });
    } else {
      reply.status(statusCode).send({ error: error.message });
    }
  });

  await app.register(healthRoutes, { memoryStore: deps.memoryStore, mode: deps.mode });
  await app.register(memoryRoutes, { prefix: '/v1', memoryStore: deps.memoryStore });
  await app.register(agentRoutes, { prefix: '/v1', agent: deps.agent });

  return app;
}

import type { FastifyPluginAsync } from 'fastify';
import type { HealthResponse } from '@clipsidecar/shared';
import type { ModelMode } from '../llm/types.js';
import type { MemoryStore } from '../memory/memoryStore.js';

export const SERVICE_NAME = 'clipboard-sidecar';

export interface HealthRouteOptions {
  memoryStore: MemoryStore;
  mode: () => ModelMode;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (app, options) => {
  app.get('/health', async (request, reply) => {
    try {
      await options.memoryStore.init();
    } catch (error) {
      // Recorded on the store; reported through status() below.
      request.log.warn({ err: error }, 'memory store unavailable');
    }

    const memory = options.memoryStore.status();
    const body: HealthResponse = {
      status: memory.error ? 'degraded' : 'ok',
      service: SERVICE_NAME,
      mode: options.mode(),
      memory: {
        backend: memory.backend,
        embeddingModel: memory.embeddingModel,
        initialized: memory.initialized,
        error: memory.error,
      },
    };

    if (body.status === 'degraded') {
      reply.code(503);
    }
    return body;
  });
};

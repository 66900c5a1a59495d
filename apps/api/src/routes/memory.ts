import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { AddMemoryResponse, MemorySearchResponse } from '@clipsidecar/shared';
import { MAX_SEARCH_LIMIT, type MemoryStore } from '../memory/memoryStore.js';
import { parseOrReply400, replyWithSidecarError } from './validation.js';

const AddMemorySchema = z.object({
  text: z.string().refine((value) => value.trim().length > 0, 'text must not be blank'),
  source_app: z.string().min(1),
  tags: z.array(z.string()).optional().default([]),
});

const SearchQuerySchema = z.object({
  query: z.string().min(1),
  limit: z.coerce.number().int().min(1).max(MAX_SEARCH_LIMIT).optional().default(5),
});

export interface MemoryRouteOptions {
  memoryStore: MemoryStore;
}

export const memoryRoutes: FastifyPluginAsync<MemoryRouteOptions> = async (app, options) => {
  const store = options.memoryStore;

  app.post('/memory/add', async (request, reply) => {
    const parsed = parseOrReply400(reply, AddMemorySchema, request.body);
    if (!parsed) return;

    try {
      const id = await store.addItem(parsed.text, parsed.source_app, parsed.tags);
      const body: AddMemoryResponse = { id };
      return body;
    } catch (error) {
      return replyWithSidecarError(reply, error);
    }
  });

  app.get('/memory/search', async (request, reply) => {
    const parsed = parseOrReply400(reply, SearchQuerySchema, request.query, 'Invalid query');
    if (!parsed) return;

    try {
      const hits = await store.search(parsed.query, parsed.limit);
      const body: MemorySearchResponse = {
        query: parsed.query,
        count: hits.length,
        items: hits.map((hit) => ({
          id: hit.id,
          text: hit.text,
          timestamp: hit.timestamp,
          source_app: hit.sourceApp,
          tags: hit.tags,
          distance: hit.distance,
        })),
      };
      return body;
    } catch (error) {
      return replyWithSidecarError(reply, error);
    }
  });
};

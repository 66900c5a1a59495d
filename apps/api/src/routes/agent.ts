import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type {
  AgentMessageResponse,
  AgentReflectResponse,
  AgentTagsResponse,
} from '@clipsidecar/shared';
import type { ClipboardAgent } from '../agents/clipboardAgent.js';
import { EMPTY_CONTEXT, type MessageContext } from '../agents/types.js';
import { parseOrReply400 } from './validation.js';

const DEFAULT_IMAGE_MIME = 'image/png';

/** Missing, null or blank application names all mean "Unknown". */
const AppNameSchema = z.string().nullish().transform((value) => value?.trim() || 'Unknown');

const ClipboardItemSchema = z.object({
  content: z.string(),
  timestamp: z.union([z.string(), z.number()]).nullish(),
});

/** Host context; unknown keys (type, tags, ...) are stripped by zod. */
const MessageContextSchema = z.object({
  app_name: AppNameSchema,
  clipboard_items: z.array(ClipboardItemSchema).optional().default([]),
});

const AgentMessageSchema = z.object({
  message: z.string().min(1),
  context: MessageContextSchema.nullish(),
});

const AgentTagsSchema = z.object({
  content: z.string().min(1),
  app_name: AppNameSchema,
});

type MessageContextInput = z.infer<typeof MessageContextSchema>;

export function toMessageContext(input: MessageContextInput | null | undefined): MessageContext {
  if (!input) {
    return EMPTY_CONTEXT;
  }
  return {
    appName: input.app_name,
    clipboardPreview: input.clipboard_items.map((item) => ({
      content: item.content,
      timestamp: item.timestamp === null || item.timestamp === undefined ? null : String(item.timestamp),
    })),
  };
}

export interface AgentRouteOptions {
  agent: ClipboardAgent;
}

export const agentRoutes: FastifyPluginAsync<AgentRouteOptions> = async (app, options) => {
  const agent = options.agent;

  app.post('/agent/message', async (request, reply) => {
    const parsed = parseOrReply400(reply, AgentMessageSchema, request.body);
    if (!parsed) return;

    const result = await agent.processMessage(parsed.message, toMessageContext(parsed.context));
    const body: AgentMessageResponse = {
      response: result.responseText,
      tool_calls: result.clientToolCalls,
    };
    return body;
  });

  app.post('/agent/vision', async (request, reply) => {
    const data = await request.file();
    if (!data) {
      return reply.status(400).send({ error: 'No image file provided' });
    }

    const buffer = await data.toBuffer();
    if (buffer.length === 0) {
      return reply.status(400).send({ error: 'Image file is empty' });
    }

    const mimeType = data.mimetype.startsWith('image/') ? data.mimetype : DEFAULT_IMAGE_MIME;
    const response = await agent.processVision(buffer, mimeType);
    const body: AgentMessageResponse = { response, tool_calls: [] };
    return body;
  });

  app.post('/agent/tags', async (request, reply) => {
    const parsed = parseOrReply400(reply, AgentTagsSchema, request.body);
    if (!parsed) return;

    const body: AgentTagsResponse = {
      tags: await agent.generateTags(parsed.content, parsed.app_name),
    };
    return body;
  });

  app.post('/agent/reflect', async () => {
    const body: AgentReflectResponse = { persona: await agent.reflect() };
    return body;
  });
};

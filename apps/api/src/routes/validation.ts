import type { FastifyReply } from 'fastify';
import { z } from 'zod';
import { SidecarError } from '../errors.js';

export function parseOrReply400<T extends z.ZodTypeAny>(
  reply: FastifyReply,
  schema: T,
  input: unknown,
  errorMessage: string = 'Invalid request',
): z.infer<T> | null {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    reply.status(400).send({
      error: errorMessage,
      details: parsed.error.issues,
    });
    return null;
  }
  return parsed.data;
}

/**
 * Known sidecar failures go back with their message; anything else is
 * rethrown for the app-level error handler to sanitize.
 */
export function replyWithSidecarError(reply: FastifyReply, error: unknown): FastifyReply {
  if (error instanceof SidecarError) {
    reply.log.warn({ code: error.code }, error.message);
    return reply.status(error.statusCode).send({ error: error.message, code: error.code });
  }
  throw error;
}

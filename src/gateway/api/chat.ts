/**
 * Chat REST API route.
 *   - POST /v1/chat — run one request through the pipeline
 *   - any other method on /v1/chat — 405
 *
 * Error bodies are generic. Only the status tells a malformed request
 * (400) apart from a downstream failure (500).
 */

import type { FastifyInstance, FastifyReply, HTTPMethods } from 'fastify';
import { z } from 'zod';
import type { ChatRequest } from '../../types/index.js';
import type { ChatPipeline } from '../../orchestrator/pipeline.js';
import { MalformedInputError, RequestAbortedError } from '../../errors.js';
import { gatewayLogger } from '../../utils/logger.js';

const log = gatewayLogger;

export const BAD_REQUEST_BODY = { error: 'bad request' } as const;
export const INTERNAL_ERROR_BODY = { error: 'internal error' } as const;
export const METHOD_NOT_ALLOWED_BODY = { error: 'method not allowed' } as const;

// ── Zod Schemas ─────────────────────────────────────────────────────

const ExternalDatumSchema = z.object({
  id: z.string().default(''),
  source: z.string().default(''),
  type: z.string().default(''),
  content: z.string(),
});

/** Build the body schema; `maxExternalData` caps the fan-out of the taint scan */
export function createChatRequestSchema(maxExternalData: number) {
  return z.object({
    user_id: z.string().default(''),
    session_id: z.string().default(''),
    message: z.string().min(1, 'message is required'),
    external_data: z.array(ExternalDatumSchema).max(maxExternalData).default([]),
  });
}

/**
 * Validate and convert an inbound body. Caller-supplied taint fields are dropped.
 * @throws {MalformedInputError} When the body does not match the schema
 */
export function parseChatRequest(body: unknown, maxExternalData: number): ChatRequest {
  const parsed = createChatRequestSchema(maxExternalData).safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new MalformedInputError('Invalid chat request', issues);
  }

  const data = parsed.data;
  return {
    userId: data.user_id,
    sessionId: data.session_id,
    message: data.message,
    externalData: data.external_data.map((datum) => ({
      id: datum.id,
      source: datum.source,
      type: datum.type,
      content: datum.content,
    })),
  };
}

/** An AbortController that fires if the client goes away before the reply is sent */
function abortOnDisconnect(reply: FastifyReply): AbortController {
  const controller = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });
  return controller;
}

export interface ChatRouteOptions {
  pipeline: ChatPipeline;
  maxExternalData: number;
  /** When true, OPTIONS is left to the CORS preflight handler */
  corsEnabled: boolean;
}

/**
 * Register the chat routes on the given Fastify instance.
 */
export function registerChatRoutes(app: FastifyInstance, options: ChatRouteOptions): void {
  app.post('/v1/chat', async (request, reply) => {
    let chatRequest: ChatRequest;
    try {
      chatRequest = parseChatRequest(request.body, options.maxExternalData);
    } catch (error: unknown) {
      if (error instanceof MalformedInputError) {
        log.info({ requestId: request.id, issues: error.issues }, 'Rejected malformed chat request');
        return reply.status(400).send(BAD_REQUEST_BODY);
      }
      throw error;
    }

    const disconnect = abortOnDisconnect(reply);
    try {
      const body = await options.pipeline.handle(chatRequest, {
        requestId: request.id,
        signal: disconnect.signal,
      });
      return reply.status(200).send(body);
    } catch (error: unknown) {
      if (error instanceof RequestAbortedError) {
        log.warn({ requestId: request.id, stage: error.stage }, 'Chat request failed downstream');
      } else {
        const message = error instanceof Error ? error.message : String(error);
        log.error({ requestId: request.id, error: message }, 'Unexpected chat handler error');
      }
      return reply.status(500).send(INTERNAL_ERROR_BODY);
    }
  });

  const rejected: HTTPMethods[] = ['GET', 'PUT', 'PATCH', 'DELETE'];
  if (!options.corsEnabled) {
    rejected.push('OPTIONS');
  }

  app.route({
    method: rejected,
    url: '/v1/chat',
    handler: async (_request, reply) => {
      return reply.status(405).header('allow', 'POST').send(METHOD_NOT_ALLOWED_BODY);
    },
  });
}

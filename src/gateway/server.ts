/**
 * Main Fastify server setup for the Tollgate gateway.
 * Registers CORS, request ids, the error handler and the REST routes.
 * Provides start() and stop() lifecycle methods.
 */

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import fastifyCors from '@fastify/cors';
import { nanoid } from 'nanoid';
import type { Config } from '../config/schema.js';
import type { ChatPipeline } from '../orchestrator/pipeline.js';
import { gatewayLogger } from '../utils/logger.js';
import { registerHealthRoutes } from './api/health.js';
import {
  registerChatRoutes,
  BAD_REQUEST_BODY,
  INTERNAL_ERROR_BODY,
} from './api/chat.js';

const log = gatewayLogger;

/** The gateway server with start/stop lifecycle. */
export interface GatewayServer {
  /** The underlying Fastify instance (useful for testing via inject()). */
  readonly app: FastifyInstance;

  /**
   * Start listening on the given port and host.
   * @param host - Defaults to '127.0.0.1'.
   */
  start(port: number, host?: string): Promise<void>;

  stop(): Promise<void>;
}

export interface GatewayServerOptions {
  pipeline: ChatPipeline;
  config: Config;
  version: string;
}

/**
 * Create and configure the gateway Fastify server.
 *
 * @returns A configured {@link GatewayServer} instance ready to be started.
 */
export function createGatewayServer(options: GatewayServerOptions): GatewayServer {
  const { pipeline, config, version } = options;

  const app = Fastify({
    logger: false, // We use our own pino logger
    forceCloseConnections: true,
    bodyLimit: config.gateway.bodyLimitBytes,
    genReqId: () => nanoid(),
  });

  // Without origins there is no preflight to answer, so OPTIONS on the
  // chat route falls to the 405 handler.
  const corsEnabled = config.gateway.corsOrigins.length > 0;
  if (corsEnabled) {
    app.register(fastifyCors, {
      origin: config.gateway.corsOrigins,
      methods: ['GET', 'POST', 'OPTIONS'],
    });
  }

  app.addHook('onRequest', async (request, reply) => {
    reply.header('x-request-id', request.id);
  });

  // Framework-level failures (bad JSON, wrong content type, oversized body)
  // get the same generic bodies as the route handlers.
  app.setErrorHandler((error: FastifyError, request, reply) => {
    const status = error.statusCode ?? 500;
    if (status === 413) {
      return reply.status(413).send({ error: 'payload too large' });
    }
    if (status >= 400 && status < 500) {
      log.info({ requestId: request.id, code: error.code }, 'Rejected malformed request');
      return reply.status(400).send(BAD_REQUEST_BODY);
    }
    log.error({ requestId: request.id, code: error.code, error: error.message }, 'Unhandled gateway error');
    return reply.status(500).send(INTERNAL_ERROR_BODY);
  });

  // ── REST API routes ───────────────────────────────────────────────
  registerHealthRoutes(app, version);
  registerChatRoutes(app, {
    pipeline,
    maxExternalData: config.request.maxExternalData,
    corsEnabled,
  });

  return {
    get app(): FastifyInstance {
      return app;
    },

    async start(port: number, host: string = '127.0.0.1'): Promise<void> {
      try {
        await app.listen({ port, host });
        log.info({ port, host }, 'Gateway server started');
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        log.error({ error: message }, 'Failed to start gateway server');
        throw error;
      }
    },

    async stop(): Promise<void> {
      await app.close();
      log.info('Gateway server stopped');
    },
  };
}

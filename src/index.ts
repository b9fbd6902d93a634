/**
 * Tollgate — main entry point.
 * Wires config, collaborator clients, the container executor, the chat
 * pipeline and the gateway, and registers shutdown handlers.
 */

import { loadConfig } from './config/loader.js';
import type { Config } from './config/schema.js';
import { RiskClient, OutputSafetyClient } from './collaborators/index.js';
import { ContainerExecutor } from './sandbox/executor.js';
import { createChatPipeline, type ChatPipeline } from './orchestrator/pipeline.js';
import { createGatewayServer, type GatewayServer } from './gateway/index.js';
import { createShutdownHandler, type ShutdownHandler } from './utils/shutdown.js';
import { createModuleLogger } from './utils/logger.js';
import type { OutputReviewer, PromptExecutor, RiskScorer } from './types/index.js';

export const VERSION = '0.1.0';

const log = createModuleLogger('main');

/** Everything startApp built, for tests and shutdown */
export interface AppContext {
  config: Config;
  pipeline: ChatPipeline;
  gateway: GatewayServer;
  shutdownHandler: ShutdownHandler;
}

/** Options for starting the app, allowing dependency injection for tests. */
export interface StartOptions {
  /** Override config instead of loading from disk. */
  config?: Config;
  riskScorer?: RiskScorer;
  outputReviewer?: OutputReviewer;
  executor?: PromptExecutor;
  /** Skip starting the gateway listener (useful in tests). */
  skipGatewayListen?: boolean;
  /** Skip registering process signal handlers (useful in tests). */
  skipSignalHandlers?: boolean;
}

/**
 * Start Tollgate.
 * Collaborator clients are built once here and shared by every request.
 */
export async function startApp(options: StartOptions = {}): Promise<AppContext> {
  const config = options.config ?? await loadConfig();

  const riskScorer = options.riskScorer ?? new RiskClient(config.risk);
  const outputReviewer = options.outputReviewer ?? new OutputSafetyClient(config.outputSafety);
  const executor = options.executor ?? new ContainerExecutor(config.sandbox);
  log.info(
    {
      riskUrl: config.risk.baseUrl,
      outputUrl: config.outputSafety.baseUrl,
      runtime: config.sandbox.runtime,
      image: config.sandbox.image,
    },
    'Collaborators configured',
  );

  const pipeline = createChatPipeline({
    riskScorer,
    outputReviewer,
    executor,
    deadlineMs: config.request.deadlineMs,
  });

  const gateway = createGatewayServer({ pipeline, config, version: VERSION });

  if (options.skipGatewayListen) {
    await gateway.app.ready();
  } else {
    await gateway.start(config.gateway.port, config.gateway.host);
  }

  const shutdownHandler = createShutdownHandler({
    installSignalHandlers: !options.skipSignalHandlers,
  });
  shutdownHandler.register('gateway', async () => {
    await gateway.stop();
  });

  log.info({ version: VERSION, deadlineMs: config.request.deadlineMs }, 'Tollgate ready');

  return { config, pipeline, gateway, shutdownHandler };
}

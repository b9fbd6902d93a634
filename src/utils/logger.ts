/**
 * Logger module wrapping pino.
 * Provides child loggers per module with automatic redaction of secrets
 * and of any request-derived text that slips into a log object.
 */

import pino from 'pino';

export const REDACT_PATHS: readonly string[] = [
  'apiKey', 'token', 'secret', 'password',
  'message', 'content', 'systemPrompt', 'userContent', 'answer', 'draftAnswer',
  '*.apiKey', '*.token', '*.secret', '*.password',
  '*.message', '*.content', '*.systemPrompt', '*.userContent', '*.answer', '*.draftAnswer',
];

/** Create the root logger instance */
function createLogger(): pino.Logger {
  const level = process.env.LOG_LEVEL ?? process.env.TOLLGATE_LOG_LEVEL ?? 'info';

  const env = process.env.NODE_ENV;
  const transport = env !== 'production' && env !== 'test'
    ? { target: 'pino-pretty', options: { colorize: true } }
    : undefined;

  return pino({
    level,
    transport,
    redact: {
      paths: [...REDACT_PATHS],
      censor: '[REDACTED]',
    },
  });
}

/** Root logger instance */
export const logger = createLogger();

/** Create a child logger for a specific module */
export function createModuleLogger(moduleName: string): pino.Logger {
  return logger.child({ module: moduleName });
}

/** Pre-built module loggers for core subsystems */
export const securityLogger = createModuleLogger('security');
export const gatewayLogger = createModuleLogger('gateway');
export const orchestratorLogger = createModuleLogger('orchestrator');
export const sandboxLogger = createModuleLogger('sandbox');
export const collaboratorLogger = createModuleLogger('collaborator');

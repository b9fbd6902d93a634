/**
 * Process sandbox.
 *
 * Runs a binary in a restricted child process: no shell, a stripped
 * environment, a hard timeout, an abort signal and capped output. The
 * container executor launches the runtime CLI through here.
 */

import { execFile, type ExecFileException } from 'node:child_process';
import { sandboxLogger } from '../utils/logger.js';

export interface SandboxOptions {
  /** Working directory for the child process */
  cwd: string;
  /** Maximum execution time in milliseconds (default: 30000) */
  timeout: number;
  /** Maximum output bytes per stream before the child is killed (default: 1MB) */
  maxOutputBytes: number;
  /** Aborting kills the child */
  signal?: AbortSignal;
}

export interface SandboxResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
  aborted: boolean;
  /** A stream hit maxOutputBytes and the child was killed */
  truncated: boolean;
}

/** Signature of {@link executeInSandbox}, so callers can inject a fake runner */
export type SandboxRunner = (
  binary: string,
  args: string[],
  options?: Partial<SandboxOptions>,
) => Promise<SandboxResult>;

const DEFAULT_OPTIONS: SandboxOptions = {
  cwd: process.cwd(),
  timeout: 30_000,
  maxOutputBytes: 1_048_576,
};

/**
 * Environment variable patterns that are never passed to child processes.
 * Collaborator credentials and the gateway's own settings stay in the parent.
 */
const SENSITIVE_ENV_PATTERNS = [
  /_?API_?KEY/i,
  /_?SECRET/i,
  /_?TOKEN/i,
  /_?PASSWORD/i,
  /^AUTH_/i,
  /^AWS_/i,
  /^TOLLGATE_/i,
  /^DATABASE_URL$/i,
  /^REDIS_URL$/i,
];

const SAFE_PATH = '/usr/local/bin:/usr/bin:/bin';

/**
 * Create a sanitized environment for child processes.
 * Strips sensitive variables and pins PATH to system directories.
 */
export function createSanitizedEnv(): Record<string, string> {
  const sanitized: Record<string, string> = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (value === undefined) continue;
    if (!SENSITIVE_ENV_PATTERNS.some((pattern) => pattern.test(key))) {
      sanitized[key] = value;
    }
  }

  sanitized['PATH'] = SAFE_PATH;
  return sanitized;
}

/**
 * Execute a command in the sandbox. Never rejects: spawn failures, timeouts
 * and aborts are all reported through the result.
 */
export function executeInSandbox(
  binary: string,
  args: string[],
  options?: Partial<SandboxOptions>,
): Promise<SandboxResult> {
  const opts: SandboxOptions = { ...DEFAULT_OPTIONS, ...options };

  sandboxLogger.debug({ binary, argCount: args.length, timeout: opts.timeout }, 'Sandbox execution starting');

  return new Promise((resolve) => {
    let settled = false;
    const settle = (result: SandboxResult): void => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    try {
      const child = execFile(
        binary,
        args,
        {
          cwd: opts.cwd,
          timeout: opts.timeout,
          maxBuffer: opts.maxOutputBytes,
          env: createSanitizedEnv(),
          signal: opts.signal,
          shell: false,
          encoding: 'utf8',
        },
        (error: ExecFileException | null, stdout: string, stderr: string) => {
          const aborted = opts.signal?.aborted === true;
          const timedOut = !aborted && error !== null && error.killed === true;
          const truncated = stdout.length >= opts.maxOutputBytes || stderr.length >= opts.maxOutputBytes;

          if (timedOut) {
            sandboxLogger.warn({ binary, timeout: opts.timeout }, 'Sandbox execution timed out');
          }

          const exitCode = error === null
            ? 0
            : typeof error.code === 'number' ? error.code : 1;

          settle({
            stdout: truncateOutput(stdout, opts.maxOutputBytes),
            stderr: truncateOutput(stderr, opts.maxOutputBytes),
            exitCode,
            timedOut,
            aborted,
            truncated,
          });
        },
      );

      child.on('error', (spawnError: Error) => {
        sandboxLogger.error({ binary, error: spawnError.message }, 'Sandbox spawn error');
        settle({
          stdout: '',
          stderr: spawnError.message,
          exitCode: 1,
          timedOut: false,
          aborted: opts.signal?.aborted === true,
          truncated: false,
        });
      });
    } catch (execError: unknown) {
      const message = execError instanceof Error ? execError.message : 'Unknown execution error';
      sandboxLogger.error({ binary, error: message }, 'Sandbox execution failed');
      settle({
        stdout: '',
        stderr: message,
        exitCode: 1,
        timedOut: false,
        aborted: false,
        truncated: false,
      });
    }
  });
}

function truncateOutput(output: string, maxBytes: number): string {
  if (output.length <= maxBytes) {
    return output;
  }
  return output.substring(0, maxBytes) + '\n[...output truncated...]';
}

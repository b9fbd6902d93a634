/**
 * Container executor.
 *
 * Runs a sandbox prompt pair in a fresh, single-use container: prompts are
 * written to a private temp directory, mounted read-only, and the container
 * runs with networking disabled. Stdout is the draft answer. The directory
 * is removed and the container force-removed on every exit path, so no
 * state survives between calls.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { nanoid } from 'nanoid';
import type { PromptExecutor, SandboxPrompt } from '../types/index.js';
import type { Deadline } from '../utils/deadline.js';
import { ExecutionFailureError, ExecutionTimeoutError } from '../errors.js';
import { executeInSandbox, type SandboxRunner } from '../security/sandbox.js';
import { sandboxLogger } from '../utils/logger.js';

const log = sandboxLogger;

/** File names the sandbox image reads from its input mount */
export const SYSTEM_PROMPT_FILE = 'system.txt';
export const USER_CONTENT_FILE = 'user.txt';

/** Time allowed for the best-effort `rm -f` after a timeout */
const TEARDOWN_TIMEOUT_MS = 5_000;

/** Diagnostics kept on an ExecutionFailureError */
const MAX_DIAGNOSTICS_CHARS = 2_000;

export interface ContainerExecutorConfig {
  /** Container runtime CLI, e.g. "docker" or "podman" */
  runtime: string;
  image: string;
  /** Sub-deadline for one execution; capped by the request deadline */
  timeoutMs: number;
  /** Where the prompt files appear inside the container */
  mountPath: string;
  maxOutputBytes: number;
  /** Parent directory for the per-call temp directory (default: os.tmpdir()) */
  workDir?: string;
  /** Process runner, injectable for tests */
  runner?: SandboxRunner;
}

/**
 * Build the runtime arguments for one isolated run.
 */
export function buildRunArgs(
  config: Pick<ContainerExecutorConfig, 'image' | 'mountPath'>,
  containerName: string,
  inputDir: string,
): string[] {
  return [
    'run',
    '--rm',
    '--name', containerName,
    '--network', 'none',
    '--read-only',
    '--cap-drop', 'ALL',
    '--security-opt', 'no-new-privileges',
    '-v', `${inputDir}:${config.mountPath}:ro`,
    config.image,
  ];
}

export class ContainerExecutor implements PromptExecutor {
  private readonly config: ContainerExecutorConfig;
  private readonly runner: SandboxRunner;

  constructor(config: ContainerExecutorConfig) {
    this.config = config;
    this.runner = config.runner ?? executeInSandbox;
  }

  /**
   * Execute the prompt pair.
   *
   * @returns The container's stdout
   * @throws {ExecutionTimeoutError} When the sub-deadline elapses
   * @throws {ExecutionFailureError} On nonzero exit or setup failure
   * @throws The request deadline's abort reason when the parent is cancelled
   */
  async execute(prompt: SandboxPrompt, deadline: Deadline): Promise<string> {
    deadline.throwIfExpired();

    const subDeadline = deadline.child(this.config.timeoutMs);
    const containerName = `tollgate-${nanoid(12)}`;
    let inputDir: string | undefined;
    let needsForcedRemoval = false;

    try {
      try {
        inputDir = await mkdtemp(path.join(this.config.workDir ?? os.tmpdir(), 'tollgate-input-'));
        await writeFile(path.join(inputDir, SYSTEM_PROMPT_FILE), prompt.systemPrompt, { mode: 0o600 });
        await writeFile(path.join(inputDir, USER_CONTENT_FILE), prompt.userContent, { mode: 0o600 });
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ExecutionFailureError(`Sandbox setup failed: ${message}`, message);
      }

      log.debug({ containerName, budgetMs: subDeadline.budgetMs }, 'Starting sandboxed execution');

      const result = await this.runner(
        this.config.runtime,
        buildRunArgs(this.config, containerName, inputDir),
        {
          cwd: inputDir,
          // execFile reads 0 as "no timeout"
          timeout: Math.max(1, subDeadline.budgetMs),
          maxOutputBytes: this.config.maxOutputBytes,
          signal: subDeadline.signal,
        },
      );

      if (result.aborted || result.timedOut) {
        needsForcedRemoval = true;
        // Parent cancelled (request deadline or client gone): surface that.
        deadline.throwIfExpired();
        throw new ExecutionTimeoutError(subDeadline.budgetMs);
      }

      if (result.truncated) {
        throw new ExecutionFailureError(
          `Sandbox output exceeded ${this.config.maxOutputBytes} bytes`,
          result.stderr.slice(0, MAX_DIAGNOSTICS_CHARS),
          result.exitCode,
        );
      }

      if (result.exitCode !== 0) {
        throw new ExecutionFailureError(
          `Sandbox exited with code ${result.exitCode}`,
          result.stderr.slice(0, MAX_DIAGNOSTICS_CHARS),
          result.exitCode,
        );
      }

      if (result.stderr !== '') {
        log.debug({ containerName, stderrBytes: result.stderr.length }, 'Sandbox wrote diagnostics');
      }
      return result.stdout;
    } finally {
      subDeadline.dispose();
      if (needsForcedRemoval) {
        await this.forceRemove(containerName);
      }
      if (inputDir !== undefined) {
        await rm(inputDir, { recursive: true, force: true });
      }
    }
  }

  /** Kill a container left behind when its CLI client was killed */
  private async forceRemove(containerName: string): Promise<void> {
    const result = await this.runner(this.config.runtime, ['rm', '-f', containerName], {
      timeout: TEARDOWN_TIMEOUT_MS,
      maxOutputBytes: 65_536,
    });
    if (result.exitCode !== 0) {
      log.warn({ containerName, exitCode: result.exitCode }, 'Forced container removal failed');
    } else {
      log.info({ containerName }, 'Timed-out container removed');
    }
  }
}

/**
 * JSON-over-HTTP transport shared by the collaborator clients.
 * Uses native fetch. Every failure mode (transport, timeout, non-2xx,
 * unparseable or off-contract body) becomes a CollaboratorError.
 */

import type { z } from 'zod';
import { CollaboratorError, type CollaboratorName } from '../errors.js';
import { Deadline } from '../utils/deadline.js';
import { collaboratorLogger } from '../utils/logger.js';

export interface PostJsonOptions {
  /** Per-call budget of this client */
  timeoutMs: number;
  /** Request-level cancellation */
  signal?: AbortSignal;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * POST a JSON body and validate the JSON reply.
 *
 * @throws {CollaboratorError} On any failure
 */
export async function postJson<T>(
  service: CollaboratorName,
  url: string,
  body: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: PostJsonOptions,
): Promise<T> {
  const callDeadline = new Deadline(options.timeoutMs, options.signal);
  const startedAt = Date.now();

  try {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: callDeadline.signal,
      });
    } catch (error: unknown) {
      if (callDeadline.isExpired()) {
        const reason = options.signal?.aborted === true ? 'request cancelled' : `timed out after ${options.timeoutMs}ms`;
        throw new CollaboratorError(`${service} call ${reason}`, service);
      }
      throw new CollaboratorError(`${service} service unreachable: ${describe(error)}`, service);
    }

    if (!response.ok) {
      // Drain so the connection can be reused.
      await response.arrayBuffer().catch(() => undefined);
      throw new CollaboratorError(
        `${service} service returned status ${response.status}`,
        service,
        response.status,
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error: unknown) {
      throw new CollaboratorError(`${service} response is not JSON: ${describe(error)}`, service, response.status);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new CollaboratorError(`${service} response failed validation: ${issues}`, service, response.status);
    }

    collaboratorLogger.debug({ service, status: response.status, elapsedMs: Date.now() - startedAt }, 'Collaborator call completed');
    return parsed.data;
  } catch (error: unknown) {
    const code = error instanceof CollaboratorError ? error.statusCode : undefined;
    collaboratorLogger.warn({ service, statusCode: code, error: describe(error) }, 'Collaborator call failed');
    throw error;
  } finally {
    callDeadline.dispose();
  }
}

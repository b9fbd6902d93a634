/**
 * Unit tests for the risk-scoring client.
 * Stubs global fetch to simulate the risk service.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RiskClient } from '../../../src/collaborators/risk.js';
import { CollaboratorError } from '../../../src/errors.js';

const metadata = { userId: 'u1', sessionId: 's1' };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

let originalFetch: typeof globalThis.fetch;

beforeEach(() => {
  originalFetch = globalThis.fetch;
});

afterEach(() => {
  globalThis.fetch = originalFetch;
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe('RiskClient', () => {
  it('posts the prompt and metadata to /v1/risk-score', async () => {
    let capturedUrl = '';
    let capturedBody = '';
    let capturedMethod = '';

    vi.stubGlobal('fetch', async (url: string | URL | Request, init?: RequestInit) => {
      capturedUrl = typeof url === 'string' ? url : url.toString();
      capturedBody = typeof init?.body === 'string' ? init.body : '';
      capturedMethod = init?.method ?? '';
      return jsonResponse({ sanitized_prompt: 'hi', risk_level: 'LOW', flags: [], self_check_required: false });
    });

    const client = new RiskClient({ baseUrl: 'http://risk.test:8001/', timeoutMs: 1_000 });
    await client.score('hi', metadata);

    expect(capturedUrl).toBe('http://risk.test:8001/v1/risk-score');
    expect(capturedMethod).toBe('POST');
    expect(JSON.parse(capturedBody)).toEqual({
      prompt: 'hi',
      metadata: { user_id: 'u1', session_id: 's1' },
    });
  });

  it('maps the response to a frozen assessment', async () => {
    vi.stubGlobal('fetch', async () => jsonResponse({
      sanitized_prompt: 'cleaned',
      risk_level: 'HIGH',
      flags: ['prompt_injection'],
      self_check_required: true,
    }));

    const client = new RiskClient({ baseUrl: 'http://risk.test', timeoutMs: 1_000 });
    const risk = await client.score('x', metadata);

    expect(risk).toEqual({
      sanitizedPrompt: 'cleaned',
      riskLevel: 'HIGH',
      flags: ['prompt_injection'],
      selfCheckRequired: true,
    });
    expect(Object.isFrozen(risk)).toBe(true);
  });

  it('treats missing or null optional fields as empty', async () => {
    vi.stubGlobal('fetch', async () => jsonResponse({ risk_level: 'MEDIUM', flags: null }));

    const client = new RiskClient({ baseUrl: 'http://risk.test', timeoutMs: 1_000 });
    const risk = await client.score('x', metadata);

    expect(risk).toEqual({ sanitizedPrompt: '', riskLevel: 'MEDIUM', flags: [], selfCheckRequired: false });
  });

  it('rejects an unknown risk level', async () => {
    vi.stubGlobal('fetch', async () => jsonResponse({ risk_level: 'CRITICAL' }));

    const client = new RiskClient({ baseUrl: 'http://risk.test', timeoutMs: 1_000 });
    await expect(client.score('x', metadata)).rejects.toThrow(/risk response failed validation: risk_level/);
  });

  it('throws CollaboratorError with the status on a non-2xx answer', async () => {
    vi.stubGlobal('fetch', async () => new Response('overloaded', { status: 503 }));

    const client = new RiskClient({ baseUrl: 'http://risk.test', timeoutMs: 1_000 });
    const error = await client.score('x', metadata).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CollaboratorError);
    if (error instanceof CollaboratorError) {
      expect(error.service).toBe('risk');
      expect(error.statusCode).toBe(503);
      expect(error.message).toBe('risk service returned status 503');
    }
  });

  it('throws CollaboratorError when the service is unreachable', async () => {
    vi.stubGlobal('fetch', async () => {
      throw new TypeError('fetch failed: ECONNREFUSED');
    });

    const client = new RiskClient({ baseUrl: 'http://risk.test', timeoutMs: 1_000 });
    await expect(client.score('x', metadata))
      .rejects.toThrow('risk service unreachable: fetch failed: ECONNREFUSED');
  });

  it('throws CollaboratorError on a non-JSON body', async () => {
    vi.stubGlobal('fetch', async () => new Response('<html>', { status: 200 }));

    const client = new RiskClient({ baseUrl: 'http://risk.test', timeoutMs: 1_000 });
    await expect(client.score('x', metadata)).rejects.toThrow(/^risk response is not JSON/);
  });

  it('times out a slow service', async () => {
    vi.stubGlobal('fetch', (_url: string | URL | Request, init?: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      }));

    const client = new RiskClient({ baseUrl: 'http://risk.test', timeoutMs: 20 });
    await expect(client.score('x', metadata)).rejects.toThrow('risk call timed out after 20ms');
  });

  it('reports cancellation by the caller', async () => {
    vi.stubGlobal('fetch', (_url: string | URL | Request, init?: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      }));

    const controller = new AbortController();
    const client = new RiskClient({ baseUrl: 'http://risk.test', timeoutMs: 5_000 });
    const pending = client.score('x', metadata, controller.signal);
    controller.abort();

    await expect(pending).rejects.toThrow('risk call request cancelled');
  });
});

/**
 * Client for the risk-scoring service.
 * POST {baseUrl}/v1/risk-score
 */

import { z } from 'zod';
import type {
  RiskAssessment,
  RiskScorer,
  ScoringMetadata,
} from '../types/index.js';
import { postJson } from './http.js';

export const RiskResponseSchema = z.object({
  sanitized_prompt: z.string().default(''),
  risk_level: z.enum(['LOW', 'MEDIUM', 'HIGH']),
  flags: z.array(z.string()).nullish().transform((flags) => flags ?? []),
  self_check_required: z.boolean().default(false),
});

export interface RiskClientConfig {
  baseUrl: string;
  timeoutMs: number;
}

export class RiskClient implements RiskScorer {
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(config: RiskClientConfig) {
    this.endpoint = `${config.baseUrl.replace(/\/+$/, '')}/v1/risk-score`;
    this.timeoutMs = config.timeoutMs;
  }

  /**
   * Score a piece of text.
   * @throws {CollaboratorError} When the service is unreachable or answers off-contract
   */
  async score(prompt: string, metadata: ScoringMetadata, signal?: AbortSignal): Promise<RiskAssessment> {
    const body = {
      prompt,
      metadata: {
        user_id: metadata.userId,
        session_id: metadata.sessionId,
      },
    };

    const data = await postJson('risk', this.endpoint, body, RiskResponseSchema, {
      timeoutMs: this.timeoutMs,
      signal,
    });

    return Object.freeze({
      sanitizedPrompt: data.sanitized_prompt,
      riskLevel: data.risk_level,
      flags: Object.freeze([...data.flags]),
      selfCheckRequired: data.self_check_required,
    });
  }
}

/**
 * Client for the output-safety review service.
 * POST {baseUrl}/v1/output-safety
 */

import { z } from 'zod';
import type {
  OutputReviewer,
  ReviewRequest,
  SafetyReview,
} from '../types/index.js';
import { postJson } from './http.js';

export const OutputSafetyResponseSchema = z.object({
  final_answer: z.string(),
  was_modified: z.boolean().default(false),
  reason_flags: z.array(z.string()).nullish().transform((flags) => flags ?? []),
});

export interface OutputSafetyClientConfig {
  baseUrl: string;
  timeoutMs: number;
}

export class OutputSafetyClient implements OutputReviewer {
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(config: OutputSafetyClientConfig) {
    this.endpoint = `${config.baseUrl.replace(/\/+$/, '')}/v1/output-safety`;
    this.timeoutMs = config.timeoutMs;
  }

  /**
   * Review a draft answer. `mode` is the handling path.
   * @throws {CollaboratorError} When the service is unreachable or answers off-contract
   */
  async review(request: ReviewRequest, signal?: AbortSignal): Promise<SafetyReview> {
    const body = {
      user_prompt: request.userPrompt,
      draft_answer: request.draftAnswer,
      risk_level: request.riskLevel,
      flags: request.flags,
      mode: request.mode,
    };

    const data = await postJson('output_safety', this.endpoint, body, OutputSafetyResponseSchema, {
      timeoutMs: this.timeoutMs,
      signal,
    });

    return Object.freeze({
      finalAnswer: data.final_answer,
      wasModified: data.was_modified,
      reasonFlags: Object.freeze([...data.reason_flags]),
    });
  }
}

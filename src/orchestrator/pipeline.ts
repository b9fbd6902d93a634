/**
 * Chat pipeline.
 *
 * Sequences one request through the gateway:
 *   received → risk_scored → path_decided → external_scanned →
 *   prompt_built → executed → reviewed → responded
 * Any failure aborts the request with a RequestAbortedError naming the
 * last stage reached. There are no retries and no partial
 * answers. One deadline, created on entry, bounds every downstream call.
 */

import type {
  ChatRequest,
  ChatResponseBody,
  HandlingPath,
  OutputReviewer,
  PromptExecutor,
  RiskAssessment,
  RiskScorer,
  SafetyReview,
  SandboxPrompt,
  ScannedDatum,
} from '../types/index.js';
import { RequestAbortedError } from '../errors.js';
import { Deadline } from '../utils/deadline.js';
import { orchestratorLogger } from '../utils/logger.js';
import { scanExternalData, summarizeScan, type ScanSummary } from '../security/taint-scanner.js';
import { countMaskedTokens } from '../security/masking.js';
import { decidePath } from './path-policy.js';
import { buildSandboxPrompt } from './prompt-builder.js';

export type PipelineStage =
  | 'received'
  | 'risk_scored'
  | 'path_decided'
  | 'external_scanned'
  | 'prompt_built'
  | 'executed'
  | 'reviewed'
  | 'responded';

/** Review flag added when at least one datum was scored HIGH */
export const EXTERNAL_DATA_FLAGGED = 'external_data_flagged';
/** Review flag added when at least one datum could not be scanned */
export const EXTERNAL_SCAN_DEGRADED = 'external_scan_degraded';

export interface ChatPipelineDeps {
  riskScorer: RiskScorer;
  outputReviewer: OutputReviewer;
  executor: PromptExecutor;
  /** End-to-end budget per request */
  deadlineMs: number;
}

export interface HandleOptions {
  /** Correlates log lines; generated by the gateway */
  requestId?: string;
  /** Aborts the whole request (e.g. the client disconnected) */
  signal?: AbortSignal;
}

export interface ChatPipeline {
  /**
   * Run one request to completion.
   * @throws {RequestAbortedError} On any collaborator, execution or deadline failure
   */
  handle(request: ChatRequest, options?: HandleOptions): Promise<ChatResponseBody>;
}

/** Risk flags plus the scan signals the reviewer should see */
export function buildReviewFlags(risk: RiskAssessment, scan: ScanSummary): string[] {
  const flags = [...risk.flags];
  if (scan.flagged > 0) flags.push(EXTERNAL_DATA_FLAGGED);
  if (scan.failed > 0) flags.push(EXTERNAL_SCAN_DEGRADED);
  return flags;
}

export function createChatPipeline(deps: ChatPipelineDeps): ChatPipeline {
  async function handle(request: ChatRequest, options: HandleOptions = {}): Promise<ChatResponseBody> {
    const deadline = new Deadline(deps.deadlineMs, options.signal);
    const log = orchestratorLogger.child({ requestId: options.requestId });
    const startedAt = Date.now();
    let stage: PipelineStage = 'received';

    const advance = (next: PipelineStage): void => {
      stage = next;
      log.debug({ stage, elapsedMs: Date.now() - startedAt }, 'Pipeline stage reached');
    };

    try {
      const risk: RiskAssessment = await deps.riskScorer.score(
        request.message,
        { userId: request.userId, sessionId: request.sessionId },
        deadline.signal,
      );
      deadline.throwIfExpired();
      advance('risk_scored');

      const path: HandlingPath = decidePath(risk);
      advance('path_decided');

      const scanned: ScannedDatum[] = await scanExternalData(request.externalData, {
        userId: request.userId,
        sessionId: request.sessionId,
        riskScorer: deps.riskScorer,
        deadline,
      });
      deadline.throwIfExpired();
      const scan = summarizeScan(scanned);
      advance('external_scanned');

      const prompt: SandboxPrompt = buildSandboxPrompt({
        userMessage: request.message,
        risk,
        externalData: scanned,
        userId: request.userId,
        sessionId: request.sessionId,
      });
      log.debug({ masked: countMaskedTokens(prompt.userContent) }, 'Sandbox prompt built');
      advance('prompt_built');

      const draftAnswer = await deps.executor.execute(prompt, deadline);
      deadline.throwIfExpired();
      advance('executed');

      const review: SafetyReview = await deps.outputReviewer.review(
        {
          userPrompt: request.message,
          draftAnswer,
          riskLevel: risk.riskLevel,
          flags: buildReviewFlags(risk, scan),
          mode: path,
        },
        deadline.signal,
      );
      deadline.throwIfExpired();
      advance('reviewed');

      const response: ChatResponseBody = {
        answer: review.finalAnswer,
        risk_level: risk.riskLevel,
        path,
      };
      advance('responded');

      log.info(
        {
          path,
          riskLevel: risk.riskLevel,
          externalData: scan.total,
          flagged: scan.flagged,
          scanFailed: scan.failed,
          wasModified: review.wasModified,
          reasonFlags: review.reasonFlags,
          elapsedMs: Date.now() - startedAt,
        },
        'Request completed',
      );
      return response;
    } catch (error: unknown) {
      const failedAt = stage;
      const code = error instanceof Error && 'code' in error ? String(error.code) : 'UNKNOWN';
      log.error(
        {
          stage: failedAt,
          code,
          error: error instanceof Error ? error.message : String(error),
          elapsedMs: Date.now() - startedAt,
        },
        'Request aborted',
      );
      throw new RequestAbortedError(failedAt, error);
    } finally {
      deadline.dispose();
    }
  }

  return { handle };
}

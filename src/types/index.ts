/**
 * Canonical interface definitions for Tollgate.
 * Shared types live here and are imported throughout the project.
 */

import type { Deadline } from '../utils/deadline.js';

// === Requests ===

/** A piece of untrusted content bundled with a chat request (retrieved document, tool output, ...) */
export interface ExternalDatum {
  /** Caller-assigned, used only for display and audit */
  id: string;
  /** Free-form provenance, e.g. "kb:payments" or "tool:db-query" */
  source: string;
  /** Content kind, e.g. "document", "web_page", "tool_output" */
  type: string;
  content: string;
}

export interface ChatRequest {
  userId: string;
  sessionId: string;
  message: string;
  externalData: ExternalDatum[];
}

// === Taint ===

export type TaintReason = 'high_risk' | 'scan_failed';

/** Scan verdict for one external datum. There is no unscanned or default state. */
export type Taint =
  | { status: 'trusted' }
  | { status: 'dangerous'; reason: TaintReason };

/** An external datum after exactly one pass of the taint scanner */
export interface ScannedDatum extends ExternalDatum {
  readonly taint: Taint;
}

// === Risk ===

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export interface RiskAssessment {
  readonly sanitizedPrompt: string;
  readonly riskLevel: RiskLevel;
  readonly flags: readonly string[];
  readonly selfCheckRequired: boolean;
}

export type HandlingPath = 'fast' | 'slow';

// === Prompts ===

export interface SandboxPrompt {
  readonly systemPrompt: string;
  readonly userContent: string;
}

// === Output review ===

export interface ReviewRequest {
  userPrompt: string;
  draftAnswer: string;
  riskLevel: RiskLevel;
  flags: string[];
  mode: HandlingPath;
}

export interface SafetyReview {
  readonly finalAnswer: string;
  readonly wasModified: boolean;
  readonly reasonFlags: readonly string[];
}

// === Collaborator capabilities ===

/** Identity attached to every risk scoring call */
export interface ScoringMetadata {
  userId: string;
  sessionId: string;
}

export interface RiskScorer {
  score(prompt: string, metadata: ScoringMetadata, signal?: AbortSignal): Promise<RiskAssessment>;
}

export interface OutputReviewer {
  review(request: ReviewRequest, signal?: AbortSignal): Promise<SafetyReview>;
}

/** Runs a composed prompt pair inside an isolated, single-use environment */
export interface PromptExecutor {
  execute(prompt: SandboxPrompt, deadline: Deadline): Promise<string>;
}

// === Responses ===

/** Body of a successful POST /v1/chat */
export interface ChatResponseBody {
  answer: string;
  risk_level: RiskLevel;
  path: HandlingPath;
}

export interface HealthData {
  status: 'ok';
  uptime: number;
  version: string;
}

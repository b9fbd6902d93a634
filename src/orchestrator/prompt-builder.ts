/**
 * Prompt isolation builder.
 * Produces the two channels handed to the sandbox: the fixed system prompt
 * and a per-request user-content block. All request-derived text is masked
 * and boundary-checked before it lands in the user content.
 */

import type {
  RiskAssessment,
  SandboxPrompt,
  ScannedDatum,
} from '../types/index.js';
import { maskSensitiveText } from '../security/masking.js';
import {
  EMPTY_EXTERNAL_DATA_MARKER,
  neutralizeBoundaryTags,
  wrapExternalDatum,
} from '../security/spotlighting.js';
import { SYSTEM_PROMPT } from './system-prompt.js';

export interface PromptBuildInput {
  userMessage: string;
  risk?: RiskAssessment;
  externalData: readonly ScannedDatum[];
  userId: string;
  sessionId: string;
}

/** Mask, then neutralize boundary lookalikes */
function clean(text: string): string {
  return neutralizeBoundaryTags(maskSensitiveText(text));
}

/** Identifiers and risk metadata. Never secrets. */
function buildContextSection(input: PromptBuildInput): string | undefined {
  if (input.userId === '' && input.sessionId === '' && input.risk === undefined) {
    return undefined;
  }

  const lines = ['<context>'];
  if (input.userId !== '') {
    lines.push(`user_id: ${clean(input.userId)}`);
  }
  if (input.sessionId !== '') {
    lines.push(`session_id: ${clean(input.sessionId)}`);
  }
  if (input.risk) {
    lines.push(`risk_level: ${input.risk.riskLevel}`);
    if (input.risk.flags.length > 0) {
      lines.push(`risk_flags: ${input.risk.flags.map(clean).join(', ')}`);
    }
  }
  lines.push('</context>');
  return lines.join('\n');
}

function buildRequestSection(userMessage: string): string {
  return `User request:\n${clean(userMessage)}`;
}

function buildExternalDataSection(data: readonly ScannedDatum[]): string {
  if (data.length === 0) {
    return ['<external_data>', EMPTY_EXTERNAL_DATA_MARKER, '</external_data>'].join('\n');
  }
  const blocks = data.map(wrapExternalDatum);
  return ['<external_data>', blocks.join('\n\n'), '</external_data>'].join('\n');
}

/**
 * Build the sandbox prompt pair.
 * The returned object is frozen; the system prompt is identical for every call.
 */
export function buildSandboxPrompt(input: PromptBuildInput): SandboxPrompt {
  const sections: string[] = [];

  const context = buildContextSection(input);
  if (context !== undefined) {
    sections.push(context);
  }
  sections.push(buildRequestSection(input.userMessage));
  sections.push(buildExternalDataSection(input.externalData));

  return Object.freeze({
    systemPrompt: SYSTEM_PROMPT,
    userContent: sections.join('\n\n') + '\n',
  });
}

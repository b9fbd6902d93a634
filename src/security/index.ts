/**
 * Security module — re-exports all security components.
 */

export { maskSensitiveText, countMaskedTokens } from './masking.js';
export type { MaskKind } from './masking.js';
export {
  wrapExternalDatum,
  neutralizeBoundaryTags,
  sanitizeAttribute,
  EMPTY_EXTERNAL_DATA_MARKER,
} from './spotlighting.js';
export { scanExternalData, summarizeScan } from './taint-scanner.js';
export type { ScanContext, ScanSummary } from './taint-scanner.js';
export { executeInSandbox, createSanitizedEnv } from './sandbox.js';
export type { SandboxOptions, SandboxResult, SandboxRunner } from './sandbox.js';

/**
 * Collaborator clients public API.
 */

export { RiskClient, RiskResponseSchema, type RiskClientConfig } from './risk.js';
export { OutputSafetyClient, OutputSafetyResponseSchema, type OutputSafetyClientConfig } from './output-safety.js';
export { postJson, type PostJsonOptions } from './http.js';

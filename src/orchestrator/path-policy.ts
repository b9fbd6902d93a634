/**
 * Fast/slow path selection.
 * The slow path asks the output reviewer for its stricter pass.
 */

import type { HandlingPath, RiskAssessment } from '../types/index.js';

export function decidePath(risk: Pick<RiskAssessment, 'riskLevel' | 'selfCheckRequired'>): HandlingPath {
  if (risk.riskLevel === 'HIGH' || risk.selfCheckRequired) {
    return 'slow';
  }
  return 'fast';
}

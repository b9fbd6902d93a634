/**
 * Taint scanning for external content.
 * Every datum bundled with a request is scored by the risk collaborator on
 * its own. A HIGH verdict or a failed scan marks the datum dangerous; the
 * scan fails closed, so content that could not be assessed is never trusted.
 */

import type {
  ExternalDatum,
  RiskScorer,
  ScannedDatum,
  Taint,
} from '../types/index.js';
import type { Deadline } from '../utils/deadline.js';
import { securityLogger } from '../utils/logger.js';

export interface ScanContext {
  userId: string;
  sessionId: string;
  riskScorer: RiskScorer;
  deadline: Deadline;
}

/** Summary of a scan pass, for logs and for the output review flags */
export interface ScanSummary {
  total: number;
  flagged: number;
  failed: number;
}

async function scanOne(datum: ExternalDatum, ctx: ScanContext): Promise<ScannedDatum> {
  let taint: Taint;
  try {
    const risk = await ctx.riskScorer.score(
      datum.content,
      { userId: ctx.userId, sessionId: ctx.sessionId },
      ctx.deadline.signal,
    );
    if (risk.riskLevel === 'HIGH') {
      securityLogger.warn({ datumId: datum.id, flags: risk.flags }, 'External data flagged as HIGH risk');
      taint = { status: 'dangerous', reason: 'high_risk' };
    } else {
      taint = { status: 'trusted' };
    }
  } catch (error: unknown) {
    // The request itself is out of time: abort rather than taint.
    ctx.deadline.throwIfExpired();
    const message = error instanceof Error ? error.message : String(error);
    securityLogger.warn({ datumId: datum.id, error: message }, 'External data scan failed, marking dangerous');
    taint = { status: 'dangerous', reason: 'scan_failed' };
  }

  return { ...datum, taint };
}

/**
 * Scan all external data concurrently.
 * The result keeps the input order and holds exactly one verdict per datum.
 *
 * @throws The deadline's abort reason if the request deadline expires mid-scan
 */
export async function scanExternalData(
  data: readonly ExternalDatum[],
  ctx: ScanContext,
): Promise<ScannedDatum[]> {
  return Promise.all(data.map((datum) => scanOne(datum, ctx)));
}

export function summarizeScan(scanned: readonly ScannedDatum[]): ScanSummary {
  let flagged = 0;
  let failed = 0;
  for (const datum of scanned) {
    if (datum.taint.status !== 'dangerous') continue;
    if (datum.taint.reason === 'scan_failed') {
      failed += 1;
    } else {
      flagged += 1;
    }
  }
  return { total: scanned.length, flagged, failed };
}

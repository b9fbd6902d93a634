/**
 * Configuration schema for Tollgate.
 * Defines the full Zod schema with defaults for every setting.
 */

import { z } from 'zod';

const urlString = z.string().url();
const positiveMs = z.number().int().positive();

export const ConfigSchema = z.object({
  version: z.number().default(1),
  gateway: z.object({
    host: z.string().default('127.0.0.1'),
    port: z.number().int().min(0).max(65_535).default(8082),
    bodyLimitBytes: z.number().int().positive().default(1_048_576),
    /** Browser origins allowed to call the API; empty disables CORS */
    corsOrigins: z.array(z.string()).default([]),
  }).default({}),
  request: z.object({
    deadlineMs: positiveMs.default(30_000),
    maxExternalData: z.number().int().min(0).default(32),
  }).default({}),
  risk: z.object({
    baseUrl: urlString.default('http://localhost:8001'),
    timeoutMs: positiveMs.default(2_000),
  }).default({}),
  outputSafety: z.object({
    baseUrl: urlString.default('http://localhost:8002'),
    timeoutMs: positiveMs.default(3_000),
  }).default({}),
  sandbox: z.object({
    runtime: z.string().min(1).default('docker'),
    image: z.string().min(1).default('tollgate-llm-sandbox:latest'),
    timeoutMs: positiveMs.default(15_000),
    mountPath: z.string().startsWith('/').default('/app/input'),
    maxOutputBytes: z.number().int().positive().default(1_048_576),
  }).default({}),
});

/** Fully-resolved configuration type inferred from the Zod schema */
export type Config = z.infer<typeof ConfigSchema>;

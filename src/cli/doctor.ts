/**
 * Doctor Command
 *
 * Runs system health checks and prints a diagnostic report.
 * Checks: Node.js version, config validity, container runtime.
 */

import { loadConfig } from '../config/index.js';
import type { Config } from '../config/index.js';
import { executeInSandbox, type SandboxRunner } from '../security/sandbox.js';

/** Result of a single doctor check */
export interface CheckResult {
  name: string;
  passed: boolean;
  message: string;
}

const RUNTIME_PROBE_TIMEOUT_MS = 5_000;

/**
 * Run all doctor checks and print results.
 * Returns exit code 0 if all checks pass, 1 otherwise.
 */
export async function runDoctor(): Promise<number> {
  console.log('\n  Tollgate Doctor\n');

  const checks = await getDoctorResults();

  let allPassed = true;
  for (const check of checks) {
    const icon = check.passed ? '✅' : '❌';
    console.log(`  ${icon}  ${check.name}: ${check.message}`);
    if (!check.passed) {
      allPassed = false;
    }
  }

  console.log('');
  if (allPassed) {
    console.log('  All checks passed! Tollgate is ready.\n');
  } else {
    console.log('  Some checks failed. Fix the issues above.\n');
  }

  return allPassed ? 0 : 1;
}

/**
 * Run all checks and return structured results (for testing).
 * The runtime probe is skipped when the config itself is invalid.
 */
export async function getDoctorResults(runner: SandboxRunner = executeInSandbox): Promise<CheckResult[]> {
  const checks: CheckResult[] = [];
  checks.push(checkNodeVersion());

  const { check, config } = await validateConfig();
  checks.push(check);

  if (config) {
    checks.push(await checkContainerRuntime(config.sandbox.runtime, runner));
  } else {
    checks.push({ name: 'Container runtime', passed: false, message: 'Cannot check — config is invalid' });
  }
  return checks;
}

/** Check that Node.js version is >= 20 */
export function checkNodeVersion(version: string = process.versions.node): CheckResult {
  const major = parseInt(version.split('.')[0] ?? '0', 10);
  if (major >= 20) {
    return { name: 'Node.js version', passed: true, message: `v${version} (>= 20 required)` };
  }
  return { name: 'Node.js version', passed: false, message: `v${version} — requires Node.js 20+` };
}

/** Check that the config file and environment produce a valid config */
export async function checkConfigValid(): Promise<CheckResult> {
  const { check } = await validateConfig();
  return check;
}

async function validateConfig(): Promise<{ check: CheckResult; config?: Config }> {
  try {
    const config = await loadConfig();
    return {
      check: { name: 'Config validation', passed: true, message: `Valid (version ${config.version})` },
      config,
    };
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return { check: { name: 'Config validation', passed: false, message } };
  }
}

/** Check that `<runtime> version` runs and exits 0 */
export async function checkContainerRuntime(
  runtime: string,
  runner: SandboxRunner = executeInSandbox,
): Promise<CheckResult> {
  const result = await runner(runtime, ['version'], {
    cwd: process.cwd(),
    timeout: RUNTIME_PROBE_TIMEOUT_MS,
    maxOutputBytes: 64 * 1024,
  });

  if (result.timedOut) {
    return { name: 'Container runtime', passed: false, message: `"${runtime} version" timed out` };
  }
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim().split('\n')[0] ?? '';
    return {
      name: 'Container runtime',
      passed: false,
      message: `"${runtime} version" exited with ${result.exitCode}${detail ? `: ${detail}` : ''}`,
    };
  }
  return { name: 'Container runtime', passed: true, message: `${runtime} is reachable` };
}

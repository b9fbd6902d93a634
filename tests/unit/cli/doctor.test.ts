import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  checkNodeVersion,
  checkConfigValid,
  checkContainerRuntime,
  getDoctorResults,
} from '../../../src/cli/doctor.js';
import type { SandboxResult, SandboxRunner } from '../../../src/security/sandbox.js';

function fakeRunner(result: Partial<SandboxResult>, seen: string[][] = []): SandboxRunner {
  return async (binary, args) => {
    seen.push([binary, ...args]);
    return {
      stdout: '',
      stderr: '',
      exitCode: 0,
      timedOut: false,
      aborted: false,
      truncated: false,
      ...result,
    };
  };
}

describe('doctor checks', () => {
  describe('checkNodeVersion', () => {
    it('passes for Node.js 20', () => {
      expect(checkNodeVersion('20.11.1')).toEqual({
        name: 'Node.js version',
        passed: true,
        message: 'v20.11.1 (>= 20 required)',
      });
    });

    it('fails for older versions', () => {
      const result = checkNodeVersion('18.19.0');
      expect(result.passed).toBe(false);
      expect(result.message).toBe('v18.19.0 — requires Node.js 20+');
    });

    it('checks the running version by default', () => {
      expect(checkNodeVersion().message).toContain(process.versions.node);
    });
  });

  describe('config-dependent checks', () => {
    const originalHome = process.env.TOLLGATE_HOME;
    const originalRuntime = process.env.TOLLGATE_SANDBOX_RUNTIME;
    let testDir: string;

    beforeEach(() => {
      testDir = mkdtempSync(join(tmpdir(), 'tollgate-doctor-test-'));
      process.env.TOLLGATE_HOME = testDir;
      delete process.env.TOLLGATE_SANDBOX_RUNTIME;
    });

    afterEach(() => {
      if (originalHome !== undefined) {
        process.env.TOLLGATE_HOME = originalHome;
      } else {
        delete process.env.TOLLGATE_HOME;
      }
      if (originalRuntime !== undefined) {
        process.env.TOLLGATE_SANDBOX_RUNTIME = originalRuntime;
      }
      rmSync(testDir, { recursive: true, force: true });
    });

    it('accepts a missing config file (defaults apply)', async () => {
      const result = await checkConfigValid();
      expect(result).toEqual({ name: 'Config validation', passed: true, message: 'Valid (version 1)' });
    });

    it('fails on an invalid config file', async () => {
      writeFileSync(join(testDir, 'config.json'), '{ broken');
      const result = await checkConfigValid();
      expect(result.passed).toBe(false);
      expect(result.message).toMatch(/^Config file contains invalid JSON/);
    });

    it('probes the configured runtime', async () => {
      writeFileSync(join(testDir, 'config.json'), JSON.stringify({ sandbox: { runtime: 'podman' } }));
      const seen: string[][] = [];

      const results = await getDoctorResults(fakeRunner({ stdout: 'Version: 5.0.0' }, seen));

      expect(results.map((r) => r.name)).toEqual(['Node.js version', 'Config validation', 'Container runtime']);
      expect(results[2]).toEqual({ name: 'Container runtime', passed: true, message: 'podman is reachable' });
      expect(seen).toEqual([['podman', 'version']]);
    });

    it('skips the runtime probe when the config is invalid', async () => {
      writeFileSync(join(testDir, 'config.json'), '{ broken');
      const seen: string[][] = [];

      const results = await getDoctorResults(fakeRunner({}, seen));

      expect(results[2]?.passed).toBe(false);
      expect(results[2]?.message).toBe('Cannot check — config is invalid');
      expect(seen).toEqual([]);
    });
  });

  describe('checkContainerRuntime', () => {
    it('fails when the runtime exits nonzero', async () => {
      const result = await checkContainerRuntime(
        'docker',
        fakeRunner({ exitCode: 1, stderr: 'Cannot connect to the Docker daemon\nmore detail' }),
      );
      expect(result).toEqual({
        name: 'Container runtime',
        passed: false,
        message: '"docker version" exited with 1: Cannot connect to the Docker daemon',
      });
    });

    it('fails when the probe times out', async () => {
      const result = await checkContainerRuntime('docker', fakeRunner({ timedOut: true, exitCode: 1 }));
      expect(result.message).toBe('"docker version" timed out');
    });

    it('fails for a runtime that is not installed', async () => {
      const result = await checkContainerRuntime('/nonexistent_runtime_xyz');
      expect(result.passed).toBe(false);
    });
  });
});

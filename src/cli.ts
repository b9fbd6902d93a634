#!/usr/bin/env node

/**
 * Tollgate CLI entry point.
 * Registers commands: --version, start, doctor, mask.
 */

import { Command } from 'commander';
import { runDoctor } from './cli/doctor.js';
import { startApp, VERSION } from './index.js';
import { maskSensitiveText } from './security/index.js';

const program = new Command();

program
  .name('tollgate')
  .description('Policy gateway that isolates untrusted data from a sandboxed LLM')
  .version(VERSION);

program
  .command('start')
  .description('Start the gateway')
  .action(async () => {
    try {
      await startApp();
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Failed to start Tollgate: ${message}`);
      process.exit(1);
    }
  });

program
  .command('doctor')
  .description('Check system health and configuration')
  .action(async () => {
    const exitCode = await runDoctor();
    process.exit(exitCode);
  });

program
  .command('mask <text>')
  .description('Print text with card numbers, emails and phone numbers replaced by tokens')
  .action((text: string) => {
    console.log(maskSensitiveText(text));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exit(1);
});

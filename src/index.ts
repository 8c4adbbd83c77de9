#!/usr/bin/env node

import { Command } from 'commander';
import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { healthCommand, promptCommand, statusCommand } from './commands.js';
import { loadConfig } from './config.js';
import { printError } from './output.js';

function getLocalVersion(): string {
  try {
    const pkgPath = fileURLToPath(new URL('../package.json', import.meta.url));
    const pkg = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    return typeof pkg.version === 'string' ? pkg.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function fail(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  printError(message);
  process.exit(1);
}

const program = new Command();

program
  .name('adw-llm')
  .description('Select the LLM provider for ADW workflows and run prompts against it')
  .version(getLocalVersion())
  .option('--env-file <path>', 'Load environment variables from this file instead of ./.env');

function envFile(): string | undefined {
  const opts = program.opts<{ envFile?: string }>();
  return opts.envFile;
}

program
  .command('status')
  .description('Show provider flags and the provider that would be used')
  .action(() => {
    try {
      process.exit(statusCommand(loadConfig({ envFile: envFile() })));
    } catch (err: unknown) {
      fail(err);
    }
  });

program
  .command('health')
  .description('Validate provider configuration, optionally probing the providers')
  .option('--probe', 'Send a short test prompt to each enabled provider')
  .option('--json', 'Print the report as JSON')
  .action(async (opts: { probe?: boolean; json?: boolean }) => {
    try {
      process.exit(await healthCommand(loadConfig({ envFile: envFile() }), opts));
    } catch (err: unknown) {
      fail(err);
    }
  });

program
  .command('prompt <text...>')
  .description('Run a prompt against the active provider and print the completion')
  .option('-m, --model <model>', 'Model name (Anthropic alias or ID; mapped for OpenAI)')
  .option('--optional', 'Skip instead of failing when no provider is configured')
  .action(async (words: string[], opts: { model?: string; optional?: boolean }) => {
    try {
      const config = loadConfig({ envFile: envFile(), model: opts.model });
      process.exit(await promptCommand(config, words, opts));
    } catch (err: unknown) {
      fail(err);
    }
  });

await program.parseAsync();

import type { AdwConfig } from './config.js';
import { formatHealthReport, runHealthCheck } from './health.js';
import {
  printError,
  printInfo,
  printProviderStatus,
  printReport,
  printSuccess,
  printText,
  printWarning,
} from './output.js';
import { runPrompt } from './prompt.js';
import type { CompleteFn } from './providers/index.js';
import { describeProviders, resolve } from './providers/resolver.js';
import { PROVIDER_LABELS } from './providers/types.js';

/** Process exit code of a command. */
export type ExitCode = 0 | 1;

/** Prints the provider rows and the active provider. Exits 1 when unconfigured. */
export function statusCommand(config: AdwConfig): ExitCode {
  const resolution = resolve(config.providers);
  const active = resolution.status === 'resolved' ? resolution.provider : undefined;
  printProviderStatus(describeProviders(config.providers), active);

  if (resolution.status === 'unconfigured') {
    printError(`No LLM provider configured (${resolution.diagnostic})`);
    for (const issue of resolution.issues) printInfo(`  - ${issue}`);
    return 1;
  }
  printSuccess(`\nActive provider: ${PROVIDER_LABELS[resolution.provider]}`);
  return 0;
}

export async function healthCommand(
  config: AdwConfig,
  opts: { probe?: boolean; json?: boolean },
  complete?: CompleteFn,
): Promise<ExitCode> {
  if (!opts.json) printInfo('[HEALTH] Running ADW LLM provider health check...\n');
  const report = await runHealthCheck(config, { probe: !!opts.probe, complete });
  if (opts.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printReport(formatHealthReport(report));
  }
  return report.success ? 0 : 1;
}

/**
 * Runs one prompt and prints the completion.
 *
 * With `optional`, an unconfigured environment is a warning and exit 0.
 * A failed completion always exits 1.
 */
export async function promptCommand(
  config: AdwConfig,
  words: string[],
  opts: { optional?: boolean },
  complete?: CompleteFn,
): Promise<ExitCode> {
  const outcome = await runPrompt(
    config,
    { prompt: words.join(' '), required: !opts.optional },
    { complete },
  );

  switch (outcome.status) {
    case 'skipped':
      printWarning(`Prompt skipped, no LLM provider configured (${outcome.reason})`);
      return 0;
    case 'failed':
      printError(outcome.error);
      return 1;
    case 'completed':
      printText(outcome.text);
      printInfo(
        `\n${PROVIDER_LABELS[outcome.provider]} ${outcome.model} | ` +
          `${outcome.usage.promptTokens}↑ ${outcome.usage.completionTokens}↓`,
      );
      return 0;
  }
}

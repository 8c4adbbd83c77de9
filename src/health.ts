import { apiKeyFor, type AdwConfig } from './config.js';
import { debugLog } from './logger.js';
import { promptCompletion, type CompleteFn } from './providers/index.js';
import { resolveModelId } from './providers/models.js';
import { describeProviders, resolve } from './providers/resolver.js';
import {
  PROVIDER_ENV_VARS,
  PROVIDER_LABELS,
  PROVIDER_PRIORITY,
  isProviderName,
  type ProviderName,
} from './providers/types.js';

type DetailValue = string | number | boolean | null | string[];

/** Outcome of one health check. */
export interface CheckResult {
  success: boolean;
  error?: string;
  warning?: string;
  details: Record<string, DetailValue>;
}

/** Aggregated health check results. */
export interface HealthReport {
  success: boolean;
  /** ISO-8601 time the check ran. */
  timestamp: string;
  /** Keyed by `environment` and provider name, in run order. */
  checks: Record<string, CheckResult>;
  warnings: string[];
  errors: string[];
}

export const PROBE_PROMPT = 'What is 2+2? Just respond with the number, nothing else.';
const PROBE_MODEL = 'haiku';
const PROBE_MAX_TOKENS = 32;
const RESPONSE_PREVIEW_LENGTH = 100;
const SEPARATOR = '-'.repeat(50);

/**
 * Checks that the provider variables form a usable configuration.
 *
 * Every enabled provider needs its key, and at least one provider must be
 * both enabled and keyed.
 */
export function checkEnvironment(config: AdwConfig): CheckResult {
  const statuses = describeProviders(config.providers);
  const missingRequired: string[] = [];

  for (const s of statuses) {
    if (s.enabled && !s.keyPresent) {
      const vars = PROVIDER_ENV_VARS[s.provider];
      const label = PROVIDER_LABELS[s.provider];
      missingRequired.push(`${vars.apiKey} (${label} API Key - required when ${vars.enabled}=true)`);
    }
  }

  const resolution = resolve(config.providers);
  if (resolution.status === 'unconfigured') {
    missingRequired.push('No LLM provider configured. Enable at least one provider with its API key.');
  }

  const success = missingRequired.length === 0;
  const result: CheckResult = {
    success,
    details: {
      anthropicEnabled: config.providers.anthropicEnabled,
      openaiEnabled: config.providers.openaiEnabled,
      anthropicKeySet: config.providers.anthropicKeyPresent,
      openaiKeySet: config.providers.openaiKeyPresent,
      activeProvider: resolution.status === 'resolved' ? resolution.provider : null,
      missingRequired,
    },
  };
  if (!success) {
    result.error = 'Missing required environment variables or LLM provider configuration';
  }
  return result;
}

/** Sends {@link PROBE_PROMPT} to a provider using its cheapest model. */
export async function checkProviderConnectivity(
  config: AdwConfig,
  provider: ProviderName,
  complete: CompleteFn = promptCompletion,
): Promise<CheckResult> {
  const model = resolveModelId(provider, PROBE_MODEL);
  const result = await complete(provider, PROBE_PROMPT, {
    model,
    maxTokens: PROBE_MAX_TOKENS,
    temperature: 0,
    apiKey: apiKeyFor(config, provider),
  });

  if (!result.success) {
    return { success: false, error: result.output, details: { model } };
  }
  return {
    success: true,
    details: {
      model,
      testPassed: result.output.includes('4'),
      response: result.output.slice(0, RESPONSE_PREVIEW_LENGTH),
    },
  };
}

/**
 * Runs the environment check and one check per provider.
 *
 * With `probe`, every enabled and keyed provider receives a test prompt, and
 * any failed probe fails the report, fallback included. A probe that answers
 * without the expected `4` only adds a warning.
 */
export async function runHealthCheck(
  config: AdwConfig,
  options?: { probe?: boolean; complete?: CompleteFn; now?: () => Date },
): Promise<HealthReport> {
  const now = options?.now ?? (() => new Date());
  const report: HealthReport = {
    success: true,
    timestamp: now().toISOString(),
    checks: {},
    warnings: [],
    errors: [],
  };

  const envCheck = checkEnvironment(config);
  report.checks.environment = envCheck;
  if (!envCheck.success) {
    report.success = false;
    if (envCheck.error) report.errors.push(envCheck.error);
    const missing = envCheck.details.missingRequired;
    if (Array.isArray(missing)) {
      report.errors.push(...missing.map((entry) => `Missing required env var: ${entry}`));
    }
  }

  const resolution = resolve(config.providers);
  const active = resolution.status === 'resolved' ? resolution.provider : undefined;

  for (const s of describeProviders(config.providers)) {
    const vars = PROVIDER_ENV_VARS[s.provider];
    const label = PROVIDER_LABELS[s.provider];

    if (!s.enabled) {
      report.checks[s.provider] = {
        success: true,
        details: { enabled: false, reason: `${vars.enabled}=false - ${label} check disabled` },
      };
      continue;
    }

    if (!s.keyPresent) {
      // Already reported by the environment check.
      report.checks[s.provider] = {
        success: false,
        error: `${vars.apiKey} not set`,
        details: { enabled: true, keySet: false },
      };
      continue;
    }

    if (!options?.probe) {
      report.checks[s.provider] = {
        success: true,
        details: { enabled: true, keySet: true, active: s.provider === active },
      };
      continue;
    }

    const probe = await checkProviderConnectivity(config, s.provider, options?.complete);
    debugLog('health:probe', {
      provider: s.provider,
      model: resolveModelId(s.provider, PROBE_MODEL),
      success: probe.success,
      error: probe.error,
    });
    probe.details = { enabled: true, keySet: true, active: s.provider === active, ...probe.details };
    report.checks[s.provider] = probe;

    if (!probe.success) {
      report.success = false;
      if (probe.error) report.errors.push(probe.error);
    } else if (probe.details.testPassed === false) {
      probe.warning = `${label} answered the test prompt unexpectedly`;
      report.warnings.push(probe.warning);
    }
  }

  debugLog('health:report', {
    success: report.success,
    activeProvider: active ?? null,
    errors: report.errors,
    warnings: report.warnings,
  });
  return report;
}

function checkTitle(name: string): string {
  if (isProviderName(name)) return PROVIDER_LABELS[name];
  return name
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function formatDetail(value: DetailValue): string {
  return Array.isArray(value) ? value.join(', ') : String(value);
}

function nextSteps(report: HealthReport): string[] {
  const steps: string[] = [];
  for (const provider of PROVIDER_PRIORITY) {
    const { apiKey } = PROVIDER_ENV_VARS[provider];
    if (report.errors.some((e) => e.startsWith(`Missing required env var: ${apiKey}`))) {
      steps.push(`Set ${apiKey} in your .env file`);
    }
  }
  const env = report.checks.environment;
  if (env && env.details.anthropicEnabled === false && env.details.openaiEnabled === false) {
    steps.push('Enable a provider: set ANTHROPIC_ENABLED=true or OPENAI_ENABLED=true');
  }
  if (report.errors.some((e) => e.includes('(401 Unauthorized)'))) {
    steps.push('Replace the rejected API key with a valid one');
  }
  return steps;
}

/**
 * Renders a health report as plain lines, tagged `[OK]`, `[FAIL]`, `[WARN]`
 * so the terminal layer can color them.
 */
export function formatHealthReport(report: HealthReport): string[] {
  const lines: string[] = [];
  const status = report.success ? 'HEALTHY' : 'UNHEALTHY';
  lines.push(`${report.success ? '[OK]' : '[FAIL]'} Overall Status: ${status}`);
  lines.push(`[TIME] Timestamp: ${report.timestamp}`);
  lines.push('');
  lines.push('[CHECKS] Check Results:');
  lines.push(SEPARATOR);

  for (const [name, check] of Object.entries(report.checks)) {
    lines.push('');
    lines.push(`${check.success ? '[OK]' : '[FAIL]'} ${checkTitle(name)}:`);
    for (const [key, value] of Object.entries(check.details)) {
      if (value === null || key === 'missingRequired') continue;
      lines.push(`   ${key}: ${formatDetail(value)}`);
    }
    if (check.error) lines.push(`   [FAIL] Error: ${check.error}`);
    if (check.warning) lines.push(`   [WARN] Warning: ${check.warning}`);
  }

  if (report.warnings.length > 0) {
    lines.push('');
    lines.push('[WARN] Warnings:');
    for (const warning of report.warnings) lines.push(`   - ${warning}`);
  }

  if (report.errors.length > 0) {
    lines.push('');
    lines.push('[FAIL] Errors:');
    for (const error of report.errors) lines.push(`   - ${error}`);
  }

  if (!report.success) {
    const steps = nextSteps(report);
    if (steps.length > 0) {
      lines.push('');
      lines.push('[NEXT] Next Steps:');
      steps.forEach((step, i) => lines.push(`   ${i + 1}. ${step}`));
    }
  }

  return lines;
}

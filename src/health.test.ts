import { describe, it, expect, vi } from 'vitest';
import {
  checkEnvironment,
  checkProviderConnectivity,
  formatHealthReport,
  runHealthCheck,
  PROBE_PROMPT,
} from './health.js';
import type { AdwConfig } from './config.js';
import type { CompleteFn } from './providers/index.js';
import type { ProviderConfig } from './providers/types.js';

function makeConfig(providers?: Partial<ProviderConfig>): AdwConfig {
  const flags: ProviderConfig = {
    anthropicEnabled: true,
    openaiEnabled: false,
    anthropicKeyPresent: true,
    openaiKeyPresent: false,
    ...providers,
  };
  return {
    providers: flags,
    anthropicApiKey: flags.anthropicKeyPresent ? 'test-anthropic-key' : undefined,
    openaiApiKey: flags.openaiKeyPresent ? 'test-openai-key' : undefined,
    model: 'sonnet',
    maxTokens: 4096,
    temperature: 0.7,
  };
}

const now = () => new Date('2026-01-15T10:00:00.000Z');
const usage = { promptTokens: 10, completionTokens: 1, totalTokens: 11 };

const NO_PROVIDER = 'No LLM provider configured. Enable at least one provider with its API key.';
const ANTHROPIC_MISSING = 'ANTHROPIC_API_KEY (Anthropic API Key - required when ANTHROPIC_ENABLED=true)';
const OPENAI_MISSING = 'OPENAI_API_KEY (OpenAI API Key - required when OPENAI_ENABLED=true)';
const ENV_ERROR = 'Missing required environment variables or LLM provider configuration';

describe('checkEnvironment', () => {
  it('passes when the default provider is keyed', () => {
    expect(checkEnvironment(makeConfig())).toEqual({
      success: true,
      details: {
        anthropicEnabled: true,
        openaiEnabled: false,
        anthropicKeySet: true,
        openaiKeySet: false,
        activeProvider: 'anthropic',
        missingRequired: [],
      },
    });
  });

  it('lists every enabled provider without a key', () => {
    const result = checkEnvironment(makeConfig({ anthropicKeyPresent: false, openaiEnabled: true }));
    expect(result.success).toBe(false);
    expect(result.error).toBe(ENV_ERROR);
    expect(result.details.missingRequired).toEqual([ANTHROPIC_MISSING, OPENAI_MISSING, NO_PROVIDER]);
    expect(result.details.activeProvider).toBeNull();
  });

  it('fails on an unkeyed enabled provider even when the fallback resolves', () => {
    const result = checkEnvironment(
      makeConfig({ anthropicKeyPresent: false, openaiEnabled: true, openaiKeyPresent: true }),
    );
    expect(result.success).toBe(false);
    expect(result.details.missingRequired).toEqual([ANTHROPIC_MISSING]);
    expect(result.details.activeProvider).toBe('openai');
  });

  it('reports no provider when both are disabled', () => {
    const result = checkEnvironment(makeConfig({ anthropicEnabled: false }));
    expect(result.details.missingRequired).toEqual([NO_PROVIDER]);
  });
});

describe('checkProviderConnectivity', () => {
  it('probes with the provider cheapest model and previews the response', async () => {
    const complete = vi.fn<CompleteFn>().mockResolvedValue({
      success: true,
      output: 'x'.repeat(150),
      usage,
    });

    const result = await checkProviderConnectivity(
      makeConfig({ openaiEnabled: true, openaiKeyPresent: true }),
      'openai',
      complete,
    );

    expect(complete).toHaveBeenCalledWith('openai', PROBE_PROMPT, {
      model: 'gpt-4o-mini',
      maxTokens: 32,
      temperature: 0,
      apiKey: 'test-openai-key',
    });
    expect(result).toEqual({
      success: true,
      details: { model: 'gpt-4o-mini', testPassed: false, response: 'x'.repeat(100) },
    });
  });

  it('returns the completion error on failure', async () => {
    const complete = vi.fn<CompleteFn>().mockResolvedValue({
      success: false,
      output: 'Anthropic API error: fetch failed',
    });

    const result = await checkProviderConnectivity(makeConfig(), 'anthropic', complete);
    expect(result).toEqual({
      success: false,
      error: 'Anthropic API error: fetch failed',
      details: { model: 'claude-3-5-haiku-20241022' },
    });
  });
});

describe('runHealthCheck', () => {
  it('reports a healthy default setup without probing', async () => {
    const complete = vi.fn<CompleteFn>();

    const report = await runHealthCheck(makeConfig(), { now, complete });

    expect(complete).not.toHaveBeenCalled();
    expect(report).toEqual({
      success: true,
      timestamp: '2026-01-15T10:00:00.000Z',
      checks: {
        environment: checkEnvironment(makeConfig()),
        anthropic: { success: true, details: { enabled: true, keySet: true, active: true } },
        openai: {
          success: true,
          details: { enabled: false, reason: 'OPENAI_ENABLED=false - OpenAI check disabled' },
        },
      },
      warnings: [],
      errors: [],
    });
  });

  it('adds one error per missing variable', async () => {
    const report = await runHealthCheck(makeConfig({ anthropicKeyPresent: false }), { now });

    expect(report.success).toBe(false);
    expect(report.errors).toEqual([
      ENV_ERROR,
      `Missing required env var: ${ANTHROPIC_MISSING}`,
      `Missing required env var: ${NO_PROVIDER}`,
    ]);
    expect(report.checks.anthropic).toEqual({
      success: false,
      error: 'ANTHROPIC_API_KEY not set',
      details: { enabled: true, keySet: false },
    });
  });

  it('probes the active provider', async () => {
    const complete = vi.fn<CompleteFn>().mockResolvedValue({ success: true, output: '4', usage });

    const report = await runHealthCheck(makeConfig(), { now, probe: true, complete });

    expect(complete).toHaveBeenCalledTimes(1);
    expect(report.success).toBe(true);
    expect(report.checks.anthropic).toEqual({
      success: true,
      details: {
        enabled: true,
        keySet: true,
        active: true,
        model: 'claude-3-5-haiku-20241022',
        testPassed: true,
        response: '4',
      },
    });
  });

  it('fails when the active provider probe fails', async () => {
    const complete = vi.fn<CompleteFn>().mockResolvedValue({
      success: false,
      output: 'Anthropic API key is invalid (401 Unauthorized)',
    });

    const report = await runHealthCheck(makeConfig(), { now, probe: true, complete });

    expect(report.success).toBe(false);
    expect(report.errors).toEqual(['Anthropic API key is invalid (401 Unauthorized)']);
    expect(report.warnings).toEqual([]);
  });

  it('fails when the fallback probe fails', async () => {
    const complete = vi.fn<CompleteFn>().mockImplementation(async (provider) =>
      provider === 'anthropic'
        ? { success: true, output: '4', usage }
        : { success: false, output: 'OpenAI API error: fetch failed' },
    );

    const report = await runHealthCheck(
      makeConfig({ openaiEnabled: true, openaiKeyPresent: true }),
      { now, probe: true, complete },
    );

    expect(complete).toHaveBeenCalledTimes(2);
    expect(report.success).toBe(false);
    expect(report.errors).toEqual(['OpenAI API error: fetch failed']);
    expect(report.warnings).toEqual([]);
    expect(report.checks.anthropic.success).toBe(true);
    expect(report.checks.openai).toEqual({
      success: false,
      error: 'OpenAI API error: fetch failed',
      details: { enabled: true, keySet: true, active: false, model: 'gpt-4o-mini' },
    });
  });

  it('warns when a provider answers the test prompt wrongly', async () => {
    const complete = vi.fn<CompleteFn>().mockResolvedValue({ success: true, output: 'five', usage });

    const report = await runHealthCheck(makeConfig(), { now, probe: true, complete });

    expect(report.success).toBe(true);
    expect(report.warnings).toEqual(['Anthropic answered the test prompt unexpectedly']);
    expect(report.checks.anthropic.warning).toBe('Anthropic answered the test prompt unexpectedly');
    expect(report.checks.anthropic.details.testPassed).toBe(false);
  });
});

describe('formatHealthReport', () => {
  it('renders a healthy report', async () => {
    const report = await runHealthCheck(makeConfig(), { now });

    expect(formatHealthReport(report)).toEqual([
      '[OK] Overall Status: HEALTHY',
      '[TIME] Timestamp: 2026-01-15T10:00:00.000Z',
      '',
      '[CHECKS] Check Results:',
      '-'.repeat(50),
      '',
      '[OK] Environment:',
      '   anthropicEnabled: true',
      '   openaiEnabled: false',
      '   anthropicKeySet: true',
      '   openaiKeySet: false',
      '   activeProvider: anthropic',
      '',
      '[OK] Anthropic:',
      '   enabled: true',
      '   keySet: true',
      '   active: true',
      '',
      '[OK] OpenAI:',
      '   enabled: false',
      '   reason: OPENAI_ENABLED=false - OpenAI check disabled',
    ]);
  });

  it('suggests enabling a provider when both are disabled', async () => {
    const report = await runHealthCheck(makeConfig({ anthropicEnabled: false }), { now });
    const lines = formatHealthReport(report);

    expect(lines[0]).toBe('[FAIL] Overall Status: UNHEALTHY');
    expect(lines).toContain(`   [FAIL] Error: ${ENV_ERROR}`);
    expect(lines).not.toContain('   activeProvider: null');
    expect(lines.slice(-6)).toEqual([
      '[FAIL] Errors:',
      `   - ${ENV_ERROR}`,
      `   - Missing required env var: ${NO_PROVIDER}`,
      '',
      '[NEXT] Next Steps:',
      '   1. Enable a provider: set ANTHROPIC_ENABLED=true or OPENAI_ENABLED=true',
    ]);
  });

  it('suggests setting the missing key', async () => {
    const report = await runHealthCheck(makeConfig({ anthropicKeyPresent: false }), { now });
    const lines = formatHealthReport(report);

    expect(lines.slice(-2)).toEqual([
      '[NEXT] Next Steps:',
      '   1. Set ANTHROPIC_API_KEY in your .env file',
    ]);
  });

  it('lists warnings and the invalid-key hint', async () => {
    const complete = vi.fn<CompleteFn>().mockImplementation(async (provider) =>
      provider === 'anthropic'
        ? { success: true, output: 'five', usage }
        : { success: false, output: 'OpenAI API key is invalid (401 Unauthorized)' },
    );
    const report = await runHealthCheck(
      makeConfig({ openaiEnabled: true, openaiKeyPresent: true }),
      { now, probe: true, complete },
    );
    const lines = formatHealthReport(report);

    expect(report.success).toBe(false);
    expect(lines).toContain('   [WARN] Warning: Anthropic answered the test prompt unexpectedly');
    expect(lines).toContain('[WARN] Warnings:');
    expect(lines).toContain('   - Anthropic answered the test prompt unexpectedly');
    expect(lines).toContain('   - OpenAI API key is invalid (401 Unauthorized)');
    expect(lines.slice(-2)).toEqual([
      '[NEXT] Next Steps:',
      '   1. Replace the rejected API key with a valid one',
    ]);
  });
});

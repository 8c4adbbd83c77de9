import {
  PROVIDER_ENV_VARS,
  PROVIDER_LABELS,
  PROVIDER_PRIORITY,
  type ProviderConfig,
  type ProviderName,
  type ProviderStatus,
  type ResolutionResult,
} from './types.js';

function flagsFor(config: ProviderConfig, provider: ProviderName): { enabled: boolean; keyPresent: boolean } {
  switch (provider) {
    case 'anthropic':
      return { enabled: config.anthropicEnabled, keyPresent: config.anthropicKeyPresent };
    case 'openai':
      return { enabled: config.openaiEnabled, keyPresent: config.openaiKeyPresent };
  }
}

/** Returns one status row per provider, in priority order. */
export function describeProviders(config: ProviderConfig): ProviderStatus[] {
  return PROVIDER_PRIORITY.map((provider) => {
    const { enabled, keyPresent } = flagsFor(config, provider);
    return { provider, enabled, keyPresent, eligible: enabled && keyPresent };
  });
}

/**
 * Formats every provider's enabled/key state on one line, e.g.
 * `Anthropic: enabled=false, key=present; OpenAI: enabled=true, key=missing`.
 */
export function formatDiagnostic(config: ProviderConfig): string {
  return describeProviders(config)
    .map(
      (s) =>
        `${PROVIDER_LABELS[s.provider]}: enabled=${s.enabled}, key=${s.keyPresent ? 'present' : 'missing'}`,
    )
    .join('; ');
}

function collectIssues(statuses: ProviderStatus[]): string[] {
  const issues: string[] = [];
  for (const s of statuses) {
    if (s.enabled && !s.keyPresent) {
      const vars = PROVIDER_ENV_VARS[s.provider];
      issues.push(`${vars.enabled}=true but ${vars.apiKey} is not set`);
    }
  }
  if (statuses.every((s) => !s.enabled)) {
    const flags = statuses.map((s) => `${PROVIDER_ENV_VARS[s.provider].enabled}=true`);
    issues.push(`No LLM provider enabled. Set ${flags.join(' or ')}`);
  }
  return issues;
}

/**
 * Selects the provider that should serve a request.
 *
 * The first provider in {@link PROVIDER_PRIORITY} that is both enabled and
 * keyed wins, so Anthropic always beats OpenAI when both qualify. When none
 * qualifies the result is `unconfigured`; this function never throws and
 * never reads the environment.
 */
export function resolve(config: ProviderConfig): ResolutionResult {
  const statuses = describeProviders(config);
  const winner = statuses.find((s) => s.eligible);
  if (winner) {
    return { status: 'resolved', provider: winner.provider };
  }
  return {
    status: 'unconfigured',
    diagnostic: formatDiagnostic(config),
    issues: collectIssues(statuses),
  };
}

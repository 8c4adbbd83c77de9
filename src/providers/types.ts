/** Supported LLM provider identifiers, in priority order. */
export type ProviderName = 'anthropic' | 'openai';

/** Providers ordered by selection priority (first eligible wins). */
export const PROVIDER_PRIORITY: readonly ProviderName[] = ['anthropic', 'openai'];

export function isProviderName(value: string): value is ProviderName {
  return value === 'anthropic' || value === 'openai';
}

/** Human-readable provider labels used in diagnostics and terminal output. */
export const PROVIDER_LABELS: Record<ProviderName, string> = {
  anthropic: 'Anthropic',
  openai: 'OpenAI',
};

/** Maps each provider to the environment variables holding its enable flag and API key. */
export const PROVIDER_ENV_VARS: Record<ProviderName, { enabled: string; apiKey: string }> = {
  anthropic: { enabled: 'ANTHROPIC_ENABLED', apiKey: 'ANTHROPIC_API_KEY' },
  openai: { enabled: 'OPENAI_ENABLED', apiKey: 'OPENAI_API_KEY' },
};

/**
 * Snapshot of the provider flags at resolution time.
 *
 * Built by `readProviderConfig`, which applies the defaults; every field is
 * always populated.
 */
export interface ProviderConfig {
  readonly anthropicEnabled: boolean;
  readonly openaiEnabled: boolean;
  readonly anthropicKeyPresent: boolean;
  readonly openaiKeyPresent: boolean;
}

/** A provider was selected. */
export interface ResolvedProvider {
  status: 'resolved';
  provider: ProviderName;
}

/** No provider is both enabled and keyed. */
export interface UnconfiguredProvider {
  status: 'unconfigured';
  /** Enabled/key state of every provider, e.g. `Anthropic: enabled=true, key=missing; ...`. */
  diagnostic: string;
  /** Actionable hints naming the variables to set. */
  issues: string[];
}

export type ResolutionResult = ResolvedProvider | UnconfiguredProvider;

/** Per-provider status row. */
export interface ProviderStatus {
  provider: ProviderName;
  enabled: boolean;
  keyPresent: boolean;
  /** Enabled and keyed. */
  eligible: boolean;
}

import type { ProviderName } from './types.js';

/** Short Anthropic aliases callers may request instead of a full model ID. */
export const ANTHROPIC_MODEL_ALIASES: Record<string, string> = {
  sonnet: 'claude-sonnet-4-20250514',
  opus: 'claude-opus-4-20250514',
  haiku: 'claude-3-5-haiku-20241022',
};

/** OpenAI model used when a requested Claude model has no known equivalent. */
export const DEFAULT_OPENAI_MODEL = 'gpt-4o';

/** Equivalent OpenAI model for each Claude alias or model ID. */
export const OPENAI_EQUIVALENTS: Record<string, string> = {
  sonnet: 'gpt-4o',
  opus: 'gpt-4o',
  haiku: 'gpt-4o-mini',
  'claude-3-5-sonnet-20241022': 'gpt-4o',
  'claude-3-5-haiku-20241022': 'gpt-4o-mini',
  'claude-3-opus-20240229': 'gpt-4o',
  'claude-sonnet-4-20250514': 'gpt-4o',
  'claude-opus-4-5-20251101': 'gpt-4o',
};

function isOpenAIModel(model: string): boolean {
  return model.startsWith('gpt-') || /^o\d/.test(model);
}

/**
 * Translates a requested model name into an ID the given provider accepts.
 *
 * Callers speak in Anthropic terms (`"sonnet"`, `"claude-3-5-haiku-20241022"`).
 * For Anthropic, aliases are expanded and anything else passes through. For
 * OpenAI, Claude names map to their equivalent, OpenAI IDs pass through, and
 * unknown names fall back to {@link DEFAULT_OPENAI_MODEL}.
 */
export function resolveModelId(provider: ProviderName, requested: string): string {
  const name = requested.trim();
  if (provider === 'anthropic') {
    return ANTHROPIC_MODEL_ALIASES[name] ?? name;
  }
  if (isOpenAIModel(name)) return name;
  return OPENAI_EQUIVALENTS[name] ?? DEFAULT_OPENAI_MODEL;
}

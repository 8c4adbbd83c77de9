import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import { APICallError, generateText, type LanguageModel } from 'ai';
import { PROVIDER_LABELS, type ProviderName } from './types.js';

/** Sampling and credential options for a single completion. */
export interface CompletionOptions {
  /** Provider-specific model identifier (already mapped). */
  model: string;
  maxTokens: number;
  temperature: number;
  /** API key; when omitted the SDK falls back to its own environment variable. */
  apiKey?: string;
}

/** Token counts reported by the provider. */
export interface CompletionUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/** Outcome of {@link promptCompletion}; `output` holds the text or the error message. */
export type CompletionResult =
  | { success: true; output: string; usage: CompletionUsage }
  | { success: false; output: string };

/** Signature shared by {@link promptCompletion} and its test doubles. */
export type CompleteFn = (
  provider: ProviderName,
  prompt: string,
  options: CompletionOptions,
) => Promise<CompletionResult>;

/**
 * Return an AI SDK `LanguageModel` instance for the given provider and model name.
 * @param provider - `"anthropic"` or `"openai"`.
 * @param model - Provider-specific model identifier (e.g. `"claude-sonnet-4-20250514"`).
 * @param apiKey - Explicit API key for the provider client.
 * @throws {Error} If the provider string is not recognized.
 */
export function getModel(provider: string, model: string, apiKey?: string): LanguageModel {
  switch (provider) {
    case 'anthropic':
      return createAnthropic({ apiKey })(model);
    case 'openai':
      return createOpenAI({ apiKey })(model);
    default:
      throw new Error(`Unknown provider: ${provider}. Supported: anthropic, openai`);
  }
}

function describeFailure(label: string, err: unknown): string {
  if (APICallError.isInstance(err)) {
    if (err.statusCode === 401) {
      return `${label} API key is invalid (401 Unauthorized)`;
    }
    if (err.statusCode !== undefined) {
      return `${label} API error: ${err.statusCode} - ${err.message}`;
    }
  }
  const message = err instanceof Error ? err.message : String(err);
  return `${label} API error: ${message}`;
}

/**
 * Completes a single user prompt with the given provider.
 *
 * Never throws: SDK and HTTP failures come back as `{ success: false }` with
 * a message naming the provider. An empty completion also counts as a failure.
 */
export async function promptCompletion(
  provider: ProviderName,
  prompt: string,
  options: CompletionOptions,
): Promise<CompletionResult> {
  const label = PROVIDER_LABELS[provider];
  try {
    const result = await generateText({
      model: getModel(provider, options.model, options.apiKey),
      prompt,
      maxTokens: options.maxTokens,
      temperature: options.temperature,
    });

    if (!result.text) {
      return { success: false, output: `No response from ${label} API` };
    }

    return {
      success: true,
      output: result.text,
      usage: {
        promptTokens: result.usage.promptTokens,
        completionTokens: result.usage.completionTokens,
        totalTokens: result.usage.totalTokens,
      },
    };
  } catch (err: unknown) {
    return { success: false, output: describeFailure(label, err) };
  }
}

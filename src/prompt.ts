import { apiKeyFor, type AdwConfig } from './config.js';
import { debugLog } from './logger.js';
import { promptCompletion, type CompleteFn, type CompletionUsage } from './providers/index.js';
import { resolveModelId } from './providers/models.js';
import { resolve } from './providers/resolver.js';
import type { ProviderName } from './providers/types.js';

/** A prompt issued by a hook or a workflow step. */
export interface PromptRequest {
  prompt: string;
  /** Model in Anthropic terms; defaults to the configured model. */
  model?: string;
  /**
   * Whether the calling step cannot proceed without a completion.
   * Required steps throw when no provider is configured; optional ones are skipped.
   * Defaults to `true`.
   */
  required?: boolean;
}

export type PromptOutcome =
  | {
      status: 'completed';
      provider: ProviderName;
      model: string;
      text: string;
      usage: CompletionUsage;
    }
  | { status: 'failed'; provider: ProviderName; model: string; error: string }
  | { status: 'skipped'; reason: string };

/**
 * Resolves the active provider and runs one prompt against it.
 *
 * @param options.complete - Completion function; defaults to {@link promptCompletion}.
 * @throws If the request is required and no provider is configured.
 */
export async function runPrompt(
  config: AdwConfig,
  request: PromptRequest,
  options?: { complete?: CompleteFn },
): Promise<PromptOutcome> {
  const resolution = resolve(config.providers);

  if (resolution.status === 'unconfigured') {
    debugLog('prompt:unconfigured', { diagnostic: resolution.diagnostic, issues: resolution.issues });
    if (request.required ?? true) {
      throw new Error(`No LLM provider configured: ${resolution.diagnostic}`);
    }
    return { status: 'skipped', reason: resolution.diagnostic };
  }

  const { provider } = resolution;
  const model = resolveModelId(provider, request.model ?? config.model);
  const complete = options?.complete ?? promptCompletion;

  debugLog('prompt:request', { provider, model, promptLength: request.prompt.length });
  const result = await complete(provider, request.prompt, {
    model,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    apiKey: apiKeyFor(config, provider),
  });

  if (!result.success) {
    debugLog('prompt:error', { provider, model, error: result.output });
    return { status: 'failed', provider, model, error: result.output };
  }

  debugLog('prompt:usage', { provider, model, usage: result.usage });
  return { status: 'completed', provider, model, text: result.output, usage: result.usage };
}

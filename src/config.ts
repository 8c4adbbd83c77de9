import * as dotenv from 'dotenv';
import * as path from 'node:path';
import * as fs from 'node:fs';
import { z } from 'zod';
import type { ProviderConfig, ProviderName } from './providers/types.js';

export { PROVIDER_ENV_VARS } from './providers/types.js';

/** Resolved runtime configuration for prompt execution. */
export interface AdwConfig {
  /** Provider flags snapshot handed to the resolver. */
  providers: ProviderConfig;
  /** Anthropic API key, if non-empty. */
  anthropicApiKey?: string;
  /** OpenAI API key, if non-empty. */
  openaiApiKey?: string;
  /** Requested model in Anthropic terms (alias or full ID); mapped per provider at dispatch. */
  model: string;
  /** Maximum tokens the model may generate per response. */
  maxTokens: number;
  /** Sampling temperature. */
  temperature: number;
}

export const DEFAULT_MODEL = 'sonnet';
export const DEFAULT_MAX_TOKENS = 4096;
export const DEFAULT_TEMPERATURE = 0.7;

type Env = Record<string, string | undefined>;

/**
 * Interprets an enable flag.
 *
 * Only an unset variable yields `fallback`. A set value is true iff it is
 * `"true"` in any case; anything else, including `""`, `"1"` or `" true "`,
 * is false.
 */
export function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  return value.toLowerCase() === 'true';
}

/** True when an API key is a non-empty string. Presence only; the key is never validated. */
export function hasKey(value: string | undefined): value is string {
  return typeof value === 'string' && value.length > 0;
}

/**
 * Builds the provider flags snapshot from an environment.
 *
 * This is the only place the defaults are applied: Anthropic is enabled
 * unless `ANTHROPIC_ENABLED` says otherwise, OpenAI is disabled unless
 * `OPENAI_ENABLED=true`.
 */
export function readProviderConfig(env: Env = process.env): ProviderConfig {
  return Object.freeze({
    anthropicEnabled: parseFlag(env.ANTHROPIC_ENABLED, true),
    openaiEnabled: parseFlag(env.OPENAI_ENABLED, false),
    anthropicKeyPresent: hasKey(env.ANTHROPIC_API_KEY),
    openaiKeyPresent: hasKey(env.OPENAI_API_KEY),
  });
}

/**
 * Loads a `.env` file into `process.env` without overriding variables that are already set.
 *
 * @param envPath - Explicit file to load. When omitted, `./.env` is loaded if it exists.
 * @returns The absolute path that was loaded, or `undefined` when nothing was.
 * @throws If an explicit `envPath` does not exist.
 */
export function loadEnvFile(envPath?: string): string | undefined {
  if (envPath) {
    const resolved = path.resolve(envPath);
    if (!fs.existsSync(resolved)) {
      throw new Error(`Env file not found: ${resolved}`);
    }
    dotenv.config({ path: resolved });
    return resolved;
  }

  const cwdEnv = path.join(process.cwd(), '.env');
  if (fs.existsSync(cwdEnv)) {
    dotenv.config({ path: cwdEnv });
    return cwdEnv;
  }
  return undefined;
}

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const SettingsSchema = z.object({
  ADW_MODEL: z.preprocess(blankToUndefined, z.string().trim().min(1).default(DEFAULT_MODEL)),
  ADW_MAX_TOKENS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_MAX_TOKENS),
  ),
  ADW_TEMPERATURE: z.preprocess(
    blankToUndefined,
    z.coerce.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
  ),
});

/**
 * Builds a fully-resolved {@link AdwConfig}.
 *
 * Optionally loads a `.env` file first, then snapshots the environment once
 * so the flags, keys and settings all come from the same read.
 *
 * @param options.envFile - `.env` file to load; `false` skips loading entirely.
 * @param options.model - Overrides `ADW_MODEL`.
 * @param options.env - Environment to read instead of `process.env`.
 * @throws If `ADW_MAX_TOKENS` or `ADW_TEMPERATURE` hold invalid values.
 */
export function loadConfig(options?: {
  envFile?: string | false;
  model?: string;
  env?: Env;
}): AdwConfig {
  if (options?.envFile !== false) {
    loadEnvFile(options?.envFile);
  }

  const env: Env = { ...(options?.env ?? process.env) };

  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `- ${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n${problems.join('\n')}`);
  }

  const config: AdwConfig = {
    providers: readProviderConfig(env),
    model: options?.model?.trim() || parsed.data.ADW_MODEL,
    maxTokens: parsed.data.ADW_MAX_TOKENS,
    temperature: parsed.data.ADW_TEMPERATURE,
  };
  const anthropicKey = env.ANTHROPIC_API_KEY;
  const openaiKey = env.OPENAI_API_KEY;
  if (hasKey(anthropicKey)) config.anthropicApiKey = anthropicKey;
  if (hasKey(openaiKey)) config.openaiApiKey = openaiKey;
  return config;
}

/** Returns the configured API key for a provider, if any. */
export function apiKeyFor(config: AdwConfig, provider: ProviderName): string | undefined {
  return provider === 'anthropic' ? config.anthropicApiKey : config.openaiApiKey;
}

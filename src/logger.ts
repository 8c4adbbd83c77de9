import fs from 'node:fs';
import path from 'node:path';
import type { CompletionUsage } from './providers/index.js';
import type { ProviderName } from './providers/types.js';

const LOG_DIR = path.resolve('.logs');
let dirCreated = false;

/** Payload of every debug event, keyed by label. None of them carries an API key. */
export interface DebugEvents {
  'prompt:unconfigured': { diagnostic: string; issues: string[] };
  'prompt:request': { provider: ProviderName; model: string; promptLength: number };
  'prompt:error': { provider: ProviderName; model: string; error: string };
  'prompt:usage': { provider: ProviderName; model: string; usage: CompletionUsage };
  'health:probe': { provider: ProviderName; model: string; success: boolean; error?: string };
  'health:report': { success: boolean; activeProvider: ProviderName | null; errors: string[]; warnings: string[] };
}

export type DebugLabel = keyof DebugEvents;

/** One line of `.logs/<date>.log`. */
export interface DebugEntry<K extends DebugLabel = DebugLabel> {
  timestamp: string;
  label: K;
  data: DebugEvents[K];
}

/** Whether `ADW_DEBUG` asks for debug logging. */
export function isDebugEnabled(env: Record<string, string | undefined> = process.env): boolean {
  return env.ADW_DEBUG === 'true' || env.ADW_DEBUG === '1';
}

/** Log file for the UTC day of `now`. */
export function logFileFor(now: Date): string {
  return path.join(LOG_DIR, `${now.toISOString().slice(0, 10)}.log`);
}

/**
 * Append a provider-selection event to `.logs/<date>.log` when `ADW_DEBUG` is enabled.
 * No-ops silently when debug mode is off.
 */
export function debugLog<K extends DebugLabel>(label: K, data: DebugEvents[K]): void {
  if (!isDebugEnabled()) return;

  if (!dirCreated) {
    fs.mkdirSync(LOG_DIR, { recursive: true });
    dirCreated = true;
  }

  const now = new Date();
  const entry: DebugEntry<K> = { timestamp: now.toISOString(), label, data };
  fs.appendFileSync(logFileFor(now), JSON.stringify(entry) + '\n');
}

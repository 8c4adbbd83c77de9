import chalk from 'chalk';
import { PROVIDER_ENV_VARS, PROVIDER_LABELS, type ProviderName, type ProviderStatus } from './providers/types.js';

/** A function that applies a chalk color/style to a string and returns the styled result. */
type ColorFn = (text: string) => string;

const palette = {
  accent: chalk.hex('#f97316'),
  muted: chalk.gray,
  text: chalk.white,
  error: chalk.red,
  success: chalk.green,
  warning: chalk.yellow,
} satisfies Record<string, ColorFn>;

/** Prints an error message to stderr in red. */
export function printError(message: string): void {
  console.error(palette.error(`Error: ${message}`));
}

/** Prints an informational message in the muted color. */
export function printInfo(message: string): void {
  console.log(palette.muted(message));
}

/** Prints a warning to stderr. */
export function printWarning(message: string): void {
  console.error(palette.warning(`Warning: ${message}`));
}

/** Prints a success message in green. */
export function printSuccess(message: string): void {
  console.log(palette.success(message));
}

/** Prints completion text as-is. */
export function printText(text: string): void {
  console.log(palette.text(text));
}

/** Picks the color for a report line from its leading `[TAG]`. */
function colorForLine(line: string): ColorFn {
  const tag = line.trimStart();
  if (tag.startsWith('[OK]')) return palette.success;
  if (tag.startsWith('[FAIL]')) return palette.error;
  if (tag.startsWith('[WARN]')) return palette.warning;
  if (tag.startsWith('[NEXT]') || tag.startsWith('[CHECKS]')) return palette.accent;
  return palette.muted;
}

/** Prints pre-formatted report lines, coloring each by its status tag. */
export function printReport(lines: string[]): void {
  for (const line of lines) {
    console.log(colorForLine(line)(line));
  }
}

/**
 * Prints one row per provider with its flags, marking the active one.
 *
 * Rows look like `✓ Anthropic  enabled=true  key=present (ANTHROPIC_API_KEY)  [active]`.
 */
export function printProviderStatus(statuses: ProviderStatus[], active?: ProviderName): void {
  printInfo('Providers:');
  for (const s of statuses) {
    const mark = s.eligible ? palette.success('✓') : palette.error('✗');
    const key = s.keyPresent ? 'present' : 'missing';
    const suffix = s.provider === active ? palette.accent('  [active]') : '';
    console.log(
      `  ${mark} ${PROVIDER_LABELS[s.provider]}` +
        palette.muted(`  enabled=${s.enabled}  key=${key} (${PROVIDER_ENV_VARS[s.provider].apiKey})`) +
        suffix,
    );
  }
}

/**
 * Terminal Colors
 *
 * ANSI color codes for log output. Setting NO_COLOR (any non-empty value)
 * turns every helper into the identity function.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ANSI Color Codes
// ═══════════════════════════════════════════════════════════════════════════════

export const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',

  brightRed: '\x1b[91m',
  brightGreen: '\x1b[92m',
  brightCyan: '\x1b[96m'
} as const;

export type ColorName = keyof typeof colors;

// ═══════════════════════════════════════════════════════════════════════════════
// Color Functions
// ═══════════════════════════════════════════════════════════════════════════════

/** Whether color output is on for the given environment. */
export function colorEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return !env['NO_COLOR'];
}

/**
 * Apply a color to text.
 */
export function colorize(text: string, color: ColorName, env: NodeJS.ProcessEnv = process.env): string {
  if (!colorEnabled(env)) return text;
  return `${colors[color]}${text}${colors.reset}`;
}

/** Remove ANSI escape sequences. */
export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

// ═══════════════════════════════════════════════════════════════════════════════
// Convenience Functions
// ═══════════════════════════════════════════════════════════════════════════════

export const c = {
  dim: (text: string) => colorize(text, 'dim'),
  bright: (text: string) => colorize(text, 'bright'),

  red: (text: string) => colorize(text, 'red'),
  green: (text: string) => colorize(text, 'green'),
  yellow: (text: string) => colorize(text, 'yellow'),
  magenta: (text: string) => colorize(text, 'magenta'),
  cyan: (text: string) => colorize(text, 'cyan'),
  white: (text: string) => colorize(text, 'white'),

  brightRed: (text: string) => colorize(text, 'brightRed'),
  brightGreen: (text: string) => colorize(text, 'brightGreen'),

  // Semantic colors
  success: (text: string) => colorize(text, 'brightGreen'),
  warning: (text: string) => colorize(text, 'yellow'),
  error: (text: string) => colorize(text, 'brightRed'),
  info: (text: string) => colorize(text, 'brightCyan')
} as const;

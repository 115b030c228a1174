/**
 * Settings Loader
 *
 * Loads config/embedkit.json with {env:VAR} resolution.
 * Supports EMBEDKIT_CONFIG env var to override the settings path.
 * The file is optional: without it every setting takes its default.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigError } from '@/core/errors';
import { type Settings, settingsSchema } from './schema';

const DEFAULT_SETTINGS_PATH = 'config/embedkit.json';

/**
 * Resolve {env:VAR} patterns in text.
 * Returns empty string if env var is not set.
 */
export function resolveEnvVars(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(/\{env:([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => {
    return env[varName] ?? '';
  });
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Validate parsed settings data, applying defaults.
 */
export function parseSettings(data: unknown, source = 'settings'): Settings {
  const result = settingsSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.map(String).join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid ${source}:\n${issues}`, 'MALFORMED_INPUT');
  }
  return result.data;
}

/**
 * Load and validate settings from file.
 *
 * A missing file at the default location yields the defaults; a missing file
 * that was asked for explicitly (argument or EMBEDKIT_CONFIG) is an error.
 */
export function loadSettings(settingsPath?: string, env: NodeJS.ProcessEnv = process.env): Settings {
  const explicitPath = settingsPath ?? env['EMBEDKIT_CONFIG'];
  const path = explicitPath ?? resolve(process.cwd(), DEFAULT_SETTINGS_PATH);

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      if (explicitPath === undefined) return parseSettings({});
      throw new ConfigError(`Settings file not found: ${path}`, 'MALFORMED_INPUT');
    }
    throw err;
  }

  text = resolveEnvVars(text, env);

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    throw new ConfigError(`Invalid JSON in settings file: ${path}`, 'MALFORMED_INPUT');
  }

  return parseSettings(data, `settings file ${path}`);
}

// Lazy load and cache
let cachedSettings: Settings | null = null;

export function getSettings(): Settings {
  if (!cachedSettings) {
    cachedSettings = loadSettings();
  }
  return cachedSettings;
}

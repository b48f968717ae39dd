/**
 * Config Directory Layout
 *
 * Everything costguard keeps on disk lives in one directory:
 * COSTGUARD_HOME when set, otherwise ~/.costguard/ (mode 700).
 */

import { mkdirSync, chmodSync } from 'node:fs';
import { homedir } from 'node:os';
import { isAbsolute, join } from 'node:path';

const CONFIG_FILES = {
  settings: 'config.json',
  credentials: 'credentials.json',
  store: 'costs.db',
} as const;

export type ConfigFile = keyof typeof CONFIG_FILES;

export function resolveConfigDir(): string {
  return process.env['COSTGUARD_HOME'] || join(homedir(), '.costguard');
}

/** Create the config directory if needed and (re)apply 700. */
export function ensureConfigDir(): string {
  const dir = resolveConfigDir();
  mkdirSync(dir, { recursive: true, mode: 0o700 });
  chmodSync(dir, 0o700);
  return dir;
}

export function configFilePath(file: ConfigFile): string {
  return join(resolveConfigDir(), CONFIG_FILES[file]);
}

export function settingsPath(): string {
  return configFilePath('settings');
}

export function credentialsPath(): string {
  return configFilePath('credentials');
}

export function costStorePath(): string {
  return configFilePath('store');
}

/**
 * Resolve settings.storePath. `:memory:` and absolute paths pass through,
 * `~/` expands to the home directory, anything else is relative to the
 * config directory. Unset means the default store.
 */
export function resolveStorePath(configured?: string): string {
  if (!configured) return costStorePath();
  if (configured === ':memory:' || isAbsolute(configured)) return configured;
  if (configured.startsWith('~/')) return join(homedir(), configured.slice(2));
  return join(resolveConfigDir(), configured);
}

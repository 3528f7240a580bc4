/**
 * Environment Configuration Utilities
 *
 * Typed reads of environment variables. The type of the default decides how
 * the raw string is parsed.
 */

import { getLogger } from '../logging/logger.js';

const logger = getLogger('environment-config');

export type ConfigValue = string | number | boolean;

function parseBoolean(raw: string): boolean | undefined {
  const normalized = raw.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

/**
 * Read an environment variable, falling back to `defaultValue` when unset or unparsable
 */
export function getConfig(key: string, defaultValue: number, env?: NodeJS.ProcessEnv): number;
export function getConfig(key: string, defaultValue: boolean, env?: NodeJS.ProcessEnv): boolean;
export function getConfig(key: string, defaultValue: string, env?: NodeJS.ProcessEnv): string;
export function getConfig<T extends ConfigValue>(key: string, defaultValue: T, env?: NodeJS.ProcessEnv): T;
export function getConfig(key: string, defaultValue: ConfigValue, env: NodeJS.ProcessEnv = process.env): ConfigValue {
  const raw = env[key];
  if (raw === undefined || raw === '') {
    return defaultValue;
  }

  if (typeof defaultValue === 'number') {
    const parsed = Number(raw);
    if (Number.isFinite(parsed)) return parsed;
    logger.warn('Ignoring non-numeric configuration value', { key, value: raw });
    return defaultValue;
  }

  if (typeof defaultValue === 'boolean') {
    const parsed = parseBoolean(raw);
    if (parsed !== undefined) return parsed;
    logger.warn('Ignoring non-boolean configuration value', { key, value: raw });
    return defaultValue;
  }

  return raw;
}

/**
 * First non-empty variable among `keys`
 */
export function getFirstDefined(keys: string[], env: NodeJS.ProcessEnv = process.env): string | undefined {
  for (const key of keys) {
    const value = env[key];
    if (value !== undefined && value !== '') return value;
  }
  return undefined;
}

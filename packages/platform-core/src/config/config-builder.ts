/**
 * Configuration Builder Utilities
 *
 * Fluent API for building configuration objects
 */

import { getConfig, type ConfigValue } from './environment-config.js';

type ConfigShape = Record<string, ConfigValue>;

/**
 * Environment-aware configuration builder
 */
export class ConfigBuilder<T extends ConfigShape> {
  private readonly values = new Map<keyof T, ConfigValue>();

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  add<K extends keyof T>(key: K, defaultValue: T[K], envKey?: string): this {
    const envKeyToUse = envKey || String(key).toUpperCase();
    this.values.set(key, getConfig(envKeyToUse, defaultValue, this.env));
    return this;
  }

  /**
   * Set a value directly, bypassing the environment
   */
  set<K extends keyof T>(key: K, value: T[K]): this {
    this.values.set(key, value);
    return this;
  }

  build(): Readonly<T> {
    return Object.freeze(Object.fromEntries(this.values) as T);
  }
}

export function createConfig<T extends ConfigShape>(env?: NodeJS.ProcessEnv): ConfigBuilder<T> {
  return new ConfigBuilder<T>(env);
}

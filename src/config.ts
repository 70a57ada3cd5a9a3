/**
 * Configuration accessor with dot-path key support.
 */

import { readFileSync, existsSync } from 'node:fs';
import yaml from 'js-yaml';
import { ConfigError, ConfigNotFoundError, errorMessage } from './errors.js';

export const DEFAULT_CONFIG: Readonly<Record<string, unknown>> = Object.freeze({
  logging: { level: 'info', format: 'json' },
  loader: { skip_blank_rows: true },
  reconcile: { precedence: ['experimental', 'sample', 'sequence'] },
  targets: { max_depth: 16 },
  aggregate: { on_ambiguous: 'fail' },
  export: { header: 'field', delimiter: ',' },
});

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] = isMapping(current) && isMapping(value) ? deepMerge(current, value) : value;
  }
  return result;
}

export class Config {
  private _data: Record<string, unknown>;

  constructor(data?: Record<string, unknown>) {
    this._data = data ?? {};
  }

  /**
   * Build a Config whose unset keys fall back to {@link DEFAULT_CONFIG}.
   */
  static withDefaults(data?: Record<string, unknown>): Config {
    return new Config(deepMerge({ ...DEFAULT_CONFIG }, data ?? {}));
  }

  static load(yamlPath: string): Config {
    if (!existsSync(yamlPath)) {
      throw new ConfigNotFoundError(yamlPath);
    }

    let data: unknown;
    try {
      data = yaml.load(readFileSync(yamlPath, 'utf-8'));
    } catch (e) {
      throw new ConfigError(`Invalid YAML in ${yamlPath}: ${errorMessage(e)}`);
    }

    if (data === null || data === undefined) return Config.withDefaults();
    if (!isMapping(data)) {
      throw new ConfigError(`Configuration must be a mapping, got ${Array.isArray(data) ? 'array' : typeof data}`);
    }
    return Config.withDefaults(data);
  }

  get(key: string, defaultValue?: unknown): unknown {
    const parts = key.split('.');
    let current: unknown = this._data;
    for (const part of parts) {
      if (isMapping(current) && part in current) {
        current = current[part];
      } else {
        return defaultValue;
      }
    }
    return current;
  }

  getString(key: string, defaultValue: string): string {
    const value = this.get(key);
    return typeof value === 'string' ? value : defaultValue;
  }

  getNumber(key: string, defaultValue: number): number {
    const value = this.get(key);
    return typeof value === 'number' && Number.isFinite(value) ? value : defaultValue;
  }

  getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.get(key);
    return typeof value === 'boolean' ? value : defaultValue;
  }

  getStringList(key: string, defaultValue: readonly string[]): string[] {
    const value = this.get(key);
    if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
      return [...value];
    }
    return [...defaultValue];
  }
}

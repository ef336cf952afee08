/**
 * Portcullis Configuration
 * Central configuration for the proxy server
 */

import { DomainFilter, type FilterMode } from '../filters/index.js';
import { loadFilterRules } from './filter-file.js';

export interface ProxyConfig {
  // Server settings
  httpProxyPort: number;
  bindAddress: string; // '127.0.0.1' for localhost only, '0.0.0.0' for LAN access

  // Domain filtering
  filterConfigPath: string | null; // JSON/TOML/YAML rules file; takes precedence over the fields below
  filterMode: FilterMode;
  domains: string[];

  // Hardening
  idleTimeoutMs: number; // 0 = wait on origins and tunnels indefinitely
}

export const defaultConfig: ProxyConfig = {
  httpProxyPort: 8080,
  bindAddress: '127.0.0.1',

  filterConfigPath: null,
  filterMode: 'deny',
  domains: [], // empty deny-list = allow all

  idleTimeoutMs: 0,
};

// Current active configuration
let currentConfig: ProxyConfig = { ...defaultConfig };

export function getConfig(): ProxyConfig {
  return currentConfig;
}

export function updateConfig(partial: Partial<ProxyConfig>): void {
  currentConfig = { ...currentConfig, ...partial };
}

export function resetConfig(): void {
  currentConfig = { ...defaultConfig };
}

/**
 * Build the shared domain filter for a configuration.
 * Reads the rules file when one is configured; throws ConfigError if it is
 * missing or malformed.
 */
export async function resolveFilter(config: ProxyConfig = getConfig()): Promise<DomainFilter> {
  if (config.filterConfigPath) {
    return loadFilterRules(config.filterConfigPath);
  }
  return new DomainFilter({ mode: config.filterMode, domains: config.domains });
}

export { loadFilterRules, parseFilterDocument } from './filter-file.js';

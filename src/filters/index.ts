/**
 * Domain Filter
 *
 * Allow-list or deny-list of bare hostnames, consulted once per request.
 * A filter is built once at startup and shared read-only by every
 * connection handler.
 *
 * @module filters
 */

import { ConfigError } from '../proxy/errors.js';

// =============================================================================
// Types
// =============================================================================

export type FilterMode = 'allow' | 'deny';

export interface FilterRules {
  mode: FilterMode;
  domains: Iterable<string>;
}

/** Accepted spellings of the mode field in configuration documents */
const MODE_ALIASES: Readonly<Record<string, FilterMode>> = {
  allow: 'allow',
  allowlist: 'allow',
  whitelist: 'allow',
  deny: 'deny',
  denylist: 'deny',
  blacklist: 'deny',
};

// =============================================================================
// Helpers
// =============================================================================

/**
 * Domain part of a host: everything before the first ':'.
 */
export function extractDomain(host: string): string {
  const colon = host.indexOf(':');
  return colon === -1 ? host : host.slice(0, colon);
}

/**
 * Map a configured mode value onto a FilterMode, or null if unrecognized.
 */
export function parseFilterMode(value: unknown): FilterMode | null {
  if (typeof value !== 'string') return null;
  return MODE_ALIASES[value.trim().toLowerCase()] ?? null;
}

function normalizeDomains(domains: Iterable<string>, source: string): Set<string> {
  const result = new Set<string>();
  for (const domain of domains) {
    if (typeof domain !== 'string') {
      throw new ConfigError(`${source}: domain entries must be strings`);
    }
    const trimmed = domain.trim();
    if (!trimmed) {
      throw new ConfigError(`${source}: domain entries must not be empty`);
    }
    if (trimmed.includes(':')) {
      throw new ConfigError(`${source}: domain "${trimmed}" must not include a port`);
    }
    result.add(trimmed);
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// DomainFilter
// =============================================================================

export class DomainFilter {
  readonly mode: FilterMode;
  private readonly domainSet: ReadonlySet<string>;

  constructor(rules: FilterRules, source = 'filter rules') {
    if (rules.mode !== 'allow' && rules.mode !== 'deny') {
      throw new ConfigError(`${source}: unknown filter mode "${String(rules.mode)}"`);
    }
    this.mode = rules.mode;
    this.domainSet = normalizeDomains(rules.domains, source);
    Object.freeze(this);
  }

  /** Deny-list: everything except the given domains is allowed */
  static denyList(domains: Iterable<string>): DomainFilter {
    return new DomainFilter({ mode: 'deny', domains });
  }

  /** Allow-list: only the given domains are allowed */
  static allowList(domains: Iterable<string>): DomainFilter {
    return new DomainFilter({ mode: 'allow', domains });
  }

  /**
   * Validate an already-parsed configuration document of the shape
   * `{ mode, domains }`.
   *
   * @param source - Label used in error messages (usually the file path)
   */
  static fromDocument(doc: unknown, source = 'filter config'): DomainFilter {
    if (!isRecord(doc)) {
      throw new ConfigError(`${source}: expected a document with "mode" and "domains" fields`);
    }

    const mode = parseFilterMode(doc.mode);
    if (!mode) {
      throw new ConfigError(
        `${source}: "mode" must be one of ${Object.keys(MODE_ALIASES).join(', ')}`
      );
    }

    const domains = doc.domains ?? [];
    if (!Array.isArray(domains)) {
      throw new ConfigError(`${source}: "domains" must be a list of hostnames`);
    }

    return new DomainFilter({ mode, domains }, source);
  }

  get domains(): readonly string[] {
    return [...this.domainSet];
  }

  /**
   * Whether traffic to `host` (optionally `host:port`) may pass.
   */
  isAllowed(host: string): boolean {
    const listed = this.domainSet.has(extractDomain(host));
    return this.mode === 'deny' ? !listed : listed;
  }

  describe(): string {
    const label = this.mode === 'deny' ? 'deny-list' : 'allow-list';
    const count = this.domainSet.size;
    return `${label} with ${count} domain${count === 1 ? '' : 's'}`;
  }
}

/**
 * Filter Rules File
 *
 * Loads `{ mode, domains }` documents from disk. `.json` files are parsed as
 * JSON, `.toml` files as TOML and anything else as YAML.
 *
 * ```yaml
 * mode: deny
 * domains:
 *   - blocked.example
 * ```
 *
 * ```toml
 * mode = "Blacklist"
 * domains = ["blocked.example"]
 * ```
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse as parseToml } from 'smol-toml';
import YAML from 'yaml';
import { DomainFilter } from '../filters/index.js';
import { ConfigError, formatError } from '../proxy/errors.js';

function parseByExtension(text: string, source: string): unknown {
  switch (extname(source).toLowerCase()) {
    case '.json':
      return JSON.parse(text);
    case '.toml':
      return parseToml(text);
    default:
      return YAML.parse(text);
  }
}

/**
 * Parse the text of a rules file into a validated filter.
 *
 * @param source - File name; its extension selects the parser
 */
export function parseFilterDocument(text: string, source: string): DomainFilter {
  let doc: unknown;
  try {
    doc = parseByExtension(text, source);
  } catch (err) {
    throw new ConfigError(`Failed to parse filter config ${source}: ${formatError(err)}`, {
      cause: err,
    });
  }
  return DomainFilter.fromDocument(doc, source);
}

/**
 * Read and validate a rules file.
 */
export async function loadFilterRules(filePath: string): Promise<DomainFilter> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    const reason = code === 'ENOENT' ? 'does not exist' : `could not be read (${formatError(err)})`;
    throw new ConfigError(`Filter config file ${filePath} ${reason}`, { cause: err });
  }
  return parseFilterDocument(text, filePath);
}

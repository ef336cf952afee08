/**
 * Command-line flags for the proxy binary, mapped onto ProxyConfig overrides.
 */

import { Command, InvalidArgumentError } from 'commander';
import type { ProxyConfig } from './index.js';

type CliFlags = {
  port?: number;
  host?: string;
  config?: string;
  allow?: string[];
  deny?: string[];
  idleTimeout?: number;
};

function toPort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('port must be an integer between 0 and 65535');
  }
  return port;
}

function toMilliseconds(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms < 0) {
    throw new InvalidArgumentError('timeout must be a non-negative integer');
  }
  return ms;
}

export function buildProgram(): Command {
  return new Command()
    .name('portcullis')
    .description('HTTP forward proxy with CONNECT tunneling and allow/deny domain filtering')
    .option('--port <number>', 'port to listen on (default: 8080)', toPort)
    .option('--host <host>', 'address to bind (default: 127.0.0.1)')
    .option('--config <file>', 'JSON, TOML or YAML filter rules file ({ mode, domains })')
    .option('--allow <domains...>', 'only allow these domains')
    .option('--deny <domains...>', 'block these domains')
    .option('--idle-timeout <ms>', 'close idle origin requests and tunnels after <ms>', toMilliseconds);
}

/**
 * Turn command-line arguments (without the node/script prefix) into config
 * overrides. Throws a CommanderError for bad input, help and version.
 */
export function parseCliOptions(
  args: readonly string[],
  program: Command = buildProgram()
): Partial<ProxyConfig> {
  program.exitOverride();
  program.parse([...args], { from: 'user' });
  const flags = program.opts<CliFlags>();

  if (flags.allow && flags.deny) {
    program.error('--allow and --deny cannot be combined');
  }

  const overrides: Partial<ProxyConfig> = {};
  if (flags.port !== undefined) overrides.httpProxyPort = flags.port;
  if (flags.host) overrides.bindAddress = flags.host;
  if (flags.config) overrides.filterConfigPath = flags.config;
  if (flags.allow) {
    overrides.filterMode = 'allow';
    overrides.domains = flags.allow;
  } else if (flags.deny) {
    overrides.filterMode = 'deny';
    overrides.domains = flags.deny;
  }
  if (flags.idleTimeout !== undefined) overrides.idleTimeoutMs = flags.idleTimeout;
  return overrides;
}

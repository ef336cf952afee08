#!/usr/bin/env node
import { CommanderError } from 'commander';
import { parseCliOptions } from './config/cli-options.js';
import type { ProxyConfig } from './config/index.js';
import { createProxyServer } from './index.js';
import { formatError } from './proxy/errors.js';

async function main(): Promise<void> {
  let overrides: Partial<ProxyConfig>;
  try {
    overrides = parseCliOptions(process.argv.slice(2));
  } catch (err) {
    // commander has already printed help, version or the usage error
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }
    throw err;
  }

  const server = createProxyServer(overrides);

  const shutdown = (): void => {
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(`❌ Shutdown failed: ${formatError(err)}`);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await server.start();
}

main().catch((err: unknown) => {
  console.error(`❌ ${formatError(err)}`);
  process.exit(1);
});

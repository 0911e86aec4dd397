#!/usr/bin/env node
/**
 * tinyserve CLI
 *
 * Serves `<directory>/public` until interrupted.
 */

import { Command, InvalidArgumentError } from 'commander';
import { errorMessage } from '@tinyserve/core';
import { loadEnvConfig, parseInteger, resolveContentRoot } from './config.js';
import { createFileServer } from './server.js';

interface CliOptions {
  port: number;
  host: string;
  maxWorkers: number;
}

function integerOption(name: string, min: number) {
  return (value: string): number => {
    try {
      return parseInteger(name, value, min);
    } catch (err) {
      throw new InvalidArgumentError(errorMessage(err));
    }
  };
}

let env: ReturnType<typeof loadEnvConfig>;
try {
  env = loadEnvConfig();
} catch (err) {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
}

const program = new Command();

program
  .name('tinyserve')
  .description('Static file server with per-client rate limiting and hit counts')
  .version('0.1.0')
  .argument('<directory>', 'Content root; files are served from its public/ subdirectory')
  .option('-p, --port <port>', 'Port to listen on', integerOption('port', 0), env.port)
  .option('--host <host>', 'Address to bind', env.host)
  .option('--max-workers <count>', 'Connections handled at once', integerOption('max-workers', 1), env.maxWorkers)
  .allowExcessArguments(false)
  .action(async (directory: string) => {
    const options = program.opts<CliOptions>();

    let contentRoot: string;
    try {
      contentRoot = await resolveContentRoot(directory);
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exit(1);
    }

    const server = createFileServer({
      contentRoot,
      port: options.port,
      host: options.host,
      maxWorkers: options.maxWorkers,
      hitDelayMs: env.hitDelayMs,
      workDelayMs: env.workDelayMs,
      readTimeoutMs: env.readTimeoutMs,
    });

    // In-flight requests are not drained
    const shutdown = () => {
      const { totalClients, totalRequests } = server.rateLimiter.stats();
      console.log('\n[Server] Shutting down server...');
      console.log(`[Server] ${totalRequests} request(s) in the current window from ${totalClients} client(s)`);
      process.exit(0);
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    await server.start();
    console.log('Press Ctrl+C to stop');
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});

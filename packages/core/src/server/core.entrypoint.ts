#!/usr/bin/env node
/**
 * auditray-daemon: runs the update pipeline without a display
 *
 * Watches the package database, runs the advisory check on change, and serves
 * statuses to any display that connects over WebSocket.
 *
 * Usage:
 *   auditray-daemon [--port <number>]
 */
import { loadConfig } from '../config/config.loader.js';
import { configureLogging } from '../logging/logger.js';
import { createDaemon } from '../daemon/daemon.js';
import { ValidationError, errorMessage } from '../errors.js';

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

function parseArgs(argv: string[]): { port: number | undefined } {
  const args = argv.slice(2);
  let port: number | undefined;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--port' && args[i + 1]) {
      port = parseInt(args[i + 1], 10);
      if (Number.isNaN(port)) {
        throw new ValidationError(`Invalid --port value: ${args[i + 1]}`);
      }
      i++;
    }
  }

  return { port };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const { port } = parseArgs(process.argv);

  const config = await loadConfig();
  configureLogging({ level: config.log.level });

  const daemon = createDaemon(config, { port });
  await daemon.start();

  // Signal the parent process (or any reader of stdout) that the server is ready
  process.stdout.write(JSON.stringify({ type: 'ready', port: daemon.server.port }) + '\n');

  // Graceful shutdown on SIGINT / SIGTERM
  const shutdown = () => {
    daemon.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        process.stderr.write(errorMessage(err) + '\n');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await daemon.done;
}

main().catch((err: unknown) => {
  process.stderr.write(errorMessage(err) + '\n');
  process.exit(1);
});

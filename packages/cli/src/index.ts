#!/usr/bin/env node
/**
 * auditray: security update indicator for the terminal
 *
 * Architecture:
 *   1. Start the daemon (watcher, coordinator, status server) on a free port,
 *      or attach to a running one with --connect
 *   2. Connect AuditrayWsClient to its status server
 *   3. Render the ink UI, which only talks to the WS client
 *
 * Usage:
 *   auditray [--connect <ws-url>] [--verbose]
 *   auditray --debug-icon <check|alert|cross>
 */
import React from 'react';
import { render } from 'ink';
import type { IconName } from '@auditray/shared';
import {
  loadConfig,
  configureLogging,
  createDaemon,
  resolveIconSet,
  parseIcon,
  errorMessage,
  ValidationError,
  type Daemon,
} from '@auditray/core';
import { AuditrayWsClient } from './ws.client.js';
import { openLink } from './link.opener.js';
import { App } from './components/App.js';

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

interface CliArgs {
  connect: string | null;
  debugIcon: IconName | null;
  verbose: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const args = argv.slice(2);
  const parsed: CliArgs = { connect: null, debugIcon: null, verbose: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];
    if (arg === '--connect' || arg === '--debug-icon') {
      if (!value) throw new ValidationError(`${arg} needs a value`);
      if (arg === '--connect') parsed.connect = value;
      else parsed.debugIcon = parseIcon(value);
      i++;
    } else if (arg === '--verbose') {
      parsed.verbose = true;
    } else {
      throw new ValidationError(`Unknown argument: ${arg}`);
    }
  }

  return parsed;
}

/** Connect, retrying briefly while a just-started server begins listening. */
async function connectWithRetry(client: AuditrayWsClient, attempts = 10): Promise<void> {
  for (let attempt = 1; ; attempt++) {
    try {
      await client.connect();
      return;
    } catch (err) {
      if (attempt >= attempts) throw err;
      await new Promise((r) => setTimeout(r, 50));
    }
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const args = parseArgs(process.argv);
  const config = await loadConfig();

  // The UI owns the terminal; daemon logs only show up with --verbose.
  configureLogging({ level: args.verbose ? config.log.level : 'silent' });

  const { icons } = resolveIconSet(config.icon_theme);

  // ── Debug icon: render the header and quit item, nothing else ──────────────
  if (args.debugIcon) {
    const { waitUntilExit } = render(
      React.createElement(App, { source: null, icons, debugIcon: args.debugIcon, openLink }),
      { exitOnCtrlC: false },
    );
    await waitUntilExit();
    return;
  }

  // ── Start the daemon unless attaching to one ───────────────────────────────
  let daemon: Daemon | null = null;
  let url = args.connect;
  if (!url) {
    daemon = createDaemon(config, { port: 0 });
    await daemon.start();
    url = `ws://127.0.0.1:${daemon.server.port}`;
  }

  const client = new AuditrayWsClient(url);
  try {
    await connectWithRetry(client);
  } catch (err) {
    await daemon?.stop();
    throw new Error(`Failed to connect to ${url}: ${errorMessage(err)}`, { cause: err });
  }

  // ── Render the ink UI ──────────────────────────────────────────────────────
  const { waitUntilExit, unmount } = render(
    React.createElement(App, { source: client, icons, debugIcon: null, openLink }),
    { exitOnCtrlC: false },
  );

  // A crashed coordinator ends the session; stop() below rethrows the crash.
  daemon?.done.catch(() => unmount());

  await waitUntilExit();

  // ── Cleanup ────────────────────────────────────────────────────────────────
  client.close();
  await daemon?.stop();
}

main().catch((err: unknown) => {
  process.stderr.write(errorMessage(err) + '\n');
  process.exit(1);
});

import fs from 'node:fs';
import type { TriggerChannel } from '../channels/trigger.channel.js';
import { FatalError, errorMessage } from '../errors.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('watcher');

export interface TriggerSource {
  start(): void;
  close(): void;
}

export interface DbWatcherOptions {
  /** Directory or file whose changes mean the package database was updated. */
  path: string;
  triggers: TriggerChannel;
  /** Called once if the watch dies after start; no further triggers follow. */
  onError?: (err: FatalError) => void;
}

/**
 * Sends a `file_changed` trigger for every change reported under the package
 * database path. One pacman transaction touches many files, so a single
 * upgrade produces a burst; the coordinator collapses it.
 */
export class DbWatcher implements TriggerSource {
  private readonly path: string;
  private readonly triggers: TriggerChannel;
  private readonly onError: (err: FatalError) => void;
  private watcher: fs.FSWatcher | null = null;

  constructor(options: DbWatcherOptions) {
    this.path = options.path;
    this.triggers = options.triggers;
    this.onError = options.onError ?? (() => {});
  }

  /** Begin watching. Throws FatalError if the path cannot be watched. */
  start(): void {
    if (this.watcher) return;

    try {
      this.watcher = fs.watch(this.path, { persistent: true }, (_eventType, filename) => {
        log.debug(`change detected${filename ? `: ${filename}` : ''}`);
        this.triggers.send('file_changed');
      });
    } catch (err) {
      throw new FatalError(`Cannot watch ${this.path}: ${errorMessage(err)}`, { cause: err });
    }

    this.watcher.on('error', (err) => {
      log.error(`watcher error on ${this.path}: ${err.message}`);
      this.close();
      this.onError(new FatalError(`Stopped watching ${this.path}: ${err.message}`, { cause: err }));
    });

    log.info(`watching ${this.path}`);
  }

  close(): void {
    this.watcher?.close();
    this.watcher = null;
  }
}

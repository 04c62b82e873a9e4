import type { ResolvedConfig } from '../config/config.loader.js';
import { TriggerChannel } from '../channels/trigger.channel.js';
import { ResultChannel } from '../channels/result.channel.js';
import { UpdateCoordinator, type Checker } from '../coordinator/update.coordinator.js';
import { ArchAuditChecker } from '../checker/arch-audit.checker.js';
import { DbWatcher, type DbWatcherOptions, type TriggerSource } from '../watcher/db.watcher.js';
import { StatusServer } from '../server/status.server.js';
import { FatalError, errorMessage } from '../errors.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('daemon');

export interface DaemonDeps {
  checker?: Checker;
  createWatcher?: (options: DbWatcherOptions) => TriggerSource;
  /** Overrides config.server.port; 0 picks a free port. */
  port?: number;
}

/**
 * The whole pipeline, wired:
 *
 *   watcher ─┐
 *            ├─▶ TriggerChannel ─▶ UpdateCoordinator ─▶ ResultChannel ─▶ StatusServer ─▶ displays
 *   display ─┘        (CHECK_NOW)        │
 *                                      Checker
 */
export class Daemon {
  readonly triggers = new TriggerChannel();
  readonly results = new ResultChannel();
  readonly coordinator: UpdateCoordinator;
  readonly server: StatusServer;
  private readonly watcher: TriggerSource;
  private loop: Promise<void> | null = null;
  private failure: FatalError | null = null;

  constructor(config: ResolvedConfig, deps: DaemonDeps = {}) {
    const checker =
      deps.checker ??
      new ArchAuditChecker({
        command: config.checker.command,
        args: config.checker.args,
        advisoryBaseUrl: config.checker.advisory_base_url,
      });

    this.coordinator = new UpdateCoordinator({
      triggers: this.triggers,
      results: this.results,
      checker,
    });

    const createWatcher = deps.createWatcher ?? ((options: DbWatcherOptions) => new DbWatcher(options));
    this.watcher = createWatcher({
      path: config.watcher.path,
      triggers: this.triggers,
      onError: (err) => this.fail(err),
    });

    this.server = new StatusServer({
      triggers: this.triggers,
      results: this.results,
      coordinator: this.coordinator,
      port: deps.port ?? config.server.port,
    });
  }

  /**
   * Start every stage and queue the first check. Any setup failure rejects
   * with FatalError after undoing what was already started, so the caller
   * never runs a half-built pipeline.
   */
  async start(): Promise<void> {
    if (this.loop) return;

    try {
      this.watcher.start();
      await this.server.start();
    } catch (err) {
      this.watcher.close();
      this.triggers.close();
      if (err instanceof FatalError) throw err;
      throw new FatalError(`Startup failed: ${errorMessage(err)}`, { cause: err });
    }

    this.loop = this.coordinator.run().then(
      () => {
        if (this.failure) throw this.failure;
      },
      (err: unknown) => {
        throw new FatalError(`Update coordinator crashed: ${errorMessage(err)}`, { cause: err });
      },
    );
    this.triggers.send('startup');
    log.info('started');
  }

  /**
   * Settles when the coordinator loop ends: resolves after stop(), rejects
   * with FatalError if the loop crashed or the watcher died.
   */
  get done(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  /**
   * Stop accepting triggers, drop the queued ones, let an in-flight check
   * finish, close the server.
   */
  async stop(): Promise<void> {
    this.shutDownTriggers();
    try {
      await this.done;
    } finally {
      await this.server.close();
      log.info('stopped');
    }
  }

  private shutDownTriggers(): void {
    this.watcher.close();
    this.triggers.close();
    const dropped = this.triggers.drain();
    if (dropped > 0) log.debug(`dropped ${dropped} queued trigger(s)`);
  }

  /** The pipeline can no longer see database changes: end the loop with `err`. */
  private fail(err: FatalError): void {
    log.error(err.message);
    if (!this.failure) this.failure = err;
    this.shutDownTriggers();
  }
}

export function createDaemon(config: ResolvedConfig, deps?: DaemonDeps): Daemon {
  return new Daemon(config, deps);
}

import { EventEmitter } from 'node:events';
import type { CoordinatorState, Status, TriggerEvent, Update } from '@auditray/shared';
import type { TriggerChannel } from '../channels/trigger.channel.js';
import type { ResultChannel } from '../channels/result.channel.js';
import { classify } from '../status/status.model.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('coordinator');

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

/** The advisory check. May take arbitrarily long; rejects on failure. */
export interface Checker {
  check(): Promise<Update[]>;
}

export interface CoordinatorOptions {
  triggers: TriggerChannel;
  results: ResultChannel;
  checker: Checker;
}

/** Emitted when a check begins. */
export interface CheckStart {
  /** The trigger that woke the coordinator. */
  trigger: TriggerEvent;
  /** Triggers folded into this check, the waking one included. */
  collapsed: number;
}

// ---------------------------------------------------------------------------
// Event type augmentation
// ---------------------------------------------------------------------------

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface UpdateCoordinator {
  /** Emitted on every idle ↔ running transition. */
  on(event: 'state', listener: (state: CoordinatorState) => void): this;
  /** Emitted right before the checker is invoked. */
  on(event: 'check:start', listener: (start: CheckStart) => void): this;
  /** Emitted after a status has been handed to the result channel. */
  on(event: 'check:complete', listener: (status: Status) => void): this;

  emit(event: 'state', state: CoordinatorState): boolean;
  emit(event: 'check:start', start: CheckStart): boolean;
  emit(event: 'check:complete', status: Status): boolean;
}

// ---------------------------------------------------------------------------
// UpdateCoordinator
// ---------------------------------------------------------------------------

/**
 * Single-flight loop between trigger sources and the checker:
 *
 *   idle    → receive a trigger, drain the rest → running
 *   running → checker settles → publish one Status → idle
 *
 * Only one check is ever outstanding. Triggers that arrive while a check runs
 * stay queued and, however many there are, cause exactly one follow-up check.
 * Checker failures become `error` statuses; anything else that goes wrong in
 * the loop rejects `run()`.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class UpdateCoordinator extends EventEmitter {
  private readonly triggers: TriggerChannel;
  private readonly results: ResultChannel;
  private readonly checker: Checker;
  private _state: CoordinatorState = 'idle';
  private loop: Promise<void> | null = null;
  private _checks = 0;

  constructor(options: CoordinatorOptions) {
    super();
    this.triggers = options.triggers;
    this.results = options.results;
    this.checker = options.checker;
  }

  get state(): CoordinatorState {
    return this._state;
  }

  /** Number of checker invocations so far. */
  get checks(): number {
    return this._checks;
  }

  /**
   * Run the loop until the trigger channel is closed. Calling it again while
   * the loop is alive returns the same promise.
   */
  run(): Promise<void> {
    if (!this.loop) {
      this.loop = this.loopUntilClosed();
    }
    return this.loop;
  }

  // ---------------------------------------------------------------------------
  // Loop
  // ---------------------------------------------------------------------------

  private async loopUntilClosed(): Promise<void> {
    for (;;) {
      const trigger = await this.triggers.receive();
      if (trigger === null) break;

      const collapsed = 1 + this.triggers.drain();
      this.setState('running');
      log.info(`check started by "${trigger}" (${collapsed} trigger(s) collapsed)`);
      this.emit('check:start', { trigger, collapsed });

      const status = await this.runCheck();
      this.results.publish(status);
      this.setState('idle');
      this.emit('check:complete', status);
    }

    log.debug('trigger channel closed, coordinator stopped');
  }

  private async runCheck(): Promise<Status> {
    this._checks++;
    try {
      const updates = await this.checker.check();
      const status = classify({ ok: true, updates });
      log.info(
        status.kind === 'missing_updates'
          ? `check finished: ${status.updates.length} affected package(s)`
          : 'check finished: up to date',
      );
      return status;
    } catch (err) {
      const message = errorMessage(err);
      log.warn(`check failed: ${message}`);
      return classify({ ok: false, message });
    }
  }

  private setState(state: CoordinatorState): void {
    if (this._state === state) return;
    this._state = state;
    this.emit('state', state);
  }
}

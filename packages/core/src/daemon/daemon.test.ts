import { describe, it, expect, beforeAll, vi } from 'vitest';
import type { Update } from '@auditray/shared';
import { createDaemon } from './daemon.js';
import type { DbWatcherOptions, TriggerSource } from '../watcher/db.watcher.js';
import type { ResolvedConfig } from '../config/config.loader.js';
import { DEFAULT_CONFIG } from '../config/config.defaults.js';
import { IconTheme } from '../theme/icon.theme.js';
import { FatalError } from '../errors.js';
import { configureLogging } from '../logging/logger.js';

const CONFIG: ResolvedConfig = { ...DEFAULT_CONFIG, icon_theme: IconTheme.default() };

const UPDATES: Update[] = [
  { text: 'sudo: privilege escalation (Critical)', link: 'https://example.test/AVG-9' },
];

/** Stand-in for the package database watcher; `fire` simulates a change, `die` a dead watch. */
function makeFakeWatcher(options: { failOnStart?: boolean } = {}) {
  let watcherOptions: DbWatcherOptions | null = null;
  const source: TriggerSource = {
    start: vi.fn(() => {
      if (options.failOnStart) throw new FatalError('Cannot watch /var/lib/pacman/local: ENOENT');
    }),
    close: vi.fn(),
  };
  return {
    source,
    create: (opts: DbWatcherOptions) => {
      watcherOptions = opts;
      return source;
    },
    fire: () => watcherOptions?.triggers.send('file_changed'),
    die: (message: string) => watcherOptions?.onError?.(new FatalError(message)),
  };
}

/** A checker whose calls stay pending until `release` is called. */
function makeHeldChecker() {
  const pending: Array<() => void> = [];
  const check = vi.fn(
    () => new Promise<Update[]>((resolve) => pending.push(() => resolve([]))),
  );
  return {
    check,
    release: () => pending.shift()?.(),
  };
}

beforeAll(() => {
  configureLogging({ level: 'silent' });
});

describe('Daemon', () => {
  it('runs a first check on start and publishes it', async () => {
    const check = vi.fn(async () => UPDATES);
    const watcher = makeFakeWatcher();
    const daemon = createDaemon(CONFIG, { checker: { check }, createWatcher: watcher.create, port: 0 });

    await daemon.start();
    await vi.waitFor(() =>
      expect(daemon.server.status).toEqual({ kind: 'missing_updates', updates: UPDATES }),
    );

    expect(check).toHaveBeenCalledOnce();
    expect(watcher.source.start).toHaveBeenCalledOnce();
    await daemon.stop();
    expect(watcher.source.close).toHaveBeenCalled();
  });

  it('checks again when the watcher fires', async () => {
    const check = vi.fn(async (): Promise<Update[]> => []);
    const watcher = makeFakeWatcher();
    const daemon = createDaemon(CONFIG, { checker: { check }, createWatcher: watcher.create, port: 0 });

    await daemon.start();
    await vi.waitFor(() => expect(daemon.server.status).toEqual({ kind: 'up_to_date' }));
    await vi.waitFor(() => expect(daemon.coordinator.state).toBe('idle'));

    watcher.fire();
    await vi.waitFor(() => expect(check).toHaveBeenCalledTimes(2));

    await daemon.stop();
  });

  it('refuses to start when the watcher cannot start', async () => {
    const check = vi.fn(async (): Promise<Update[]> => []);
    const watcher = makeFakeWatcher({ failOnStart: true });
    const daemon = createDaemon(CONFIG, { checker: { check }, createWatcher: watcher.create, port: 0 });

    await expect(daemon.start()).rejects.toThrow('Cannot watch /var/lib/pacman/local: ENOENT');
    expect(daemon.triggers.isClosed).toBe(true);
    expect(check).not.toHaveBeenCalled();
  });

  it('rejects done with FatalError when the coordinator loop crashes', async () => {
    const watcher = makeFakeWatcher();
    const daemon = createDaemon(CONFIG, {
      checker: { check: async () => [] },
      createWatcher: watcher.create,
      port: 0,
    });
    daemon.coordinator.on('check:start', () => {
      throw new Error('boom');
    });

    await daemon.start();
    await expect(daemon.done).rejects.toThrow('Update coordinator crashed: boom');
    await expect(daemon.done).rejects.toBeInstanceOf(FatalError);

    await expect(daemon.stop()).rejects.toBeInstanceOf(FatalError);
  });

  it('rejects done with FatalError when the watcher dies', async () => {
    const watcher = makeFakeWatcher();
    const daemon = createDaemon(CONFIG, {
      checker: { check: async () => [] },
      createWatcher: watcher.create,
      port: 0,
    });

    await daemon.start();
    watcher.die('Stopped watching /var/lib/pacman/local: EMFILE');

    await expect(daemon.done).rejects.toThrow('Stopped watching /var/lib/pacman/local: EMFILE');
    await expect(daemon.done).rejects.toBeInstanceOf(FatalError);
    expect(daemon.triggers.isClosed).toBe(true);
    expect(watcher.source.close).toHaveBeenCalled();

    await expect(daemon.stop()).rejects.toBeInstanceOf(FatalError);
  });

  it('drops triggers still queued when stopped during a check', async () => {
    const checker = makeHeldChecker();
    const watcher = makeFakeWatcher();
    const daemon = createDaemon(CONFIG, { checker, createWatcher: watcher.create, port: 0 });

    await daemon.start();
    await vi.waitFor(() => expect(checker.check).toHaveBeenCalledOnce());

    watcher.fire();
    expect(daemon.triggers.pending).toBe(1);

    const stopped = daemon.stop();
    checker.release();
    await stopped;

    expect(checker.check).toHaveBeenCalledOnce();
    expect(daemon.triggers.pending).toBe(0);
  });
});

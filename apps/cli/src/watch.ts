import { ScreenshotOrganizer, errorMessage, isDirectory, type Reporter } from '@shotsort/core';
import {
  detectWatchCapability,
  startWatch,
  type NotificationSource,
  type WatchCapability,
  type WatchSession,
} from '@shotsort/watcher';
import type { Settings } from './config.js';

export interface WatchCommandHooks {
  capability?: WatchCapability;
  notifications?: NotificationSource;
  /** Resolves when the watcher should shut down; `closed` settles if it dies first. */
  untilStopped?: (closed: Promise<void>) => Promise<unknown>;
}

/**
 * Watch mode. Runs until SIGINT/SIGTERM or until the watcher fails, then
 * lets the move in flight finish. Returns the process exit code.
 */
export async function runWatch(
  settings: Settings,
  reporter: Reporter,
  hooks: WatchCommandHooks = {},
): Promise<number> {
  const { source, target, dryRun } = settings.organizer;

  if (!isDirectory(source)) {
    reporter.error(`Source directory ${source} does not exist.`);
    return 1;
  }

  const capability = hooks.capability ?? detectWatchCapability(source);
  if (!capability.available) {
    reportUnavailable(reporter, capability.reason);
    return 1;
  }

  const organizer = new ScreenshotOrganizer(settings.organizer, { reporter });
  let session: WatchSession;
  try {
    session = startWatch(organizer, {
      debounceMs: settings.debounceMs,
      notifications: hooks.notifications,
    });
  } catch (err) {
    reportUnavailable(reporter, errorMessage(err));
    return 1;
  }

  reporter.info('Shotsort watcher active');
  reporter.info(`Watching: ${source}`);
  reporter.info(`Target:   ${target}`);
  if (dryRun) reporter.warning('Dry run: nothing will be moved.');
  reporter.info('Press Ctrl+C to stop.');

  const untilStopped = hooks.untilStopped ?? waitForShutdownSignal;
  await Promise.race([untilStopped(session.closed), session.closed]);

  reporter.info('Stopping watcher...');
  await session.stop();

  const stats = organizer.stats;
  reporter.success(`Stopped. Moved: ${stats.moved} | Errors: ${stats.errors}`);
  return session.error ? 1 : 0;
}

function reportUnavailable(reporter: Reporter, reason: string | undefined): void {
  reporter.error(
    `Watch mode needs filesystem notifications, which are unavailable here (${reason ?? 'unknown reason'}).`,
  );
}

/** Resolves on SIGINT/SIGTERM, or quietly once `closed` settles. */
function waitForShutdownSignal(closed: Promise<void>): Promise<NodeJS.Signals | null> {
  return new Promise((resolve) => {
    const finish = (signal: NodeJS.Signals | null): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    const onSignal = (signal: NodeJS.Signals): void => finish(signal);
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
    void closed.then(() => finish(null));
  });
}

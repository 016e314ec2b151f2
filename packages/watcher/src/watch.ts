import fs from 'node:fs';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { errorMessage, type ScreenshotOrganizer } from '@shotsort/core';
import { fsNotificationSource, type NotificationSource, type Subscription } from './notifications.js';

/** Time given to the writer to finish before a new file is touched. */
export const DEFAULT_DEBOUNCE_MS = 1000;

export interface WatchOptions {
  debounceMs?: number;
  notifications?: NotificationSource;
}

/**
 * Feeds newly created files in the source directory to the organizer.
 *
 * Handlers run one at a time on a single promise chain, so two moves never
 * overlap and the organizer's counters have a single writer. A path that is
 * already waiting is not queued again.
 */
export class WatchSession {
  private subscription: Subscription | null = null;
  private queue: Promise<void> = Promise.resolve();
  private readonly pending = new Set<string>();
  private readonly debounceMs: number;
  private readonly notifications: NotificationSource;
  private markClosed: () => void = () => {};
  private failure: Error | null = null;

  /** Resolves once the subscription ends, by `stop()` or by a watcher error. */
  readonly closed: Promise<void> = new Promise((resolve) => {
    this.markClosed = resolve;
  });

  constructor(
    private readonly organizer: ScreenshotOrganizer,
    options: WatchOptions = {},
  ) {
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.notifications = options.notifications ?? fsNotificationSource;
  }

  get isWatching(): boolean {
    return this.subscription !== null;
  }

  get queued(): number {
    return this.pending.size;
  }

  /** The error that ended the subscription, if one did. */
  get error(): Error | null {
    return this.failure;
  }

  start(): void {
    if (this.subscription) return;
    this.subscription = this.notifications.subscribe(
      this.organizer.config.source,
      (fileName) => this.onEntry(fileName),
      (err) => this.onError(err),
    );
  }

  /**
   * Unsubscribe, then wait for the handler in flight and anything already
   * queued behind it.
   */
  async stop(): Promise<void> {
    this.unsubscribe();
    await this.idle();
  }

  idle(): Promise<void> {
    return this.queue;
  }

  private unsubscribe(): void {
    this.subscription?.close();
    this.subscription = null;
    this.markClosed();
  }

  // A watcher that reported an error delivers nothing more.
  private onError(err: Error): void {
    this.organizer.reporter.error(`Watcher error: ${err.message}`);
    this.failure = err;
    this.unsubscribe();
  }

  private onEntry(fileName: string): void {
    const filePath = path.join(this.organizer.config.source, fileName);

    try {
      const stats = fs.statSync(filePath, { throwIfNoEntry: false });
      // Gone already: this was a deletion or a rename away.
      if (!stats || stats.isDirectory()) return;
    } catch (err) {
      this.organizer.reporter.error(`Error processing ${fileName}: ${errorMessage(err)}`);
      return;
    }

    if (this.pending.has(filePath)) return;
    this.pending.add(filePath);

    this.queue = this.queue
      .then(() => this.handle(filePath))
      .catch((err: unknown) => {
        this.organizer.reporter.error(`Error processing ${fileName}: ${errorMessage(err)}`);
      });
  }

  private async handle(filePath: string): Promise<void> {
    await sleep(this.debounceMs);
    this.pending.delete(filePath);
    this.organizer.process(filePath);
  }
}

export function startWatch(organizer: ScreenshotOrganizer, options: WatchOptions = {}): WatchSession {
  const session = new WatchSession(organizer, options);
  session.start();
  return session;
}

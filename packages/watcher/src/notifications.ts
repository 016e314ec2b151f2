import fs from 'node:fs';

export interface Subscription {
  close(): void;
}

/**
 * Delivers the names of entries that appeared (or disappeared) directly
 * inside a directory. Callers check the filesystem to tell which.
 */
export interface NotificationSource {
  subscribe(
    directory: string,
    onEntry: (fileName: string) => void,
    onError: (err: Error) => void,
  ): Subscription;
}

/** Non-recursive `fs.watch`; creations and deletions both arrive as 'rename'. */
export const fsNotificationSource: NotificationSource = {
  subscribe(directory, onEntry, onError) {
    const watcher = fs.watch(directory, { persistent: true, recursive: false }, (eventType, fileName) => {
      if (eventType === 'rename' && fileName) onEntry(fileName);
    });
    watcher.on('error', onError);
    return { close: () => watcher.close() };
  },
};

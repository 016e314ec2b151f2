import fs from 'node:fs';
import path from 'node:path';

export const ARCHIVE_DIR_NAME = 'Shotsort_Archive';

/** Replace a leading `~` with the home directory. */
export function expandHome(p: string, home: string): string {
  if (p === '~') return home;
  if (p.startsWith('~/') || p.startsWith('~\\')) return path.join(home, p.slice(2));
  return p;
}

/**
 * The desktop people actually use: a OneDrive-synced one wins when it
 * exists, otherwise the standard one.
 */
export function getDefaultSource(home: string): string {
  const oneDrive = path.join(home, 'OneDrive', 'Desktop');
  if (fs.existsSync(oneDrive)) return oneDrive;
  return path.join(home, 'Desktop');
}

export function getDefaultTarget(home: string): string {
  return path.join(home, 'Documents', ARCHIVE_DIR_NAME);
}

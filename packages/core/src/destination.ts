import fs from 'node:fs';
import path from 'node:path';
import { ARCHIVE_FOLDER, type Destination } from './models.js';

// ─── Creation Date ─────────────────────────────────────────────

/**
 * One way of reading a "created at" date from file metadata.
 * Returns undefined when the platform does not provide it.
 */
export interface TimestampSource {
  name: string;
  read(stats: fs.Stats): Date | undefined;
}

export const BIRTHTIME_SOURCE: TimestampSource = {
  name: 'birthtime',
  read: (stats) => toDate(stats.birthtimeMs),
};

export const MTIME_SOURCE: TimestampSource = {
  name: 'mtime',
  read: (stats) => toDate(stats.mtimeMs),
};

/** Most trustworthy first. */
export const DEFAULT_TIMESTAMP_SOURCES: readonly TimestampSource[] = [
  BIRTHTIME_SOURCE,
  MTIME_SOURCE,
];

// Filesystems without birth times report 0.
function toDate(ms: number): Date | undefined {
  return Number.isFinite(ms) && ms > 0 ? new Date(ms) : undefined;
}

/**
 * Asks each source in order. A source that throws or has nothing is
 * skipped; if none answers, mtime is used.
 */
export function pickCreationDate(
  stats: fs.Stats,
  sources: readonly TimestampSource[] = DEFAULT_TIMESTAMP_SOURCES,
): Date {
  for (const source of sources) {
    let date: Date | undefined;
    try {
      date = source.read(stats);
    } catch {
      date = undefined;
    }
    if (date && !Number.isNaN(date.getTime())) return date;
  }

  return stats.mtime;
}

export function getCreationDate(
  filePath: string,
  sources: readonly TimestampSource[] = DEFAULT_TIMESTAMP_SOURCES,
): Date {
  return pickCreationDate(fs.statSync(filePath), sources);
}

// ─── Formatting ────────────────────────────────────────────────

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** `YYYY-MM` in local time. */
export function formatMonthFolder(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}`;
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function formatCollisionStamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

// ─── Collision Handling ────────────────────────────────────────

/**
 * Keeps `fileName` when it is free in `directory`, otherwise inserts the
 * current timestamp between stem and extension. The alternate name is
 * not checked again.
 */
export function resolveUniqueName(
  directory: string,
  fileName: string,
  now: Date = new Date(),
): { fileName: string; renamed: boolean } {
  if (!fs.existsSync(path.join(directory, fileName))) {
    return { fileName, renamed: false };
  }

  const ext = path.extname(fileName);
  const stem = path.basename(fileName, ext);
  return { fileName: `${stem}_${formatCollisionStamp(now)}${ext}`, renamed: true };
}

// ─── Resolver ──────────────────────────────────────────────────

export interface DestinationResolverOptions {
  timestampSources?: readonly TimestampSource[];
  now?: () => Date;
}

/**
 * Maps a candidate file to `<target>/Screenshots/<YYYY-MM>/<name>`.
 */
export class DestinationResolver {
  private readonly timestampSources: readonly TimestampSource[];
  private readonly now: () => Date;

  constructor(
    private readonly targetRoot: string,
    options: DestinationResolverOptions = {},
  ) {
    this.timestampSources = options.timestampSources ?? DEFAULT_TIMESTAMP_SOURCES;
    this.now = options.now ?? (() => new Date());
  }

  resolve(candidatePath: string): Destination {
    const created = getCreationDate(candidatePath, this.timestampSources);
    const monthFolder = formatMonthFolder(created);
    const directory = path.join(this.targetRoot, ARCHIVE_FOLDER, monthFolder);
    const { fileName, renamed } = resolveUniqueName(
      directory,
      path.basename(candidatePath),
      this.now(),
    );

    return {
      directory,
      monthFolder,
      fileName,
      path: path.join(directory, fileName),
      renamed,
    };
  }
}

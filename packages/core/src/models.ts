// ─── Configuration ─────────────────────────────────────────────

/** Archive subfolder that holds every month folder. */
export const ARCHIVE_FOLDER = 'Screenshots';

export interface OrganizerConfig {
  readonly source: string;
  readonly target: string;
  readonly dryRun: boolean;
}

// ─── Run State ─────────────────────────────────────────────────

export interface RunStats {
  moved: number;
  errors: number;
}

export interface Destination {
  directory: string;     // <target>/Screenshots/<YYYY-MM>
  monthFolder: string;   // YYYY-MM
  fileName: string;      // original name, or the timestamped alternate
  path: string;
  renamed: boolean;
}

// ─── Scan Outcome ──────────────────────────────────────────────

export type ScanOutcome =
  | { status: 'missing-source'; source: string }
  | { status: 'completed'; files: number; stats: RunStats };

import { ScreenshotOrganizer, scanDirectory, type Reporter } from '@shotsort/core';
import type { Settings } from './config.js';

/** One-shot scan. Returns the process exit code. */
export function runScan(settings: Settings, reporter: Reporter): number {
  const organizer = new ScreenshotOrganizer(settings.organizer, { reporter });

  if (settings.organizer.dryRun) {
    reporter.warning('Dry run: nothing will be moved.');
  }

  const outcome = scanDirectory(organizer);
  return outcome.status === 'missing-source' ? 1 : 0;
}

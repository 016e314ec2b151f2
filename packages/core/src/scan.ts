import path from 'node:path';
import type { ScanOutcome } from './models.js';
import type { ScreenshotOrganizer } from './organizer.js';
import { isDirectory, listFiles } from './files.js';

/**
 * One pass over the files directly inside the source directory,
 * processed strictly one after another.
 */
export function scanDirectory(organizer: ScreenshotOrganizer): ScanOutcome {
  const { source } = organizer.config;
  const reporter = organizer.reporter;

  if (!isDirectory(source)) {
    reporter.error(`Source directory ${source} does not exist.`);
    return { status: 'missing-source', source };
  }

  const files = listFiles(source);
  reporter.info(`Organizing ${files.length} files from: ${source}`);

  for (let i = 0; i < files.length; i++) {
    organizer.process(files[i]);
    reporter.progress(i + 1, files.length, path.basename(files[i]));
  }

  const stats = organizer.stats;
  reporter.info('-'.repeat(48));
  reporter.success(`Done. Moved: ${stats.moved} | Errors: ${stats.errors}`);

  return { status: 'completed', files: files.length, stats };
}

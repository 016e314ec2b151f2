import fs from 'node:fs';
import path from 'node:path';
import type { OrganizerConfig, RunStats } from './models.js';
import { isImageFile, isScreenshot } from './classifier.js';
import { DestinationResolver, type DestinationResolverOptions } from './destination.js';
import { errorMessage } from './errors.js';
import { isRegularFile, moveFile } from './files.js';
import { PlainReporter, type Reporter } from './reporter.js';

export interface OrganizerOptions extends DestinationResolverOptions {
  reporter?: Reporter;
}

/**
 * Moves one screenshot at a time into its month folder and keeps the
 * moved/error counters for the run.
 */
export class ScreenshotOrganizer {
  readonly config: OrganizerConfig;
  readonly reporter: Reporter;
  private readonly resolver: DestinationResolver;
  private counters: RunStats = { moved: 0, errors: 0 };

  constructor(config: OrganizerConfig, options: OrganizerOptions = {}) {
    this.config = config;
    this.reporter = options.reporter ?? new PlainReporter();
    this.resolver = new DestinationResolver(config.target, options);
  }

  get stats(): RunStats {
    return { ...this.counters };
  }

  /**
   * Returns true when the file was a screenshot and was moved (or would
   * have been, in dry-run). Per-file failures are reported and counted,
   * never thrown.
   */
  process(candidatePath: string): boolean {
    const fileName = path.basename(candidatePath);

    try {
      if (!isImageFile(fileName) || !isRegularFile(candidatePath)) return false;
      if (!isScreenshot(fileName)) return false;

      const destination = this.resolver.resolve(candidatePath);
      const label = destination.renamed
        ? `${destination.monthFolder} (as ${destination.fileName})`
        : destination.monthFolder;

      if (this.config.dryRun) {
        this.reporter.warning(`[DRY-RUN] Would move: ${fileName} -> ${label}`);
        return true;
      }

      fs.mkdirSync(destination.directory, { recursive: true });
      moveFile(candidatePath, destination.path);

      this.counters.moved++;
      this.reporter.success(`Moved: ${fileName} -> ${label}`);
      return true;
    } catch (err) {
      this.reporter.error(`Error processing ${fileName}: ${errorMessage(err)}`);
      this.counters.errors++;
      return false;
    }
  }
}

export * from './models.js';
export { isScreenshot, isImageFile, SCREENSHOT_KEYWORDS, IMAGE_EXTENSIONS } from './classifier.js';
export {
  DestinationResolver,
  getCreationDate,
  pickCreationDate,
  formatMonthFolder,
  formatCollisionStamp,
  resolveUniqueName,
  BIRTHTIME_SOURCE,
  MTIME_SOURCE,
  DEFAULT_TIMESTAMP_SOURCES,
} from './destination.js';
export type { TimestampSource, DestinationResolverOptions } from './destination.js';
export { ScreenshotOrganizer } from './organizer.js';
export type { OrganizerOptions } from './organizer.js';
export { scanDirectory } from './scan.js';
export { PlainReporter } from './reporter.js';
export type { Reporter } from './reporter.js';
export { errorMessage, isErrnoException } from './errors.js';
export { isDirectory, isRegularFile, listFiles, moveFile } from './files.js';

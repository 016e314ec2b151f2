import path from 'node:path';

/** Lowercase substrings that mark a file name as a screenshot. */
export const SCREENSHOT_KEYWORDS: readonly string[] = [
  'screenshot',
  'screen_shot',
  'screen-shot',
  'screen shot',
  'スクリーンショット', // Japanese
  '截屏',               // Chinese
  '屏幕快照',           // Chinese (older macOS)
  'captura',           // Spanish
  'bildschirmfoto',    // German
];

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.png',
  '.jpg',
  '.jpeg',
  '.bmp',
  '.gif',
  '.webp',
  '.heic',
  '.tiff',
]);

/**
 * True when any keyword appears anywhere in the name, ignoring case.
 * Plain substring match: "myscreenshot123.png" counts.
 */
export function isScreenshot(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return SCREENSHOT_KEYWORDS.some((keyword) => lower.includes(keyword));
}

export function isImageFile(fileName: string): boolean {
  return IMAGE_EXTENSIONS.has(path.extname(fileName).toLowerCase());
}

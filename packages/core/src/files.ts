import fs from 'node:fs';
import path from 'node:path';
import { isErrnoException } from './errors.js';

/** Follows symlinks. A missing path is simply not a file. */
export function isRegularFile(filePath: string): boolean {
  return fs.statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
}

export function isDirectory(dirPath: string): boolean {
  return fs.statSync(dirPath, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

/**
 * Regular files directly inside `dirPath`, sorted by name. No recursion.
 */
export function listFiles(dirPath: string): string[] {
  return fs.readdirSync(dirPath)
    .sort()
    .map((entry) => path.join(dirPath, entry))
    .filter((entryPath) => isRegularFile(entryPath));
}

/**
 * Rename `from` to `to`. Falls back to copy + unlink when the two paths
 * sit on different devices, keeping the access and modification times.
 */
export function moveFile(from: string, to: string): void {
  try {
    fs.renameSync(from, to);
  } catch (err) {
    if (!isErrnoException(err) || err.code !== 'EXDEV') throw err;
    copyAcrossDevices(from, to);
  }
}

// On failure the copy is removed again, unless `to` was there before us.
function copyAcrossDevices(from: string, to: string): void {
  const stats = fs.statSync(from);
  const existed = fs.existsSync(to);

  try {
    fs.copyFileSync(from, to, fs.constants.COPYFILE_EXCL);
    fs.utimesSync(to, stats.atime, stats.mtime);
    fs.unlinkSync(from);
  } catch (err) {
    if (!existed) fs.rmSync(to, { force: true });
    throw err;
  }
}

import fs from 'node:fs';
import os from 'node:os';
import { errorMessage } from '@shotsort/core';

export interface WatchCapability {
  available: boolean;
  reason?: string;
}

/**
 * Check whether filesystem notifications work here by briefly watching
 * `directory`.
 */
export function detectWatchCapability(directory: string = os.tmpdir()): WatchCapability {
  try {
    const watcher = fs.watch(directory, { persistent: false });
    watcher.close();
    return { available: true };
  } catch (err) {
    return { available: false, reason: errorMessage(err) };
  }
}

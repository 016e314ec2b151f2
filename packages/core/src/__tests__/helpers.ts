import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Reporter } from '../reporter.js';

export interface ReportedLine {
  level: 'info' | 'warning' | 'error' | 'success';
  message: string;
}

export class RecordingReporter implements Reporter {
  lines: ReportedLine[] = [];
  progressCalls: Array<[number, number, string]> = [];

  info(message: string): void {
    this.lines.push({ level: 'info', message });
  }

  warning(message: string): void {
    this.lines.push({ level: 'warning', message });
  }

  error(message: string): void {
    this.lines.push({ level: 'error', message });
  }

  success(message: string): void {
    this.lines.push({ level: 'success', message });
  }

  progress(current: number, total: number, label: string): void {
    this.progressCalls.push([current, total, label]);
  }

  messages(level: ReportedLine['level']): string[] {
    return this.lines.filter((l) => l.level === level).map((l) => l.message);
  }
}

export function makeTempDir(prefix = 'shotsort-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(dir: string, name: string, content = 'img'): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, content);
  return filePath;
}

export function setMtime(filePath: string, date: Date): void {
  fs.utimesSync(filePath, date, date);
}

import pc from 'picocolors';
import type { Reporter } from '@shotsort/core';

export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface StyledReporterOptions {
  color: boolean;
  out?: OutputStream;
  err?: OutputStream;
}

const BAR_WIDTH = 24;

/**
 * Terminal reporter: colored lines plus a progress bar redrawn in place
 * when stdout is a terminal.
 */
export class StyledReporter implements Reporter {
  private readonly colors: ReturnType<typeof pc.createColors>;
  private readonly out: OutputStream;
  private readonly err: OutputStream;
  private progressVisible = false;

  constructor(options: StyledReporterOptions) {
    this.colors = pc.createColors(options.color);
    this.out = options.out ?? process.stdout;
    this.err = options.err ?? process.stderr;
  }

  info(message: string): void {
    this.line(this.out, this.colors.cyan(message));
  }

  warning(message: string): void {
    this.line(this.out, this.colors.yellow(message));
  }

  error(message: string): void {
    this.line(this.err, this.colors.bold(this.colors.red(message)));
  }

  success(message: string): void {
    this.line(this.out, `${this.colors.green('✔')} ${message}`);
  }

  progress(current: number, total: number, label: string): void {
    if (!this.out.isTTY || total === 0) return;

    const filled = Math.round((current / total) * BAR_WIDTH);
    const bar = '#'.repeat(filled) + '-'.repeat(BAR_WIDTH - filled);
    this.out.write(`\r\x1b[KSorting... [${bar}] ${current}/${total} ${this.colors.dim(label)}`);
    this.progressVisible = current < total;
    if (!this.progressVisible) this.out.write('\n');
  }

  private line(stream: OutputStream, text: string): void {
    if (this.progressVisible) {
      this.out.write('\r\x1b[K');
      this.progressVisible = false;
    }
    stream.write(text + '\n');
  }
}

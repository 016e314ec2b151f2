/**
 * Output sink for everything the organizer has to say.
 * The core only talks to this interface; presentation lives in the CLI.
 */
export interface Reporter {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  success(message: string): void;
  /** Called after each file of a scan; `current` is 1-based. */
  progress(current: number, total: number, label: string): void;
}

/**
 * Plain-text reporter. Progress is not drawn since there is no
 * way to redraw a line without a terminal.
 */
export class PlainReporter implements Reporter {
  info(message: string): void {
    console.log(message);
  }

  warning(message: string): void {
    console.log(message);
  }

  error(message: string): void {
    console.error(message);
  }

  success(message: string): void {
    console.log(message);
  }

  progress(): void {}
}

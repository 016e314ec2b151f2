export interface CliOptions {
  source?: string;
  target?: string;
  config?: string;
  debounceMs?: number;
  watch: boolean;
  dryRun: boolean;
  plain: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const VALUE_FLAGS = new Map<string, 'source' | 'target' | 'config' | 'debounce'>([
  ['--source', 'source'],
  ['-s', 'source'],
  ['--target', 'target'],
  ['-t', 'target'],
  ['--config', 'config'],
  ['-c', 'config'],
  ['--debounce', 'debounce'],
]);

/**
 * Parse argv (without node and script). Accepts both `--flag value`
 * and `--flag=value` for flags that take a value.
 */
export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { watch: false, dryRun: false, plain: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;

    switch (flag) {
      case '--watch':
      case '-w':
        options.watch = true;
        continue;
      case '--dry-run':
        options.dryRun = true;
        continue;
      case '--plain':
        options.plain = true;
        continue;
      case '--help':
      case '-h':
        options.help = true;
        continue;
    }

    const key = VALUE_FLAGS.get(flag);
    if (!key) {
      throw new UsageError(`Unknown option: ${arg}`);
    }

    let value: string | undefined;
    if (eq >= 0) {
      value = arg.slice(eq + 1);
    } else {
      value = args[i + 1];
      i++;
    }
    if (value === undefined || value === '') {
      throw new UsageError(`Option ${flag} needs a value`);
    }

    if (key === 'debounce') {
      options.debounceMs = parseDebounce(value);
    } else {
      options[key] = value;
    }
  }

  return options;
}

function parseDebounce(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms < 0) {
    throw new UsageError(`Invalid debounce: ${value} (expected milliseconds)`);
  }
  return ms;
}

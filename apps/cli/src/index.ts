#!/usr/bin/env node

import { errorMessage } from '@shotsort/core';
import { parseArgs, UsageError, type CliOptions } from './args.js';
import { ConfigError, loadConfig, resolveSettings, type Settings } from './config.js';
import { StyledReporter } from './reporter.js';
import { runScan } from './scan.js';
import { runWatch } from './watch.js';

const USAGE = `
Shotsort - Screenshot Organizer

Moves screenshots from your desktop into <target>/Screenshots/<YYYY-MM>/.

Usage:
  shotsort [options]              Sort the screenshots currently in the source folder
  shotsort --watch [options]      Keep running and sort new screenshots as they appear

Options:
  --source, -s <path>   Folder to organize (default: OneDrive Desktop, else ~/Desktop)
  --target, -t <path>   Archive root (default: ~/Documents/Shotsort_Archive)
  --watch, -w           Run in background watch mode
  --dry-run             Preview without moving files
  --config, -c <path>   Config file (default: ./shotsort.toml, then ~/.shotsort/config.toml)
  --debounce <ms>       Wait this long before touching a new file (default: 1000)
  --plain               Disable colors
  --help, -h            Show this help
`.trim();

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(`${err.message}\n`);
    console.log(USAGE);
    return 1;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  let settings: Settings;
  try {
    settings = resolveSettings(options, loadConfig(options.config));
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(`Config error: ${err.message}`);
    return 1;
  }

  const reporter = new StyledReporter({ color: settings.color });

  return options.watch
    ? runWatch(settings, reporter)
    : runScan(settings, reporter);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('Fatal error:', errorMessage(err));
    process.exit(1);
  });

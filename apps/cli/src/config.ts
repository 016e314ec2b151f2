import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { OrganizerConfig } from '@shotsort/core';
import { DEFAULT_DEBOUNCE_MS } from '@shotsort/watcher';
import type { CliOptions } from './args.js';
import { expandHome, getDefaultSource, getDefaultTarget } from './paths.js';

export interface ShotsortConfig {
  organizer: {
    source?: string;
    target?: string;
    dryRun: boolean;
  };
  watch: {
    debounceMs: number;
  };
  output: {
    color: boolean;
  };
}

export interface Settings {
  organizer: OrganizerConfig;
  debounceMs: number;
  color: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function defaultConfig(): ShotsortConfig {
  return {
    organizer: { dryRun: false },
    watch: { debounceMs: DEFAULT_DEBOUNCE_MS },
    output: { color: true },
  };
}

function configPaths(home: string): string[] {
  return [
    path.join(process.cwd(), 'shotsort.toml'),
    path.join(home, '.shotsort', 'config.toml'),
  ];
}

/**
 * Load config from TOML file or return defaults. An explicit path must
 * exist; the default locations are optional.
 */
export function loadConfig(configPath?: string, home: string = os.homedir()): ShotsortConfig {
  if (configPath) {
    const resolved = expandHome(configPath, home);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    return parseToml(fs.readFileSync(resolved, 'utf-8'));
  }

  for (const p of configPaths(home)) {
    if (fs.existsSync(p)) {
      return parseToml(fs.readFileSync(p, 'utf-8'));
    }
  }

  return defaultConfig();
}

/**
 * Minimal TOML parser for our config structure: sections, strings,
 * booleans and integers. Unknown sections and keys are ignored.
 */
export function parseToml(content: string): ShotsortConfig {
  const config = defaultConfig();
  let currentSection = '';

  for (const rawLine of content.split('\n')) {
    const line = stripComment(rawLine).trim();
    if (!line) continue;

    // Section header
    const sectionMatch = line.match(/^\[(.+)\]$/);
    if (sectionMatch) {
      currentSection = sectionMatch[1].trim();
      continue;
    }

    // Key-value pair
    const kvMatch = line.match(/^(\w+)\s*=\s*(.+)$/);
    if (!kvMatch) continue;

    const key = kvMatch[1];
    const value = parseTomlValue(kvMatch[2].trim());
    const name = `${currentSection}.${key}`;

    switch (name) {
      case 'organizer.source':
        config.organizer.source = expectString(name, value);
        break;
      case 'organizer.target':
        config.organizer.target = expectString(name, value);
        break;
      case 'organizer.dry_run':
        config.organizer.dryRun = expectBoolean(name, value);
        break;
      case 'watch.debounce_ms':
        config.watch.debounceMs = expectNonNegativeInt(name, value);
        break;
      case 'output.color':
        config.output.color = expectBoolean(name, value);
        break;
    }
  }

  return config;
}

type TomlValue = string | number | boolean;

function parseTomlValue(raw: string): TomlValue {
  if (raw === 'true') return true;
  if (raw === 'false') return false;

  if (/^-?\d+(\.\d+)?$/.test(raw)) return Number(raw);

  if ((raw.startsWith('"') && raw.endsWith('"')) || (raw.startsWith("'") && raw.endsWith("'"))) {
    return raw.slice(1, -1);
  }

  return raw;
}

// '#' inside a quoted string is kept.
function stripComment(line: string): string {
  let quote: string | null = null;
  for (let i = 0; i < line.length; i++) {
    const c = line[i];
    if (quote) {
      if (c === quote) quote = null;
    } else if (c === '"' || c === "'") {
      quote = c;
    } else if (c === '#') {
      return line.slice(0, i);
    }
  }
  return line;
}

function expectString(name: string, value: TomlValue): string {
  if (typeof value !== 'string' || value === '') {
    throw new ConfigError(`${name} must be a non-empty string`);
  }
  return value;
}

function expectBoolean(name: string, value: TomlValue): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${name} must be true or false`);
  }
  return value;
}

function expectNonNegativeInt(name: string, value: TomlValue): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer`);
  }
  return value;
}

/**
 * Merge CLI flags over the config file over built-in defaults.
 */
export function resolveSettings(
  options: CliOptions,
  config: ShotsortConfig,
  home: string = os.homedir(),
): Settings {
  const source = options.source ?? config.organizer.source;
  const target = options.target ?? config.organizer.target;

  return {
    organizer: {
      source: source ? path.resolve(expandHome(source, home)) : getDefaultSource(home),
      target: target ? path.resolve(expandHome(target, home)) : getDefaultTarget(home),
      dryRun: options.dryRun || config.organizer.dryRun,
    },
    debounceMs: options.debounceMs ?? config.watch.debounceMs,
    color: !options.plain && config.output.color,
  };
}

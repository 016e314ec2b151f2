import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, loadConfig, parseToml, resolveSettings } from '../config.js';
import { parseArgs } from '../args.js';

describe('parseToml', () => {
  it('returns defaults for an empty file', () => {
    expect(parseToml('')).toEqual({
      organizer: { dryRun: false },
      watch: { debounceMs: 1000 },
      output: { color: true },
    });
  });

  it('reads every supported key', () => {
    const config = parseToml([
      '# shotsort settings',
      '[organizer]',
      'source = "~/Desktop"',
      "target = '/archive/#1' # trailing comment",
      'dry_run = true',
      '',
      '[watch]',
      'debounce_ms = 2500',
      '',
      '[output]',
      'color = false',
    ].join('\n'));

    expect(config).toEqual({
      organizer: { source: '~/Desktop', target: '/archive/#1', dryRun: true },
      watch: { debounceMs: 2500 },
      output: { color: false },
    });
  });

  it('ignores unknown sections and keys', () => {
    const config = parseToml('[extras]\nsource = "/x"\n[organizer]\nrecursive = true\n');
    expect(config.organizer).toEqual({ dryRun: false });
  });

  it('rejects values of the wrong type', () => {
    expect(() => parseToml('[organizer]\ndry_run = "yes"')).toThrow(
      new ConfigError('organizer.dry_run must be true or false'),
    );
    expect(() => parseToml('[watch]\ndebounce_ms = 0.5')).toThrow('watch.debounce_ms must be a non-negative integer');
    expect(() => parseToml('[organizer]\nsource = 3')).toThrow('organizer.source must be a non-empty string');
  });
});

describe('loadConfig', () => {
  let home: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'shotsort-home-'));
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
  });

  it('reads an explicit path with ~ expanded', () => {
    fs.writeFileSync(path.join(home, 'custom.toml'), '[watch]\ndebounce_ms = 10\n');
    expect(loadConfig('~/custom.toml', home).watch.debounceMs).toBe(10);
  });

  it('fails when an explicit path is missing', () => {
    expect(() => loadConfig(path.join(home, 'nope.toml'), home)).toThrow(ConfigError);
  });
});

describe('resolveSettings', () => {
  const home = path.resolve('/home/tester');

  it('falls back to the default desktop and archive', () => {
    const settings = resolveSettings(parseArgs([]), parseToml(''), home);
    expect(settings).toEqual({
      organizer: {
        source: path.join(home, 'Desktop'),
        target: path.join(home, 'Documents', 'Shotsort_Archive'),
        dryRun: false,
      },
      debounceMs: 1000,
      color: true,
    });
  });

  it('prefers flags over the config file', () => {
    const config = parseToml('[organizer]\nsource = "~/Pictures"\ntarget = "~/Archive"\n[watch]\ndebounce_ms = 300\n');
    const settings = resolveSettings(parseArgs(['-s', '/flag/source', '--debounce', '50', '--plain']), config, home);

    expect(settings.organizer.source).toBe(path.resolve('/flag/source'));
    expect(settings.organizer.target).toBe(path.join(home, 'Archive'));
    expect(settings.debounceMs).toBe(50);
    expect(settings.color).toBe(false);
  });

  it('turns dry-run on from either place', () => {
    const fromFile = resolveSettings(parseArgs([]), parseToml('[organizer]\ndry_run = true'), home);
    const fromFlag = resolveSettings(parseArgs(['--dry-run']), parseToml(''), home);
    expect(fromFile.organizer.dryRun).toBe(true);
    expect(fromFlag.organizer.dryRun).toBe(true);
  });
});

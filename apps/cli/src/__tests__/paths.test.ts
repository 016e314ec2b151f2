import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { expandHome, getDefaultSource, getDefaultTarget } from '../paths.js';

describe('expandHome', () => {
  it('expands a leading ~ only', () => {
    expect(expandHome('~', '/h')).toBe('/h');
    expect(expandHome('~/Desktop', '/h')).toBe(path.join('/h', 'Desktop'));
    expect(expandHome('/abs/~/x', '/h')).toBe('/abs/~/x');
    expect(expandHome('~other/x', '/h')).toBe('~other/x');
  });
});

describe('default paths', () => {
  let home: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'shotsort-home-'));
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
  });

  it('uses the standard desktop when there is no OneDrive one', () => {
    expect(getDefaultSource(home)).toBe(path.join(home, 'Desktop'));
  });

  it('prefers the OneDrive desktop when it exists', () => {
    fs.mkdirSync(path.join(home, 'OneDrive', 'Desktop'), { recursive: true });
    expect(getDefaultSource(home)).toBe(path.join(home, 'OneDrive', 'Desktop'));
  });

  it('archives under Documents', () => {
    expect(getDefaultTarget(home)).toBe(path.join(home, 'Documents', 'Shotsort_Archive'));
  });
});

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { chromeCandidates, findLocalChrome } from './browser-utils.js';

describe('chromeCandidates', () => {
  it('lists the home install on macOS when HOME is set', () => {
    expect(chromeCandidates('darwin', { HOME: '/Users/pilot' })).toEqual([
      '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
      '/Applications/Chromium.app/Contents/MacOS/Chromium',
      '/Users/pilot/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
    ]);
  });

  it('leaves out the per-user install when LOCALAPPDATA is unset', () => {
    expect(chromeCandidates('win32', {})).toEqual([
      'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
      'C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe',
    ]);
  });

  it('falls back to the usual Linux locations', () => {
    expect(chromeCandidates('freebsd', {})[0]).toBe('/usr/bin/google-chrome');
  });
});

describe('findLocalChrome', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'chrome-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('uses the configured path when it exists', () => {
    const chrome = join(dir, 'chrome');
    writeFileSync(chrome, '');
    expect(findLocalChrome(chrome, 'linux', {})).toBe(chrome);
  });

  it('does not look elsewhere when the configured path is missing', () => {
    expect(findLocalChrome(join(dir, 'missing'), 'linux', {})).toBeUndefined();
  });
});

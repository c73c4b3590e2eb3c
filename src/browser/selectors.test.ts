import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { findUp } from './browser-utils.js';
import { loadSelectors } from './selectors.js';

describe('loadSelectors', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'selectors-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads the bundled catalogue by default', () => {
    const selectors = loadSelectors();
    expect(selectors.paths).toEqual({ login: '/login', board: '/analysis' });
    expect(selectors.board.container[0]).toBe('wc-chess-board');
    expect(selectors.board.pieces).toBe('.piece, piece');
  });

  it('rejects a catalogue with missing sections', () => {
    const file = join(dir, 'selectors.json');
    writeFileSync(file, JSON.stringify({ paths: { login: '/login', board: '/analysis' }, popups: [] }));
    expect(() => loadSelectors(file)).toThrow(`invalid selectors in ${file}: login: Required; board: Required`);
  });

  it('finds the catalogue from a nested directory', () => {
    const nested = join(dir, 'dist', 'src', 'browser');
    mkdirSync(nested, { recursive: true });
    mkdirSync(join(dir, 'config'));
    writeFileSync(join(dir, 'config', 'selectors.json'), '{}');
    expect(findUp('config/selectors.json', nested)).toBe(join(dir, 'config', 'selectors.json'));
    expect(findUp('config/no-such-file.json', nested)).toBeUndefined();
  });
});

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StorageWriteError } from './errors.js';
import { MoveLog, loadMoveLog, moveLogFileName } from './move-log.js';
import type { MoveRecord } from './types.js';

const E4: MoveRecord = {
  sequenceNumber: 1,
  side: 'white',
  notation: 'e4',
  uci: 'e2e4',
  from: 'e2',
  to: 'e4',
  timestamp: '2025-03-01T10:00:00.000Z',
  executionStrategy: 'drag',
};

const E5: MoveRecord = {
  sequenceNumber: 2,
  side: 'black',
  notation: 'e5',
  uci: 'e7e5',
  from: 'e7',
  to: 'e5',
  timestamp: '2025-03-01T10:00:03.000Z',
  executionStrategy: 'inject',
};

describe('moveLogFileName', () => {
  it('uses local date and time', () => {
    expect(moveLogFileName(new Date(2025, 0, 2, 3, 4, 5))).toBe('chess_moves_20250102_030405.json');
  });
});

describe('MoveLog', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'move-log-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('appends records in order', () => {
    const log = new MoveLog();
    log.append(E4);
    log.append(E5);
    expect(log.length).toBe(2);
    expect(log.entries()).toEqual([E4, E5]);
    expect(log.last()).toEqual(E5);
  });

  it('rejects a record out of sequence', () => {
    const log = new MoveLog();
    expect(() => log.append(E5)).toThrow('move record out of order: expected #1, got #2');
    expect(log.length).toBe(0);
  });

  it('does not let callers change stored records', () => {
    const log = new MoveLog();
    const record = { ...E4 };
    log.append(record);
    record.notation = 'Nf3';
    expect(log.entries()[0]?.notation).toBe('e4');
    expect(Object.isFrozen(log.entries()[0])).toBe(true);
  });

  it('writes a JSON array that loads back', () => {
    const log = new MoveLog();
    log.append(E4);
    log.append(E5);
    const path = log.flush(join(dir, 'nested'), new Date(2025, 2, 1, 10, 0, 5));

    expect(path).toBe(join(dir, 'nested', 'chess_moves_20250301_100005.json'));
    expect(readFileSync(path, 'utf8')).toBe(JSON.stringify([E4, E5], null, 2) + '\n');
    expect(loadMoveLog(path)).toEqual([E4, E5]);
  });

  it('reports a failed write as StorageWriteError and keeps the records', () => {
    const blocker = join(dir, 'not-a-dir');
    writeFileSync(blocker, 'x');
    const log = new MoveLog();
    log.append(E4);

    expect(() => log.flush(blocker)).toThrow(StorageWriteError);
    expect(log.entries()).toEqual([E4]);
  });

  it('refuses to load records that fail validation', () => {
    const path = join(dir, 'bad.json');
    writeFileSync(path, JSON.stringify([{ ...E4, from: 'z9' }]));
    expect(() => loadMoveLog(path)).toThrow();
  });

  it('refuses a log whose records are out of order', () => {
    const path = join(dir, 'swapped.json');
    writeFileSync(path, JSON.stringify([E5, E4]));
    expect(() => loadMoveLog(path)).toThrow('record #1 has sequence number 2');
  });

  it('refuses a log with a repeated sequence number', () => {
    const path = join(dir, 'repeated.json');
    writeFileSync(path, JSON.stringify([E4, { ...E5, sequenceNumber: 1 }]));
    expect(() => loadMoveLog(path)).toThrow('record #2 has sequence number 1');
  });
});

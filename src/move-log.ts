import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { StorageWriteError } from './errors.js';
import { STRATEGY_NAMES, isSquare, type MoveRecord } from './types.js';

const squareSchema = z.string().refine(isSquare, 'expected a board square');

export const moveRecordSchema = z.object({
  sequenceNumber: z.number().int().positive(),
  side: z.enum(['white', 'black']),
  notation: z.string().min(1),
  uci: z.string().min(4),
  from: squareSchema,
  to: squareSchema,
  timestamp: z.string().datetime({ offset: true }),
  executionStrategy: z.enum(STRATEGY_NAMES),
});

// Records are numbered 1..n in file order.
const moveLogFileSchema = z.array(moveRecordSchema).superRefine((records, ctx) => {
  records.forEach((record, i) => {
    if (record.sequenceNumber !== i + 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `record #${i + 1} has sequence number ${record.sequenceNumber}`,
        path: [i, 'sequenceNumber'],
      });
    }
  });
});

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * `chess_moves_YYYYMMDD_HHMMSS.json`, local time.
 */
export function moveLogFileName(at: Date): string {
  const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
  const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  return `chess_moves_${date}_${time}.json`;
}

/**
 * Append-only list of executed moves for one game session.
 */
export class MoveLog {
  private readonly records: MoveRecord[] = [];

  get length(): number {
    return this.records.length;
  }

  append(record: MoveRecord): void {
    const expected = this.records.length + 1;
    if (record.sequenceNumber !== expected) {
      throw new Error(`move record out of order: expected #${expected}, got #${record.sequenceNumber}`);
    }
    this.records.push(Object.freeze({ ...record }));
  }

  entries(): readonly MoveRecord[] {
    return this.records.slice();
  }

  last(): MoveRecord | undefined {
    return this.records[this.records.length - 1];
  }

  toJSON(): MoveRecord[] {
    return this.records.slice();
  }

  /**
   * Writes the records to `dir` and returns the file path. Records stay in
   * memory whether or not the write succeeds.
   */
  flush(dir: string, now: Date = new Date()): string {
    const path = join(dir, moveLogFileName(now));
    try {
      mkdirSync(dir, { recursive: true });
      writeFileSync(path, JSON.stringify(this.records, null, 2) + '\n', 'utf8');
    } catch (err) {
      throw new StorageWriteError(path, { cause: err });
    }
    return path;
  }
}

/**
 * Reads a flushed move log back, validating every record.
 */
export function loadMoveLog(path: string): MoveRecord[] {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return moveLogFileSchema.parse(raw);
}

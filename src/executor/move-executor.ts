import { ExecutionFailedError, type StrategyFailure } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { TimeoutError, sleep, withTimeout } from '../timing.js';
import type { PlannedMove, StrategyName } from '../types.js';
import type { BoardSurface } from './board-surface.js';
import type { MoveStrategy } from './strategies.js';

export interface MoveExecutorOptions {
  /** Budget for one strategy: the interaction plus waiting for the board to change. */
  attemptTimeoutMs: number;
  /**
   * How long a strategy that overran its budget may keep going before the
   * move is given up. Defaults to `attemptTimeoutMs`.
   */
  settleTimeoutMs?: number;
  pollIntervalMs?: number;
  logger?: Logger;
}

type AttemptResult =
  | { outcome: 'played' }
  | { outcome: 'failed'; reason: string }
  /** Overran its budget without a visible result; the page can no longer be trusted. */
  | { outcome: 'stuck'; reason: string };

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Tries each strategy in order until one produces a visible change on the
 * board. Only one strategy touches the page at a time: one that overruns
 * its budget is waited for, and no later strategy runs after it.
 */
export class MoveExecutor {
  private readonly surface: BoardSurface;
  private readonly strategies: readonly MoveStrategy[];
  private readonly attemptTimeoutMs: number;
  private readonly settleTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly log: Logger;

  constructor(surface: BoardSurface, strategies: readonly MoveStrategy[], opts: MoveExecutorOptions) {
    this.surface = surface;
    this.strategies = strategies;
    this.attemptTimeoutMs = opts.attemptTimeoutMs;
    this.settleTimeoutMs = opts.settleTimeoutMs ?? opts.attemptTimeoutMs;
    this.pollIntervalMs = opts.pollIntervalMs ?? 100;
    this.log = (opts.logger ?? silentLogger).child('executor');
  }

  get strategyNames(): StrategyName[] {
    return this.strategies.map((s) => s.name);
  }

  async execute(move: PlannedMove): Promise<StrategyName> {
    const failures: StrategyFailure[] = [];

    for (const strategy of this.strategies) {
      this.log.debug(`trying ${strategy.name} for ${move.uci}`);
      const result = await this.tryStrategy(strategy, move);
      if (result.outcome === 'played') {
        this.log.info(`played ${move.san} (${move.uci}) via ${strategy.name}`);
        return strategy.name;
      }
      this.log.warn(`${strategy.name} failed for ${move.uci}: ${result.reason}`);
      failures.push({ strategy: strategy.name, reason: result.reason });
      if (result.outcome === 'stuck') break;
    }

    throw new ExecutionFailedError(move.uci, failures);
  }

  private async tryStrategy(strategy: MoveStrategy, move: PlannedMove): Promise<AttemptResult> {
    const deadline = Date.now() + this.attemptTimeoutMs;

    let before: string;
    try {
      before = await withTimeout(this.surface.signature(), this.attemptTimeoutMs, 'reading board');
    } catch (err) {
      return { outcome: 'failed', reason: reasonOf(err) };
    }

    const attempt = strategy.attempt(move, this.surface, Math.max(1, deadline - Date.now()));
    try {
      await withTimeout(attempt, Math.max(1, deadline - Date.now()), `${strategy.name} attempt`);
    } catch (err) {
      if (err instanceof TimeoutError) return this.settle(attempt, before, err.message);
      return { outcome: 'failed', reason: reasonOf(err) };
    }

    try {
      return (await this.waitForChange(before, deadline))
        ? { outcome: 'played' }
        : { outcome: 'failed', reason: 'board did not change' };
    } catch (err) {
      return { outcome: 'failed', reason: reasonOf(err) };
    }
  }

  /**
   * An attempt overran its budget. Waits for it to finish, then decides from
   * the board: a late change is that strategy's move, anything else ends the
   * move since a half-done interaction may still land.
   */
  private async settle(attempt: Promise<void>, before: string, reason: string): Promise<AttemptResult> {
    let finished = true;
    try {
      await withTimeout(
        attempt.then(
          () => undefined,
          () => undefined,
        ),
        this.settleTimeoutMs,
        'settling attempt',
      );
    } catch {
      finished = false;
    }

    let after: string | null;
    try {
      after = await withTimeout(this.surface.signature(), this.settleTimeoutMs, 'reading board');
    } catch (err) {
      this.log.warn(`board unreadable after ${reason}: ${reasonOf(err)}`);
      after = null;
    }

    if (after !== null && after !== before) {
      this.log.debug(`${reason}, but the board changed afterwards`);
      return { outcome: 'played' };
    }
    return {
      outcome: 'stuck',
      reason: finished ? reason : `${reason}; still running after ${this.settleTimeoutMs}ms`,
    };
  }

  private async waitForChange(before: string, deadline: number): Promise<boolean> {
    for (;;) {
      const remaining = deadline - Date.now();
      const current = await withTimeout(
        this.surface.signature(),
        Math.max(1, remaining),
        'reading board',
      );
      if (current !== before) return true;
      if (remaining <= 0) return false;
      await sleep(Math.min(this.pollIntervalMs, remaining));
    }
  }
}

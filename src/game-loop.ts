import { randomUUID } from 'crypto';
import type { BoardTracker } from './board/board-tracker.js';
import type { BotConfig } from './config.js';
import type { ChessEngine } from './engine/chess-engine.js';
import {
  EngineUnavailableError,
  StorageWriteError,
  describeError,
  isBotError,
} from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { MoveLog } from './move-log.js';
import { TimeoutError, pause, randomBetween, withTimeout } from './timing.js';
import type { GameSession, MoveRecord, PlannedMove, StrategyName } from './types.js';

export type GameState = 'idle' | 'awaiting-turn' | 'executing' | 'logging' | 'terminal' | 'aborted';

export type GameLoopConfig = Pick<
  BotConfig,
  | 'username'
  | 'maxMoves'
  | 'continuousPlay'
  | 'moveTimeMs'
  | 'engineTimeoutMs'
  | 'logMoves'
  | 'logDir'
  | 'moveDelayMinMs'
  | 'moveDelayMaxMs'
>;

export interface MovePlayer {
  execute(move: PlannedMove): Promise<StrategyName>;
}

export interface GameLoopDeps {
  engine: ChessEngine;
  tracker: BoardTracker;
  executor: MovePlayer;
  moveLog?: MoveLog;
  logger?: Logger;
  now?: () => Date;
  /** Pause between moves; resolves early when the signal aborts. */
  delay?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  onTransition?: (from: GameState, to: GameState) => void;
}

export interface GameOutcome {
  state: 'terminal' | 'aborted';
  reason: string;
  session: GameSession;
  finalFen: string;
  /** Where the move log was written, if it was. */
  logPath: string | null;
  error: Error | null;
  storageError: StorageWriteError | null;
}

const FEN_SNAPSHOT_EVERY = 10;

/**
 * One game: ask the engine, play the move on the page, track it, log it,
 * repeat until the game ends, the move limit is hit, a stop is requested or
 * something fatal happens.
 */
export class GameLoop {
  private readonly config: GameLoopConfig;
  private readonly deps: GameLoopDeps;
  private readonly moveLog: MoveLog;
  private readonly log: Logger;
  private readonly now: () => Date;
  private _state: GameState = 'idle';
  private session: GameSession | null = null;

  constructor(config: GameLoopConfig, deps: GameLoopDeps) {
    this.config = config;
    this.deps = deps;
    this.moveLog = deps.moveLog ?? new MoveLog();
    this.log = (deps.logger ?? silentLogger).child('game');
    this.now = deps.now ?? (() => new Date());
  }

  get state(): GameState {
    return this._state;
  }

  get moves(): readonly MoveRecord[] {
    return this.moveLog.entries();
  }

  /** Current session snapshot, null before `run`. */
  snapshot(): GameSession | null {
    return this.session ? { ...this.session, moves: this.moveLog.entries() } : null;
  }

  async run(signal?: AbortSignal): Promise<GameOutcome> {
    if (this._state !== 'idle') {
      throw new Error(`game loop already used (state ${this._state})`);
    }

    const { tracker } = this.deps;
    const session: GameSession = {
      id: randomUUID(),
      startTime: this.now().toISOString(),
      username: this.config.username ?? null,
      mode: this.config.continuousPlay ? 'continuous' : 'single',
      maxMoves: this.config.maxMoves,
      moves: [],
    };
    this.session = session;

    this.log.info(`starting game with maximum ${this.config.maxMoves} moves`);
    this.transition('awaiting-turn');

    let state: GameOutcome['state'];
    let reason: string;
    let error: Error | null = null;

    try {
      reason = await this.playUntilDone(signal);
      state = 'terminal';
      this.transition('terminal');
    } catch (err) {
      error = err instanceof Error ? err : new Error(String(err));
      reason = describeError(err);
      this.log.error(`game aborted: ${reason}`);
      state = 'aborted';
      this.transition('aborted');
    }

    const finalFen = tracker.position().fen;
    const { logPath, storageError } = this.flush();

    if (this.moveLog.length > 0) {
      this.log.info(`game ended with ${this.moveLog.length} moves played; final position ${finalFen}`);
    } else {
      this.log.info('no moves were played');
    }

    return {
      state,
      reason,
      session: { ...session, moves: this.moveLog.entries() },
      finalFen,
      logPath,
      error,
      storageError,
    };
  }

  private async playUntilDone(signal?: AbortSignal): Promise<string> {
    const { tracker, executor } = this.deps;

    for (;;) {
      // awaiting-turn: stop requests are only honoured here.
      if (signal?.aborted) {
        this.log.info('stop requested');
        return 'stopped';
      }
      if (tracker.isTerminal()) {
        const end = tracker.describeEnd();
        this.log.info(`game over: ${end} (${tracker.result()})`);
        return end;
      }
      if (this.moveLog.length >= this.config.maxMoves) {
        this.log.info(`move limit of ${this.config.maxMoves} reached`);
        return 'move limit reached';
      }

      const position = tracker.position();
      this.log.info(
        `move ${this.moveLog.length + 1}: ${position.turn === 'w' ? 'white' : 'black'} to play`,
      );

      const uci = await this.queryEngine(position.fen);
      const planned = tracker.plan(uci);

      this.transition('executing');
      const strategy = await executor.execute(planned);
      tracker.apply(planned.uci);

      this.transition('logging');
      const record: MoveRecord = {
        sequenceNumber: this.moveLog.length + 1,
        side: planned.side,
        notation: planned.san,
        uci: planned.uci,
        from: planned.from,
        to: planned.to,
        timestamp: this.now().toISOString(),
        executionStrategy: strategy,
      };
      this.moveLog.append(record);
      this.log.info(`played move ${record.sequenceNumber}: ${record.notation} (${record.uci})`);

      if (record.sequenceNumber % FEN_SNAPSHOT_EVERY === 0) {
        this.log.info(`position after ${record.sequenceNumber} moves: ${tracker.position().fen}`);
      }

      this.transition('awaiting-turn');

      if (!tracker.isTerminal() && this.moveLog.length < this.config.maxMoves) {
        const ms = randomBetween(
          this.config.moveDelayMinMs,
          this.config.moveDelayMaxMs,
          this.deps.random,
        );
        await (this.deps.delay ?? pause)(ms, signal);
      }
    }
  }

  private async queryEngine(fen: string): Promise<string> {
    const { engine } = this.deps;
    try {
      return await withTimeout(
        engine.bestMove(fen, { moveTimeMs: this.config.moveTimeMs }),
        this.config.engineTimeoutMs,
        'engine query',
      );
    } catch (err) {
      if (isBotError(err)) throw err;
      const detail = err instanceof TimeoutError ? err.message : describeError(err);
      throw new EngineUnavailableError(engine.name, detail, { cause: err });
    }
  }

  private flush(): { logPath: string | null; storageError: StorageWriteError | null } {
    if (!this.config.logMoves || this.moveLog.length === 0) {
      return { logPath: null, storageError: null };
    }
    try {
      const logPath = this.moveLog.flush(this.config.logDir, this.now());
      this.log.info(`move log saved to ${logPath}`);
      return { logPath, storageError: null };
    } catch (err) {
      if (err instanceof StorageWriteError) {
        this.log.error(describeError(err));
        return { logPath: null, storageError: err };
      }
      throw err;
    }
  }

  private transition(to: GameState): void {
    const from = this._state;
    this._state = to;
    this.log.debug(`${from} -> ${to}`);
    this.deps.onTransition?.(from, to);
  }
}

import { BoardTracker } from './board/board-tracker.js';
import type { BoardClient } from './browser/board-client.js';
import type { BotConfig } from './config.js';
import type { ChessEngine } from './engine/chess-engine.js';
import { UciEngine } from './engine/uci-engine.js';
import { EngineUnavailableError, describeError } from './errors.js';
import type { BoardSurface } from './executor/board-surface.js';
import { MoveExecutor } from './executor/move-executor.js';
import { strategiesFor } from './executor/strategies.js';
import { GameLoop, type GameState } from './game-loop.js';
import type { Logger } from './logger.js';
import { pause } from './timing.js';
import type { GameSession } from './types.js';

export interface GameSummary {
  game: number;
  state: 'terminal' | 'aborted';
  reason: string;
  moves: number;
  logPath: string | null;
  screenshot: string | null;
}

export interface RunSummary {
  games: GameSummary[];
  exitCode: number;
}

export interface RunnerStatus {
  running: boolean;
  game: number;
  state: GameState | null;
  session: GameSession | null;
  completed: GameSummary[];
}

export interface BotRunnerDeps {
  client: BoardClient;
  engine?: ChessEngine;
  logger: Logger;
  /** Pause between games in continuous mode. */
  betweenGamesMs?: number;
  /** Overrides the GameLoop pause between moves (tests). */
  moveDelay?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onGameEnd?: (summary: GameSummary) => void;
}

export function createEngine(config: BotConfig, logger: Logger): ChessEngine {
  return new UciEngine({
    enginePath: config.enginePath,
    timeoutMs: config.engineTimeoutMs,
    skillLevel: config.skillLevel,
    threads: config.threads,
    hashMb: config.hashMb,
    logger,
  });
}

/**
 * Runs one game, or keeps starting new ones in continuous mode, until the
 * game limit or a stop request. Owns the engine and board client lifetimes.
 */
export class BotRunner {
  private readonly config: BotConfig;
  private readonly deps: BotRunnerDeps;
  private readonly engine: ChessEngine;
  private readonly log: Logger;
  private current: GameLoop | null = null;
  /** Session of the last game that ran, kept once its loop is gone. */
  private lastSession: GameSession | null = null;
  private gameIndex = 0;
  private running = false;
  private readonly completed: GameSummary[] = [];

  constructor(config: BotConfig, deps: BotRunnerDeps) {
    this.config = config;
    this.deps = deps;
    this.log = deps.logger.child('runner');
    this.engine = deps.engine ?? createEngine(config, deps.logger);
  }

  status(): RunnerStatus {
    return {
      running: this.running,
      game: this.gameIndex,
      state: this.current?.state ?? null,
      session: this.current?.snapshot() ?? this.lastSession,
      completed: this.completed.slice(),
    };
  }

  /**
   * Throws EngineUnavailableError when the engine cannot be started at all;
   * otherwise resolves with one summary per game played.
   */
  async run(signal?: AbortSignal): Promise<RunSummary> {
    if (this.running) throw new Error('runner is already running');
    this.running = true;

    try {
      await this.engine.init();

      for (;;) {
        this.gameIndex++;
        this.log.info(`=== starting game ${this.gameIndex} ===`);
        const summary = await this.playOne(signal);
        this.completed.push(summary);
        this.deps.onGameEnd?.(summary);
        this.log.info(`game ${this.gameIndex} ${summary.state}: ${summary.reason}`);

        if (!this.config.continuousPlay || signal?.aborted) break;
        if (this.config.maxGames !== undefined && this.gameIndex >= this.config.maxGames) {
          this.log.info(`reached ${this.config.maxGames} games`);
          break;
        }
        await pause(this.deps.betweenGamesMs ?? 2000, signal);
        if (signal?.aborted) break;
      }
    } finally {
      this.current = null;
      this.running = false;
      await this.engine.terminate();
      await this.deps.client.close();
    }

    const last = this.completed[this.completed.length - 1];
    return {
      games: this.completed.slice(),
      exitCode: last && last.state === 'terminal' ? 0 : 1,
    };
  }

  private async playOne(signal?: AbortSignal): Promise<GameSummary> {
    const game = this.gameIndex;
    this.lastSession = null;

    // A previous session may have lost the engine; bring it back first.
    try {
      await this.engine.init();
    } catch (err) {
      return this.aborted(game, err);
    }

    let surface: BoardSurface;
    try {
      surface = await this.deps.client.newGame();
    } catch (err) {
      return this.aborted(game, err);
    }

    const executor = new MoveExecutor(surface, strategiesFor(this.config.strategies), {
      attemptTimeoutMs: this.config.strategyTimeoutMs,
      logger: this.deps.logger,
    });
    const loop = new GameLoop(this.config, {
      engine: this.engine,
      tracker: new BoardTracker(),
      executor,
      logger: this.deps.logger,
      delay: this.deps.moveDelay,
    });
    this.current = loop;

    const outcome = await loop.run(signal);
    this.lastSession = outcome.session;
    let screenshot: string | null = null;
    if (outcome.state === 'aborted') {
      screenshot = await this.deps.client.captureFailure(`game-${game}`);
      if (outcome.error instanceof EngineUnavailableError) {
        // Next init() respawns it.
        await this.engine.terminate();
      }
    }

    return {
      game,
      state: outcome.state,
      reason: outcome.reason,
      moves: outcome.session.moves.length,
      logPath: outcome.logPath,
      screenshot,
    };
  }

  private aborted(game: number, err: unknown): GameSummary {
    const reason = describeError(err);
    this.log.error(`game ${game} could not start: ${reason}`);
    return { game, state: 'aborted', reason, moves: 0, logPath: null, screenshot: null };
  }
}

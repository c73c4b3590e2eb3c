import { describeError } from './errors.js';
import type { GameState } from './game-loop.js';
import type { Logger } from './logger.js';
import type { BotRunner, GameSummary, RunSummary } from './runner.js';
import type { GameSession } from './types.js';

export interface ControlStatus {
  started: boolean;
  running: boolean;
  game: number;
  state: GameState | null;
  session: GameSession | null;
  completed: GameSummary[];
  exitCode: number | null;
  error: string | null;
}

/**
 * Holds the one background run the MCP tools start, report on and stop.
 */
export class BotControl {
  private runner: BotRunner | null = null;
  private controller: AbortController | null = null;
  private done: Promise<void> = Promise.resolve();
  private summary: RunSummary | null = null;
  private error: string | null = null;

  constructor(private readonly log: Logger) {}

  get running(): boolean {
    return this.runner?.status().running ?? false;
  }

  start(runner: BotRunner): void {
    if (this.running) {
      throw new Error('a game is already running; call chess_stop first');
    }
    const controller = new AbortController();
    this.runner = runner;
    this.controller = controller;
    this.summary = null;
    this.error = null;

    this.done = runner.run(controller.signal).then(
      (summary) => {
        this.summary = summary;
      },
      (err: unknown) => {
        this.error = describeError(err);
        this.log.error(`run failed: ${this.error}`);
      },
    );
  }

  /** True when a running game was asked to stop. */
  stop(): boolean {
    if (!this.controller || !this.running) return false;
    this.controller.abort();
    return true;
  }

  /** Stops any running game and resolves once its cleanup is over. */
  async shutdown(): Promise<void> {
    this.stop();
    await this.done;
  }

  status(): ControlStatus {
    const status = this.runner?.status();
    return {
      started: this.runner !== null,
      running: status?.running ?? false,
      game: status?.game ?? 0,
      state: status?.state ?? null,
      session: status?.session ?? null,
      completed: status?.completed ?? [],
      exitCode: this.summary?.exitCode ?? null,
      error: this.error,
    };
  }
}

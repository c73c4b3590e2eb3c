import { describe, expect, it } from 'vitest';
import type { BoardClient } from './browser/board-client.js';
import { resolveConfig } from './config.js';
import type { ChessEngine } from './engine/chess-engine.js';
import { BrowserSetupError, EngineUnavailableError } from './errors.js';
import { silentLogger } from './logger.js';
import { BotRunner, type GameSummary } from './runner.js';
import { FOOLS_MATE, FakeClient, QueueEngine } from './testing/fakes.js';

function botConfig(env: Record<string, string> = {}) {
  return resolveConfig({
    ENGINE_PATH: '/opt/engines/fakefish',
    LOG_MOVES: 'false',
    MOVE_DELAY_MIN_MS: '0',
    MOVE_DELAY_MAX_MS: '0',
    BOT_LOG_FILE: '',
    ...env,
  });
}

function runner(env: Record<string, string>, client: BoardClient, engine: ChessEngine, onGameEnd?: (s: GameSummary) => void) {
  return new BotRunner(botConfig(env), {
    client,
    engine,
    logger: silentLogger,
    betweenGamesMs: 0,
    moveDelay: async () => {},
    onGameEnd,
  });
}

describe('BotRunner', () => {
  it('plays a single game to the end', async () => {
    const client = new FakeClient();
    const engine = new QueueEngine([...FOOLS_MATE]);

    const summary = await runner({}, client, engine).run();

    expect(summary).toEqual({
      games: [
        { game: 1, state: 'terminal', reason: 'checkmate, black wins', moves: 4, logPath: null, screenshot: null },
      ],
      exitCode: 0,
    });
    expect(engine.terminations).toBe(1);
    expect(client.closes).toBe(1);
  });

  it('starts new games in continuous mode up to the game limit', async () => {
    const client = new FakeClient();
    const engine = new QueueEngine([...FOOLS_MATE, ...FOOLS_MATE, ...FOOLS_MATE]);

    const summary = await runner({ CONTINUOUS_PLAY: 'true', MAX_GAMES: '2' }, client, engine).run();

    expect(summary.games.map((g) => `${g.game}:${g.state}`)).toEqual(['1:terminal', '2:terminal']);
    expect(summary.exitCode).toBe(0);
    expect(client.newGames).toBe(2);
  });

  it('carries on after an aborted game in continuous mode', async () => {
    const client = new FakeClient();
    const engine = new QueueEngine(['e2e5', ...FOOLS_MATE]);

    const summary = await runner({ CONTINUOUS_PLAY: 'true', MAX_GAMES: '2' }, client, engine).run();

    const [first, second] = summary.games;
    expect(first?.state).toBe('aborted');
    expect(first?.reason).toMatch(/^IllegalMove: move e2e5 is illegal/);
    expect(first?.screenshot).toBe('/tmp/screenshots/game-1.png');
    expect(second?.state).toBe('terminal');
    expect(second?.moves).toBe(4);
    expect(client.captured).toEqual(['game-1']);
    expect(summary.exitCode).toBe(0);
  });

  it('reports a board that could not be set up', async () => {
    const client = new FakeClient([new BrowserSetupError('board not found')]);
    const engine = new QueueEngine([...FOOLS_MATE]);

    const summary = await runner({}, client, engine).run();

    expect(summary).toEqual({
      games: [
        { game: 1, state: 'aborted', reason: 'BrowserSetupError: board not found', moves: 0, logPath: null, screenshot: null },
      ],
      exitCode: 1,
    });
  });

  it('restarts the engine after it fails mid-game', async () => {
    const client = new FakeClient();
    const engine = new QueueEngine(['e2e4']);

    const summary = await runner({}, client, engine).run();

    expect(summary.games[0]?.reason).toBe('EngineUnavailable: engine at fake-engine is unavailable: script exhausted');
    expect(summary.exitCode).toBe(1);
    // once after the failure, once on shutdown
    expect(engine.terminations).toBe(2);
  });

  it('throws when the engine cannot start', async () => {
    const client = new FakeClient();
    const engine = new QueueEngine([], new EngineUnavailableError('/opt/engines/fakefish', 'no such file'));

    await expect(runner({}, client, engine).run()).rejects.toBeInstanceOf(EngineUnavailableError);
    expect(client.newGames).toBe(0);
    expect(client.closes).toBe(1);
  });

  it('stops after the current game when asked', async () => {
    const controller = new AbortController();
    const client = new FakeClient();
    const engine = new QueueEngine([...FOOLS_MATE, ...FOOLS_MATE]);
    const bot = runner({ CONTINUOUS_PLAY: 'true' }, client, engine, () => controller.abort());

    const summary = await bot.run(controller.signal);

    expect(summary.games).toHaveLength(1);
    expect(bot.status()).toMatchObject({ running: false, game: 1, state: null });
  });

  it('keeps the last session after the run ends', async () => {
    const bot = runner({}, new FakeClient(), new QueueEngine([...FOOLS_MATE]));
    expect(bot.status().session).toBeNull();

    await bot.run();

    const session = bot.status().session;
    expect(session?.moves.map((m) => m.notation)).toEqual(['f3', 'e5', 'g4', 'Qh4#']);
    expect(session?.mode).toBe('single');
  });
});

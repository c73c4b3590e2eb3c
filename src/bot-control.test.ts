import { describe, expect, it, vi } from 'vitest';
import { BotControl } from './bot-control.js';
import { resolveConfig } from './config.js';
import { EngineUnavailableError } from './errors.js';
import { silentLogger } from './logger.js';
import { BotRunner } from './runner.js';
import { FOOLS_MATE, FakeClient, QueueEngine } from './testing/fakes.js';

function runner(engine: QueueEngine, client: FakeClient, env: Record<string, string> = {}) {
  const config = resolveConfig({
    ENGINE_PATH: '/opt/engines/fakefish',
    LOG_MOVES: 'false',
    MOVE_DELAY_MIN_MS: '0',
    MOVE_DELAY_MAX_MS: '0',
    BOT_LOG_FILE: '',
    ...env,
  });
  return new BotRunner(config, {
    client,
    engine,
    logger: silentLogger,
    betweenGamesMs: 10_000,
    moveDelay: async () => {},
  });
}

describe('BotControl', () => {
  it('reports nothing before a game is started', () => {
    const control = new BotControl(silentLogger);
    expect(control.status()).toEqual({
      started: false,
      running: false,
      game: 0,
      state: null,
      session: null,
      completed: [],
      exitCode: null,
      error: null,
    });
    expect(control.stop()).toBe(false);
  });

  it('keeps the finished game readable', async () => {
    const control = new BotControl(silentLogger);
    control.start(runner(new QueueEngine([...FOOLS_MATE]), new FakeClient()));
    await vi.waitFor(() => expect(control.running).toBe(false));
    await control.shutdown();

    const status = control.status();
    expect(status.running).toBe(false);
    expect(status.exitCode).toBe(0);
    expect(status.session?.moves.map((m) => m.uci)).toEqual(FOOLS_MATE);
  });

  it('resolves shutdown only after the run has cleaned up', async () => {
    const client = new FakeClient();
    const engine = new QueueEngine([...FOOLS_MATE, ...FOOLS_MATE]);
    const control = new BotControl(silentLogger);
    control.start(runner(engine, client, { CONTINUOUS_PLAY: 'true' }));
    // The runner now waits out the ten-second pause before the next game.
    await vi.waitFor(() => expect(control.status().completed).toHaveLength(1));

    await control.shutdown();

    expect(control.running).toBe(false);
    expect(client.closes).toBe(1);
    expect(engine.terminations).toBe(1);
    expect(control.status().completed).toHaveLength(1);
  });

  it('records a run that could not start', async () => {
    const control = new BotControl(silentLogger);
    const engine = new QueueEngine([], new EngineUnavailableError('/opt/engines/fakefish', 'no such file'));
    control.start(runner(engine, new FakeClient()));
    await control.shutdown();

    expect(control.status().error).toBe(
      'EngineUnavailable: engine at /opt/engines/fakefish is unavailable: no such file',
    );
    expect(control.status().exitCode).toBeNull();
  });

  it('refuses a second start while running', () => {
    const control = new BotControl(silentLogger);
    control.start(runner(new QueueEngine([...FOOLS_MATE]), new FakeClient()));
    expect(() => control.start(runner(new QueueEngine([]), new FakeClient()))).toThrow(
      'a game is already running; call chess_stop first',
    );
    return control.shutdown();
  });
});

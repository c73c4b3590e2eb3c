#!/usr/bin/env node

/**
 * board-pilot CLI.
 *
 * Usage:
 *   board-pilot play --engine /usr/bin/stockfish --max-moves 40
 *   board-pilot play --continuous --max-games 3 --headless
 *   board-pilot verify-log chess_moves_20250101_120000.json
 *
 * Options not given on the command line come from the environment or a
 * `.env` file in the working directory (see .env.example).
 */

import { Command } from 'commander';
import { BoardTracker } from './board/board-tracker.js';
import { PlaywrightBoardClient } from './browser/board-client.js';
import { loadConfig, redactConfig, type CliOverrides } from './config.js';
import { describeError } from './errors.js';
import { configureLogging, createLogger } from './logger.js';
import { loadMoveLog } from './move-log.js';
import { BotRunner } from './runner.js';

const log = createLogger();

async function play(flags: CliOverrides): Promise<number> {
  const config = loadConfig(flags);
  configureLogging({ level: config.logLevel, file: config.logFile });
  log.debug(`config: ${JSON.stringify(redactConfig(config))}`);

  const controller = new AbortController();
  const stop = (signal: string) => {
    if (controller.signal.aborted) {
      log.warn(`${signal} again, exiting immediately`);
      process.exit(130);
    }
    log.info(`${signal} received, finishing the current move`);
    controller.abort();
  };
  process.on('SIGINT', () => stop('SIGINT'));
  process.on('SIGTERM', () => stop('SIGTERM'));

  const runner = new BotRunner(config, {
    client: new PlaywrightBoardClient(config, log),
    logger: log,
  });
  const summary = await runner.run(controller.signal);

  for (const game of summary.games) {
    log.info(
      `game ${game.game}: ${game.state} (${game.reason}), ${game.moves} moves` +
        (game.logPath ? `, log ${game.logPath}` : ''),
    );
  }
  log.info('chess bot session ended');
  return summary.exitCode;
}

function verifyLog(file: string): number {
  const records = loadMoveLog(file);
  const tracker = new BoardTracker();
  const position = tracker.replay(records.map((r) => r.uci));

  const history = tracker.history();
  const i = records.findIndex((r, idx) => history[idx] !== r.notation);
  const mismatch = records[i];
  if (mismatch) {
    log.error(`record #${i + 1} says ${mismatch.notation}, replay gives ${history[i]}`);
    return 1;
  }

  console.log(`${records.length} moves: ${history.join(' ')}`);
  console.log(`final position: ${position.fen}`);
  console.log(`status: ${tracker.describeEnd()} (${tracker.result()})`);
  return 0;
}

const program = new Command();
program
  .name('board-pilot')
  .description('Plays engine moves on a web chess analysis board')
  .version('0.1.0');

program
  .command('play', { isDefault: true })
  .description('log in, open an analysis board and play engine moves on it')
  .option('-e, --engine <path>', 'UCI engine binary (ENGINE_PATH)')
  .option('-u, --username <name>', 'site username (CHESS_USERNAME); password comes from CHESS_PASSWORD')
  .option('--headless', 'run Chrome without a window')
  .option('--no-log-moves', 'do not write the move log file')
  .option('-m, --max-moves <n>', 'stop after this many moves')
  .option('-c, --continuous', 'start a new game after each one ends')
  .option('--max-games <n>', 'with --continuous, stop after this many games')
  .option('--site <url>', 'chess site base URL')
  .option('--move-time <ms>', 'engine think time per move')
  .option('--skill <level>', 'engine skill level 0-20')
  .option('--strategies <list>', 'move strategies in order, e.g. drag,inject,keyboard')
  .option('--log-dir <dir>', 'where move logs and screenshots go')
  .option('-v, --verbose', 'debug logging')
  .action(async (opts: CliOverrides, command: Command) => {
    // Commander defaults negated flags to true; only pass it on when given.
    const flags: CliOverrides = { ...opts };
    if (command.getOptionValueSource('logMoves') !== 'cli') delete flags.logMoves;
    process.exitCode = await play(flags);
  });

program
  .command('verify-log <file>')
  .description('replay a saved move log from the starting position and print the result')
  .action((file: string) => {
    process.exitCode = verifyLog(file);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  log.error(describeError(err));
  process.exitCode = 1;
});

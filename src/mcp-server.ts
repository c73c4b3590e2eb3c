#!/usr/bin/env node

/**
 * MCP server for driving the bot from an agent.
 *
 * One BotRunner at a time runs in the background through BotControl;
 * `chess_start_game` starts it and the other tools report on it or stop it. stdout carries
 * the MCP transport, so all logging goes to stderr.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { PlaywrightBoardClient } from './browser/board-client.js';
import { loadConfig, type CliOverrides } from './config.js';
import { BotControl } from './bot-control.js';
import { describeError } from './errors.js';
import { configureLogging, createLogger } from './logger.js';
import { BotRunner } from './runner.js';

const log = createLogger('board-pilot-mcp');
const control = new BotControl(log);

// ---------- Helper ----------

function json(obj: Record<string, unknown>, isError = false) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(obj, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

async function safeTool(fn: () => Promise<Record<string, unknown>>) {
  try {
    return json(await fn());
  } catch (err) {
    return json({ success: false, error: describeError(err) }, true);
  }
}

// ---------- MCP Server ----------

const server = new McpServer({ name: 'board-pilot', version: '0.1.0' });

server.registerTool(
  'chess_start_game',
  {
    description:
      'Start playing engine moves on the analysis board in the background. Configuration comes from the environment / .env; the arguments override it. Use chess_status to follow progress.',
    inputSchema: {
      maxMoves: z.number().int().positive().optional().describe('Stop after this many moves'),
      continuous: z.boolean().optional().describe('Start a new game after each one ends'),
      maxGames: z.number().int().positive().optional().describe('With continuous, stop after this many games'),
      headless: z.boolean().optional().describe('Run Chrome without a window'),
    },
  },
  async ({ maxMoves, continuous, maxGames, headless }) =>
    safeTool(async () => {
      if (control.running) {
        throw new Error('a game is already running; call chess_stop first');
      }

      const flags: CliOverrides = {
        maxMoves: maxMoves?.toString(),
        continuous,
        maxGames: maxGames?.toString(),
        headless,
      };
      const config = loadConfig(flags);
      configureLogging({ level: config.logLevel, file: config.logFile });

      control.start(
        new BotRunner(config, {
          client: new PlaywrightBoardClient(config, log),
          logger: log,
        }),
      );

      return {
        success: true,
        message: 'game started',
        maxMoves: config.maxMoves,
        continuous: config.continuousPlay,
      };
    }),
);

server.registerTool(
  'chess_status',
  {
    description: 'Report whether a game is running, its state, moves so far and finished games.',
    inputSchema: {},
  },
  async () =>
    safeTool(async () => {
      const status = control.status();
      if (!status.started) return { success: true, running: false, message: 'no game started yet' };
      return {
        success: true,
        running: status.running,
        game: status.game,
        state: status.state,
        moves: status.session?.moves.map((m) => `${m.sequenceNumber}. ${m.notation}`) ?? [],
        completed: status.completed,
        exitCode: status.exitCode,
        error: status.error,
      };
    }),
);

server.registerTool(
  'chess_stop',
  {
    description:
      'Ask the running game to stop. The current move finishes first, then the move log is saved and the browser closed.',
    inputSchema: {},
  },
  async () =>
    safeTool(async () => {
      return control.stop()
        ? { success: true, message: 'stop requested' }
        : { success: true, message: 'nothing is running' };
    }),
);

server.registerTool(
  'chess_move_log',
  {
    description: 'Return the move records of the current (or last) game.',
    inputSchema: {},
  },
  async () =>
    safeTool(async () => {
      const session = control.status().session;
      if (!session) return { success: true, moves: [] };
      return { success: true, sessionId: session.id, startTime: session.startTime, moves: session.moves };
    }),
);

// ---------- Start ----------

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info('MCP server ready on stdio');
}

main().catch((err) => {
  console.error('MCP server failed to start:', err);
  process.exit(1);
});

// The stdio transport keeps the process alive, so exit once the game has
// stopped and the browser is closed.
function shutdown() {
  void control.shutdown().then(() => process.exit(0));
}
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

/**
 * Bot configuration.
 *
 * Built once at startup from defaults, the `.env` file, the process
 * environment and CLI flags (in increasing precedence), validated with zod
 * and frozen. The result is passed explicitly to the runner and game loop.
 */

import { existsSync } from 'fs';
import { resolve } from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { STRATEGY_NAMES, type StrategyName } from './types.js';

const booleanish = z
  .union([z.boolean(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === 'boolean') return value;
    const v = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(v)) return true;
    if (['false', '0', 'no', 'off', ''].includes(v)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
    return z.NEVER;
  });

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const strategyList = z
  .union([z.array(z.string()), z.string()])
  .transform((value) =>
    (Array.isArray(value) ? value : value.split(','))
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
  )
  .pipe(z.array(z.enum(STRATEGY_NAMES)).min(1))
  .refine((list) => new Set(list).size === list.length, 'strategies must not repeat');

export const configSchema = z
  .object({
    enginePath: z.string({ required_error: 'engine path is required (ENGINE_PATH or --engine)' }).min(1),
    username: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
    headless: booleanish.default(false),
    logMoves: booleanish.default(true),
    maxMoves: positiveInt.default(100),
    continuousPlay: booleanish.default(false),
    maxGames: positiveInt.optional(),
    siteUrl: z.string().url().default('https://www.chess.com'),
    moveTimeMs: positiveInt.default(2000),
    engineTimeoutMs: positiveInt.optional(),
    skillLevel: z.coerce.number().int().min(0).max(20).default(15),
    threads: positiveInt.default(1),
    hashMb: positiveInt.default(16),
    strategyTimeoutMs: positiveInt.default(3000),
    strategies: strategyList.default('drag,inject,keyboard'),
    moveDelayMinMs: nonNegativeInt.default(2000),
    moveDelayMaxMs: nonNegativeInt.default(4000),
    logDir: z.string().min(1).default('.'),
    logFile: z.string().optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    chromePath: z.string().min(1).optional(),
    cdpUrl: z.string().url().optional(),
    selectorsFile: z.string().min(1).optional(),
  })
  .refine((c) => c.moveDelayMaxMs >= c.moveDelayMinMs, {
    message: 'moveDelayMaxMs must be >= moveDelayMinMs',
    path: ['moveDelayMaxMs'],
  })
  .transform((c) => ({
    ...c,
    engineTimeoutMs: c.engineTimeoutMs ?? c.moveTimeMs + 5000,
    logDir: resolve(c.logDir),
    // An empty BOT_LOG_FILE turns file logging off.
    logFile: c.logFile === undefined ? 'chess_bot.log' : c.logFile || undefined,
  }));

export type BotConfig = Readonly<Omit<z.output<typeof configSchema>, 'strategies'>> & {
  readonly strategies: readonly StrategyName[];
};

/** Flags accepted from the command line; undefined means "not given". */
export interface CliOverrides {
  engine?: string;
  username?: string;
  headless?: boolean;
  logMoves?: boolean;
  maxMoves?: string;
  continuous?: boolean;
  maxGames?: string;
  site?: string;
  moveTime?: string;
  skill?: string;
  strategies?: string;
  logDir?: string;
  verbose?: boolean;
}

const ENV_KEYS: Record<string, string> = {
  enginePath: 'ENGINE_PATH',
  username: 'CHESS_USERNAME',
  password: 'CHESS_PASSWORD',
  headless: 'HEADLESS',
  logMoves: 'LOG_MOVES',
  maxMoves: 'MAX_MOVES',
  continuousPlay: 'CONTINUOUS_PLAY',
  maxGames: 'MAX_GAMES',
  siteUrl: 'CHESS_SITE_URL',
  moveTimeMs: 'ENGINE_MOVE_TIME_MS',
  engineTimeoutMs: 'ENGINE_TIMEOUT_MS',
  skillLevel: 'ENGINE_SKILL_LEVEL',
  threads: 'ENGINE_THREADS',
  hashMb: 'ENGINE_HASH_MB',
  strategyTimeoutMs: 'STRATEGY_TIMEOUT_MS',
  strategies: 'MOVE_STRATEGIES',
  moveDelayMinMs: 'MOVE_DELAY_MIN_MS',
  moveDelayMaxMs: 'MOVE_DELAY_MAX_MS',
  logDir: 'MOVE_LOG_DIR',
  logFile: 'BOT_LOG_FILE',
  logLevel: 'LOG_LEVEL',
  chromePath: 'CHROME_PATH',
  cdpUrl: 'CDP_URL',
  selectorsFile: 'SELECTORS_FILE',
};

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const raw: Record<string, unknown> = {};
  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName];
    // Blank optional vars in .env mean "unset", except for BOT_LOG_FILE.
    if (value === undefined || (value === '' && key !== 'logFile')) continue;
    raw[key] = value;
  }
  return raw;
}

function fromFlags(flags: CliOverrides): Record<string, unknown> {
  const mapped: Record<string, unknown> = {
    enginePath: flags.engine,
    username: flags.username,
    headless: flags.headless,
    logMoves: flags.logMoves,
    maxMoves: flags.maxMoves,
    continuousPlay: flags.continuous,
    maxGames: flags.maxGames,
    siteUrl: flags.site,
    moveTimeMs: flags.moveTime,
    skillLevel: flags.skill,
    strategies: flags.strategies,
    logDir: flags.logDir,
    logLevel: flags.verbose ? 'debug' : undefined,
  };
  return Object.fromEntries(Object.entries(mapped).filter(([, v]) => v !== undefined));
}

/**
 * Pure resolution step: merges env and flags and validates the result.
 */
export function resolveConfig(env: NodeJS.ProcessEnv, flags: CliOverrides = {}): BotConfig {
  const parsed = configSchema.safeParse({ ...fromEnv(env), ...fromFlags(flags) });
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const field = issue.path.join('.') || 'config';
        return `${field}: ${issue.message}`;
      }),
    );
  }
  return Object.freeze({ ...parsed.data, strategies: Object.freeze([...parsed.data.strategies]) });
}

/**
 * Loads `.env` from `cwd` (without overriding variables already set) and
 * resolves the configuration.
 */
export function loadConfig(flags: CliOverrides = {}, cwd = process.cwd()): BotConfig {
  const envFile = resolve(cwd, '.env');
  if (existsSync(envFile)) {
    dotenv.config({ path: envFile });
  }
  return resolveConfig(process.env, flags);
}

/** Config for display: secrets masked. */
export function redactConfig(config: BotConfig): Record<string, unknown> {
  return { ...config, password: config.password ? '********' : undefined };
}

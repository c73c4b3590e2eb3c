/**
 * Error taxonomy shared by the engine adapter, board tracker, move executor,
 * move log and game loop.
 *
 * Every error carries a `kind` so callers can switch on it without
 * `instanceof` chains, and `describeError` renders the user-visible line.
 */

export type BotErrorKind =
  | 'EngineUnavailable'
  | 'IllegalMove'
  | 'ExecutionFailed'
  | 'StorageWriteError'
  | 'ConfigError'
  | 'BrowserSetupError';

export abstract class BotError extends Error {
  abstract readonly kind: BotErrorKind;
  /** Fatal errors end the current game session. */
  abstract readonly fatal: boolean;
}

export class EngineUnavailableError extends BotError {
  readonly kind = 'EngineUnavailable' as const;
  readonly fatal = true;

  constructor(
    readonly enginePath: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`engine at ${enginePath} is unavailable: ${detail}`, options);
    this.name = 'EngineUnavailableError';
  }
}

export class IllegalMoveError extends BotError {
  readonly kind = 'IllegalMove' as const;
  readonly fatal = true;

  constructor(
    readonly move: string,
    readonly fen: string,
    options?: { cause?: unknown },
  ) {
    super(`move ${move} is illegal in position ${fen}`, options);
    this.name = 'IllegalMoveError';
  }
}

export interface StrategyFailure {
  strategy: string;
  reason: string;
}

export class ExecutionFailedError extends BotError {
  readonly kind = 'ExecutionFailed' as const;
  readonly fatal = true;

  constructor(
    readonly move: string,
    readonly failures: readonly StrategyFailure[],
  ) {
    const summary = failures.map((f) => `${f.strategy}: ${f.reason}`).join('; ');
    super(`no strategy could play ${move} (${summary || 'no strategies configured'})`);
    this.name = 'ExecutionFailedError';
  }
}

export class StorageWriteError extends BotError {
  readonly kind = 'StorageWriteError' as const;
  readonly fatal = false;

  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    const reason =
      options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? 'unknown');
    super(`could not write ${path}: ${reason}`, options);
    this.name = 'StorageWriteError';
  }
}

export class ConfigError extends BotError {
  readonly kind = 'ConfigError' as const;
  readonly fatal = true;

  constructor(readonly issues: readonly string[]) {
    super(`invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export class BrowserSetupError extends BotError {
  readonly kind = 'BrowserSetupError' as const;
  readonly fatal = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BrowserSetupError';
  }
}

export function isBotError(err: unknown): err is BotError {
  return err instanceof BotError;
}

/**
 * Human-readable single line naming the failure kind.
 */
export function describeError(err: unknown): string {
  if (isBotError(err)) {
    return `${err.kind}: ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}

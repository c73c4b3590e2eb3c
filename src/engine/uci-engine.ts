import { spawn } from 'child_process';
import { existsSync } from 'fs';
import { createInterface, type Interface } from 'readline';
import type { Readable, Writable } from 'stream';
import { EngineUnavailableError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { ChessEngine, EngineMoveOptions, EngineSkillOptions } from './chess-engine.js';

/** The slice of ChildProcess the adapter talks to. */
export interface EngineProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'exit', listener: (code: number | null) => void): this;
  once(event: 'error', listener: (err: Error) => void): this;
}

export type EngineProcessFactory = (enginePath: string) => EngineProcess;

export type UciEngineOptions = EngineSkillOptions & {
  enginePath: string;
  /** Upper bound for any single wait on the engine (handshake or search). */
  timeoutMs: number;
  logger?: Logger;
  spawnProcess?: EngineProcessFactory;
  /** Skip the on-disk check; used with injected processes. */
  skipPathCheck?: boolean;
};

type PendingWait = {
  label: string;
  match: (line: string) => boolean;
  resolve: (line: string) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
};

const defaultSpawn: EngineProcessFactory = (enginePath) =>
  spawn(enginePath, [], { stdio: 'pipe' });

/**
 * Adapter for any UCI engine binary (Stockfish and friends) run as a child
 * process. One request at a time; every wait is bounded by `timeoutMs`.
 */
export class UciEngine implements ChessEngine {
  readonly name: string;
  private readonly opts: UciEngineOptions;
  private readonly log: Logger;
  private proc: EngineProcess | null = null;
  private lines: Interface | null = null;
  private pending: PendingWait | null = null;
  private exited: string | null = null;
  private ready = false;

  constructor(opts: UciEngineOptions) {
    this.opts = opts;
    this.name = opts.enginePath;
    this.log = (opts.logger ?? silentLogger).child('engine');
  }

  get enginePath(): string {
    return this.opts.enginePath;
  }

  async init(): Promise<void> {
    if (this.ready) return;

    const { enginePath } = this.opts;
    if (!this.opts.skipPathCheck && !existsSync(enginePath)) {
      throw new EngineUnavailableError(enginePath, 'no such file');
    }

    let proc: EngineProcess;
    try {
      proc = (this.opts.spawnProcess ?? defaultSpawn)(enginePath);
    } catch (err) {
      throw new EngineUnavailableError(enginePath, 'failed to start', { cause: err });
    }
    this.proc = proc;
    this.exited = null;

    // Listeners ignore a process that has since been replaced or terminated.
    proc.once('error', (err) => {
      if (proc === this.proc) this.handleExit(`process error: ${err.message}`);
    });
    proc.once('exit', (code) => {
      if (proc === this.proc) this.handleExit(`process exited with code ${code ?? 'null'}`);
    });
    proc.stdin.on('error', (err) => this.log.debug(`stdin error: ${err.message}`));

    this.lines = createInterface({ input: proc.stdout, terminal: false });
    this.lines.on('line', (line) => this.handleLine(line.trim()));

    try {
      await this.request('uci', 'uci handshake', (line) => line === 'uciok');

      const { skillLevel, threads, hashMb } = this.opts;
      if (skillLevel !== undefined) this.send(`setoption name Skill Level value ${skillLevel}`);
      if (threads !== undefined) this.send(`setoption name Threads value ${threads}`);
      if (hashMb !== undefined) this.send(`setoption name Hash value ${hashMb}`);

      await this.request('isready', 'isready', (line) => line === 'readyok');
    } catch (err) {
      await this.terminate();
      throw err;
    }
    this.ready = true;
    this.log.info(`engine ready (${enginePath})`);
  }

  async bestMove(fen: string, opts: EngineMoveOptions): Promise<string> {
    if (!this.ready || !this.proc) {
      throw new EngineUnavailableError(this.opts.enginePath, 'engine not initialized');
    }
    if (this.pending) {
      throw new Error('Engine is busy');
    }

    let line: string;
    try {
      this.send(`position fen ${fen}`);
      line = await this.request(`go movetime ${opts.moveTimeMs}`, 'best move search', (l) =>
        l.startsWith('bestmove'),
      );
    } catch (err) {
      // A search that never answered leaves the engine in an unknown state.
      await this.terminate();
      throw err;
    }

    const move = line.split(/\s+/)[1] ?? '';
    if (!move || move === '(none)' || move === '0000') {
      throw new EngineUnavailableError(this.opts.enginePath, `returned no move for ${fen}`);
    }
    this.log.debug(`bestmove ${move} for ${fen}`);
    return move;
  }

  async terminate(): Promise<void> {
    const proc = this.proc;
    this.ready = false;
    this.proc = null;
    this.failPending('engine terminated');
    this.lines?.close();
    this.lines = null;
    if (!proc || this.exited) return;
    try {
      proc.stdin.write('quit\n');
      proc.stdin.end();
    } finally {
      proc.kill();
    }
  }

  private send(command: string): void {
    if (!this.proc || this.exited) {
      throw new EngineUnavailableError(this.opts.enginePath, this.exited ?? 'engine not running');
    }
    this.log.debug(`> ${command}`);
    this.proc.stdin.write(`${command}\n`);
  }

  /**
   * Sends `command` and resolves with the first output line accepted by
   * `match`, or rejects once `timeoutMs` passes.
   */
  private request(command: string, label: string, match: (line: string) => boolean): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      if (this.exited) {
        reject(new EngineUnavailableError(this.opts.enginePath, this.exited));
        return;
      }
      const timer = setTimeout(() => {
        this.pending = null;
        reject(
          new EngineUnavailableError(
            this.opts.enginePath,
            `${label} got no answer within ${this.opts.timeoutMs}ms`,
          ),
        );
      }, this.opts.timeoutMs);
      this.pending = { label, match, resolve, reject, timer };
      try {
        this.send(command);
      } catch (err) {
        clearTimeout(timer);
        this.pending = null;
        reject(err);
      }
    });
  }

  private handleLine(line: string): void {
    if (!line) return;
    this.log.debug(`< ${line}`);
    const pending = this.pending;
    if (pending && pending.match(line)) {
      clearTimeout(pending.timer);
      this.pending = null;
      pending.resolve(line);
    }
  }

  private handleExit(reason: string): void {
    if (this.exited) return;
    this.exited = reason;
    this.ready = false;
    this.log.warn(`engine stopped: ${reason}`);
    this.failPending(reason);
  }

  private failPending(reason: string): void {
    const pending = this.pending;
    if (!pending) return;
    clearTimeout(pending.timer);
    this.pending = null;
    pending.reject(new EngineUnavailableError(this.opts.enginePath, `${pending.label}: ${reason}`));
  }
}

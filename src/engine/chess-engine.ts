export type EngineSkillOptions = {
  skillLevel?: number;
  threads?: number;
  hashMb?: number;
};

export type EngineMoveOptions = {
  moveTimeMs: number;
};

/**
 * Opaque move oracle: position in, move out.
 *
 * `bestMove` returns a long-algebraic move ("e2e4", "e7e8q") or rejects with
 * EngineUnavailableError.
 */
export interface ChessEngine {
  readonly name: string;
  init(): Promise<void>;
  bestMove(fen: string, opts: EngineMoveOptions): Promise<string>;
  terminate(): Promise<void>;
}

export type Color = 'w' | 'b';
export type Side = 'white' | 'black';

export type File = 'a' | 'b' | 'c' | 'd' | 'e' | 'f' | 'g' | 'h';
export type Rank = '1' | '2' | '3' | '4' | '5' | '6' | '7' | '8';
export type Square = `${File}${Rank}`;

export const STRATEGY_NAMES = ['drag', 'inject', 'keyboard'] as const;
export type StrategyName = (typeof STRATEGY_NAMES)[number];

export type GameMode = 'single' | 'continuous';

/** A move the tracker has already validated against the current position. */
export interface PlannedMove {
  uci: string;
  san: string;
  from: Square;
  to: Square;
  promotion?: string;
  side: Side;
}

export interface MoveRecord {
  sequenceNumber: number;
  side: Side;
  /** Standard algebraic notation, e.g. "Nf3". */
  notation: string;
  uci: string;
  from: Square;
  to: Square;
  /** ISO-8601 */
  timestamp: string;
  executionStrategy: StrategyName;
}

export interface GameSession {
  id: string;
  startTime: string;
  username: string | null;
  mode: GameMode;
  maxMoves: number;
  moves: readonly MoveRecord[];
}

export interface BoardPosition {
  fen: string;
  turn: Color;
  moveNumber: number;
  plies: number;
}

export function colorToSide(color: Color): Side {
  return color === 'w' ? 'white' : 'black';
}

export function isSquare(value: string): value is Square {
  return /^[a-h][1-8]$/.test(value);
}

import { Chess, type Move } from 'chess.js';
import { IllegalMoveError } from '../errors.js';
import { colorToSide, isSquare, type BoardPosition, type PlannedMove, type Square } from '../types.js';

export const START_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

export type GameStatus = 'ongoing' | 'checkmate' | 'stalemate' | 'draw';
export type GameResult = '1-0' | '0-1' | '1/2-1/2' | '*';

type UciParts = { from: Square; to: Square; promotion?: string };

export function parseUci(uci: string): UciParts | null {
  const match = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/.exec(uci.trim().toLowerCase());
  if (!match) return null;
  const [, from, to, promotion] = match;
  if (!from || !to || !isSquare(from) || !isSquare(to)) return null;
  return promotion ? { from, to, promotion } : { from, to };
}

function toPlannedMove(move: Move): PlannedMove {
  const from = move.from;
  const to = move.to;
  if (!isSquare(from) || !isSquare(to)) {
    throw new Error(`unexpected square in move ${move.san}`);
  }
  const base: PlannedMove = {
    uci: `${from}${to}${move.promotion ?? ''}`,
    san: move.san,
    from,
    to,
    side: colorToSide(move.color),
  };
  return move.promotion ? { ...base, promotion: move.promotion } : base;
}

/**
 * Authoritative position for the current game. Every move goes through
 * chess.js, so the tracked position is always reachable from the starting
 * position by the recorded move list.
 */
export class BoardTracker {
  private chess: Chess;
  private readonly startFen: string;

  constructor(startFen: string = START_FEN) {
    this.startFen = startFen;
    this.chess = new Chess(startFen);
  }

  position(): BoardPosition {
    return {
      fen: this.chess.fen(),
      turn: this.chess.turn(),
      moveNumber: this.chess.moveNumber(),
      plies: this.chess.history().length,
    };
  }

  /** SAN history from the starting position. */
  history(): string[] {
    return this.chess.history();
  }

  /**
   * Validates `uci` against the current position without applying it.
   */
  plan(uci: string): PlannedMove {
    const scratch = new Chess(this.chess.fen());
    return toPlannedMove(this.play(scratch, uci));
  }

  apply(uci: string): BoardPosition {
    this.play(this.chess, uci);
    return this.position();
  }

  status(): GameStatus {
    if (this.chess.isCheckmate()) return 'checkmate';
    if (this.chess.isStalemate()) return 'stalemate';
    if (this.chess.isDraw()) return 'draw';
    return 'ongoing';
  }

  isTerminal(): boolean {
    return this.status() !== 'ongoing';
  }

  result(): GameResult {
    switch (this.status()) {
      case 'checkmate':
        return this.chess.turn() === 'w' ? '0-1' : '1-0';
      case 'stalemate':
      case 'draw':
        return '1/2-1/2';
      default:
        return '*';
    }
  }

  /** Describes why a terminal position ended the game. */
  describeEnd(): string {
    if (this.chess.isCheckmate()) {
      return `checkmate, ${this.chess.turn() === 'w' ? 'black' : 'white'} wins`;
    }
    if (this.chess.isStalemate()) return 'stalemate';
    if (this.chess.isThreefoldRepetition()) return 'draw by threefold repetition';
    if (this.chess.isInsufficientMaterial()) return 'draw by insufficient material';
    if (this.chess.isDraw()) return 'draw by fifty-move rule';
    return 'game in progress';
  }

  reset(): void {
    this.chess = new Chess(this.startFen);
  }

  /**
   * Rebuilds the position from the start by applying `moves` in order.
   * Leaves the tracker untouched if any move is illegal.
   */
  replay(moves: readonly string[]): BoardPosition {
    const next = new Chess(this.startFen);
    for (const uci of moves) {
      this.play(next, uci);
    }
    this.chess = next;
    return this.position();
  }

  private play(chess: Chess, uci: string): Move {
    const parts = parseUci(uci);
    if (!parts) {
      throw new IllegalMoveError(uci, chess.fen());
    }
    try {
      return chess.move(parts);
    } catch (err) {
      throw new IllegalMoveError(uci, chess.fen(), { cause: err });
    }
  }
}

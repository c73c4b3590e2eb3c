import type { PlannedMove, Side, Square } from '../types.js';

export interface Point {
  x: number;
  y: number;
}

export interface BoardBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Which side is drawn at the bottom of the board. */
export type Orientation = Side;

/**
 * The live board as the move strategies see it. The Playwright
 * implementation lives in browser/board-page.ts; tests use in-memory fakes.
 */
export interface BoardSurface {
  /** Opaque value that changes whenever the displayed position changes. */
  signature(): Promise<string>;
  boardBox(): Promise<BoardBox | null>;
  orientation(): Promise<Orientation>;
  /** Press at `from`, move to `to` in small steps, release. Finishes within `timeoutMs`. */
  drag(from: Point, to: Point, timeoutMs: number): Promise<void>;
  /** Hands the move to the page's own move-input hook. False if nothing took it. */
  injectMove(move: PlannedMove): Promise<boolean>;
  /** Focuses the board and types `text` followed by Enter. Finishes within `timeoutMs`. */
  typeMove(text: string, timeoutMs: number): Promise<void>;
}

/**
 * Viewport coordinates of the centre of `square`.
 */
export function squareCenter(square: Square, box: BoardBox, orientation: Orientation): Point {
  const file = square.charCodeAt(0) - 'a'.charCodeAt(0);
  const rank = Number(square[1]) - 1;
  const size = { w: box.width / 8, h: box.height / 8 };

  const col = orientation === 'white' ? file : 7 - file;
  const row = orientation === 'white' ? 7 - rank : rank;

  return {
    x: box.x + col * size.w + size.w / 2,
    y: box.y + row * size.h + size.h / 2,
  };
}

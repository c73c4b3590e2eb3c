import type { PlannedMove, StrategyName } from '../types.js';
import { squareCenter, type BoardSurface } from './board-surface.js';

/**
 * One way of getting a move onto the live board. `attempt` resolves once
 * the interaction has been performed and throws when it could not be; the
 * executor decides success by watching the board signature. `budgetMs` is
 * what is left of the strategy's deadline.
 */
export interface MoveStrategy {
  readonly name: StrategyName;
  attempt(move: PlannedMove, surface: BoardSurface, budgetMs: number): Promise<void>;
}

export const dragStrategy: MoveStrategy = {
  name: 'drag',
  async attempt(move, surface, budgetMs) {
    const box = await surface.boardBox();
    if (!box || box.width === 0 || box.height === 0) {
      throw new Error('board element not found or not visible');
    }
    const orientation = await surface.orientation();
    await surface.drag(
      squareCenter(move.from, box, orientation),
      squareCenter(move.to, box, orientation),
      budgetMs,
    );
  },
};

export const injectStrategy: MoveStrategy = {
  name: 'inject',
  async attempt(move, surface) {
    const accepted = await surface.injectMove(move);
    if (!accepted) {
      throw new Error('no move-input hook accepted the move');
    }
  },
};

export const keyboardStrategy: MoveStrategy = {
  name: 'keyboard',
  async attempt(move, surface, budgetMs) {
    await surface.typeMove(move.uci, budgetMs);
  },
};

const BY_NAME: Record<StrategyName, MoveStrategy> = {
  drag: dragStrategy,
  inject: injectStrategy,
  keyboard: keyboardStrategy,
};

export function strategiesFor(names: readonly StrategyName[]): MoveStrategy[] {
  return names.map((name) => BY_NAME[name]);
}

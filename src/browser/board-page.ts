import type { Page } from 'playwright-core';
import type { BoardBox, BoardSurface, Orientation, Point } from '../executor/board-surface.js';
import type { PlannedMove } from '../types.js';
import type { SiteSelectors } from './selectors.js';

type InjectArgs = {
  boardSelector: string;
  from: string;
  to: string;
  promotion: string | null;
};

/**
 * BoardSurface over a live Playwright page.
 */
export class PlaywrightBoardSurface implements BoardSurface {
  constructor(
    private readonly page: Page,
    private readonly boardSelector: string,
    private readonly selectors: SiteSelectors['board'],
  ) {}

  private get board() {
    return this.page.locator(this.boardSelector).first();
  }

  /**
   * Piece classes and transforms inside the board, sorted. Any move changes
   * at least one of them.
   */
  async signature(): Promise<string> {
    return this.page.evaluate(
      ({ boardSelector, pieces }) => {
        const board = document.querySelector(boardSelector);
        if (!board) return '';
        return Array.from(board.querySelectorAll(pieces))
          .map((el) => {
            const style = el instanceof HTMLElement ? el.style.transform : '';
            return `${el.getAttribute('class') ?? ''}|${style}`;
          })
          .sort()
          .join(';');
      },
      { boardSelector: this.boardSelector, pieces: this.selectors.pieces },
    );
  }

  async boardBox(): Promise<BoardBox | null> {
    await this.board.scrollIntoViewIfNeeded({ timeout: 2_000 });
    return this.board.boundingBox({ timeout: 2_000 });
  }

  async orientation(): Promise<Orientation> {
    for (const selector of this.selectors.flipped) {
      if ((await this.page.locator(selector).count()) > 0) return 'black';
    }
    return 'white';
  }

  async drag(from: Point, to: Point, timeoutMs: number): Promise<void> {
    const hold = Math.min(100, Math.floor(timeoutMs / 10));
    await this.page.mouse.move(from.x, from.y);
    await this.page.mouse.down();
    try {
      await this.page.waitForTimeout(hold);
      await this.page.mouse.move(to.x, to.y, { steps: 10 });
      await this.page.waitForTimeout(hold);
    } finally {
      await this.page.mouse.up();
    }
  }

  /**
   * Tries, in order: the board component's `game.move`, its `move(from, to)`,
   * then synthetic pointer events on the two square elements.
   */
  async injectMove(move: PlannedMove): Promise<boolean> {
    const args: InjectArgs = {
      boardSelector: this.boardSelector,
      from: move.from,
      to: move.to,
      promotion: move.promotion ?? null,
    };
    return this.page.evaluate(({ boardSelector, from, to, promotion }) => {
      const board = document.querySelector(boardSelector);
      if (!board) return false;

      const game: unknown = Reflect.get(board, 'game');
      if (typeof game === 'object' && game !== null) {
        const gameMove: unknown = Reflect.get(game, 'move');
        if (typeof gameMove === 'function') {
          const payload = promotion ? { from, to, promotion } : { from, to };
          if (Reflect.apply(gameMove, game, [payload])) return true;
        }
      }

      const boardMove: unknown = Reflect.get(board, 'move');
      if (typeof boardMove === 'function' && Reflect.apply(boardMove, board, [from, to])) {
        return true;
      }

      const findSquare = (square: string): Element | null => {
        const file = square.charCodeAt(0) - 96;
        return (
          board.querySelector(`[data-square="${square}"]`) ??
          board.querySelector(`.square-${file}${square[1]}`) ??
          board.querySelector(`.square-${square}`)
        );
      };
      const fromEl = findSquare(from);
      const toEl = findSquare(to);
      if (!fromEl || !toEl) return false;

      for (const type of ['pointerdown', 'mousedown', 'pointerup', 'mouseup', 'click']) {
        fromEl.dispatchEvent(new MouseEvent(type, { bubbles: true }));
      }
      for (const type of ['pointerdown', 'mousedown', 'pointerup', 'mouseup', 'click']) {
        toEl.dispatchEvent(new MouseEvent(type, { bubbles: true }));
      }
      return true;
    }, args);
  }

  async typeMove(text: string, timeoutMs: number): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    const left = () => Math.max(1, deadline - Date.now());

    for (const selector of this.selectors.keyboardInput) {
      const input = this.page.locator(selector).first();
      if (await input.isVisible().catch(() => false)) {
        await input.fill(text, { timeout: left() });
        await input.press('Enter', { timeout: left() });
        return;
      }
    }
    await this.board.click({ timeout: left() });
    await this.page.waitForTimeout(Math.min(300, Math.floor(timeoutMs / 10)));
    await this.page.keyboard.type(text, { delay: Math.min(50, Math.floor(left() / (text.length + 1))) });
    await this.page.keyboard.press('Enter');
  }
}

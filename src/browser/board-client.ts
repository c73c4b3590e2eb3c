import { join } from 'path';
import type { BotConfig } from '../config.js';
import { BrowserSetupError, describeError } from '../errors.js';
import type { BoardSurface } from '../executor/board-surface.js';
import type { Logger } from '../logger.js';
import { PlaywrightBoardSurface } from './board-page.js';
import { BrowserSession } from './browser-session.js';
import { takeScreenshot } from './browser-utils.js';
import { ChessSite } from './chess-site.js';
import { loadSelectors, type SiteSelectors } from './selectors.js';

/**
 * Everything the runner needs from the browser side: a ready board per game,
 * a failure screenshot and cleanup.
 */
export interface BoardClient {
  newGame(): Promise<BoardSurface>;
  /** Screenshot path, or null when there is nothing to capture. */
  captureFailure(label: string): Promise<string | null>;
  close(): Promise<void>;
}

export type BoardClientConfig = Pick<
  BotConfig,
  'headless' | 'chromePath' | 'cdpUrl' | 'siteUrl' | 'username' | 'password' | 'logDir' | 'selectorsFile'
>;

export class PlaywrightBoardClient implements BoardClient {
  private session: BrowserSession | null = null;
  private site: ChessSite | null = null;
  private loggedIn = false;
  private readonly selectors: SiteSelectors;
  private readonly log: Logger;

  constructor(
    private readonly config: BoardClientConfig,
    logger: Logger,
  ) {
    this.selectors = loadSelectors(config.selectorsFile);
    this.log = logger.child('site');
  }

  async newGame(): Promise<BoardSurface> {
    try {
      const { session, site } = await this.ensureSession();

      const { username, password } = this.config;
      if (username && password && !this.loggedIn) {
        await site.login(username, password);
        this.loggedIn = true;
      }

      const boardSelector = await site.openBoard();
      return new PlaywrightBoardSurface(session.page, boardSelector, this.selectors.board);
    } catch (err) {
      // Start from a fresh browser next time.
      await this.close();
      if (err instanceof BrowserSetupError) throw err;
      throw new BrowserSetupError(`board setup failed: ${describeError(err)}`, { cause: err });
    }
  }

  async captureFailure(label: string): Promise<string | null> {
    if (!this.session) return null;
    try {
      const path = await takeScreenshot(this.session.page, join(this.config.logDir, 'screenshots'), label);
      this.log.info(`saved screenshot ${path}`);
      return path;
    } catch (err) {
      this.log.warn(`screenshot failed: ${describeError(err)}`);
      return null;
    }
  }

  async close(): Promise<void> {
    const session = this.session;
    this.session = null;
    this.site = null;
    this.loggedIn = false;
    if (session) await session.close();
  }

  private async ensureSession(): Promise<{ session: BrowserSession; site: ChessSite }> {
    if (this.session && this.site && !this.session.page.isClosed()) {
      return { session: this.session, site: this.site };
    }
    await this.close();
    const session = await BrowserSession.open({
      headless: this.config.headless,
      chromePath: this.config.chromePath,
      cdpUrl: this.config.cdpUrl,
      logger: this.log,
    });
    const site = new ChessSite(session.page, this.config.siteUrl, this.selectors, this.log);
    this.session = session;
    this.site = site;
    return { session, site };
  }
}

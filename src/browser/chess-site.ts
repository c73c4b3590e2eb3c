import type { Locator, Page } from 'playwright-core';
import { BrowserSetupError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { SiteSelectors } from './selectors.js';

/**
 * Site-level chores around the board: popups, login, navigation. Each
 * element is looked up through an ordered list of selectors so layout drift
 * on the site only needs a change in config/selectors.json.
 */
export class ChessSite {
  constructor(
    private readonly page: Page,
    private readonly siteUrl: string,
    private readonly selectors: SiteSelectors,
    private readonly log: Logger,
  ) {}

  private url(path: string): string {
    return new URL(path, this.siteUrl).toString();
  }

  /**
   * Clicks the first visible cookie banner or modal close button, if any.
   */
  async dismissPopups(): Promise<string | null> {
    for (const selector of this.selectors.popups) {
      const popup = this.page.locator(selector).first();
      const visible = await popup.isVisible().catch(() => false);
      if (!visible) continue;
      try {
        await popup.click({ timeout: 2_000 });
        this.log.info(`dismissed popup with selector: ${selector}`);
        await this.page.waitForTimeout(1000);
        return selector;
      } catch (err) {
        this.log.debug(`popup ${selector} not clickable: ${err instanceof Error ? err.message : err}`);
      }
    }
    return null;
  }

  async login(username: string, password: string): Promise<void> {
    this.log.info(`logging in as ${username}`);
    await this.page.goto(this.url(this.selectors.paths.login), {
      waitUntil: 'domcontentloaded',
      timeout: 30_000,
    });
    await this.page.waitForTimeout(2000);
    await this.dismissPopups();

    const usernameField = await this.firstVisible('username field', this.selectors.login.username, 20_000);
    await usernameField.fill(username);

    const passwordField = await this.firstVisible('password field', this.selectors.login.password, 5_000);
    await passwordField.fill(password);

    const submit = await this.firstVisible('login button', this.selectors.login.submit, 5_000);
    await submit.click({ timeout: 10_000 });
    await this.page.waitForLoadState('domcontentloaded', { timeout: 30_000 }).catch(() => undefined);

    const marker = await this.firstVisible('logged-in marker', this.selectors.login.success, 10_000).catch(
      () => null,
    );
    if (marker) {
      this.log.info('login successful');
      return;
    }
    if (this.page.url().toLowerCase().includes('login')) {
      throw new BrowserSetupError('login failed: still on the login page');
    }
    this.log.info('login appears successful (URL changed)');
  }

  /**
   * Opens a fresh analysis board and returns the selector that matched it.
   */
  async openBoard(): Promise<string> {
    const target = this.url(this.selectors.paths.board);
    this.log.info(`opening board at ${target}`);
    try {
      await this.page.goto(target, { waitUntil: 'domcontentloaded', timeout: 30_000 });
    } catch (err) {
      throw new BrowserSetupError(`could not open ${target}`, { cause: err });
    }

    const board = await this.firstMatching(this.selectors.board.container, 15_000);
    if (!board) {
      throw new BrowserSetupError('could not find the chess board element');
    }
    await this.page.waitForTimeout(1500);
    await this.dismissPopups();
    this.log.info(`board ready (${board})`);
    return board;
  }

  private async firstVisible(label: string, selectors: readonly string[], timeoutMs: number): Promise<Locator> {
    const matched = await this.firstMatching(selectors, timeoutMs);
    if (!matched) {
      throw new BrowserSetupError(`could not find ${label} (tried ${selectors.join(', ')})`);
    }
    this.log.debug(`found ${label} with selector: ${matched}`);
    return this.page.locator(matched).first();
  }

  /**
   * First selector with a visible match. The whole list shares one time
   * budget; the first selector gets most of it since it is the likeliest.
   */
  private async firstMatching(selectors: readonly string[], timeoutMs: number): Promise<string | null> {
    const deadline = Date.now() + timeoutMs;
    for (const [i, selector] of selectors.entries()) {
      const remaining = deadline - Date.now();
      const budget = i === 0 ? Math.max(remaining / 2, 500) : Math.max(remaining / (selectors.length - i), 250);
      try {
        await this.page.locator(selector).first().waitFor({ state: 'visible', timeout: budget });
        return selector;
      } catch {
        continue;
      }
    }
    return null;
  }
}

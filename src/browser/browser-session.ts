import { chromium, type Browser, type BrowserContext, type Page } from 'playwright-core';
import { BrowserSetupError } from '../errors.js';
import type { Logger } from '../logger.js';
import { findLocalChrome } from './browser-utils.js';

export interface BrowserSessionOptions {
  headless: boolean;
  /** Explicit Chrome binary; auto-detected when absent. */
  chromePath?: string;
  /** Attach to an already running Chrome instead of launching one. */
  cdpUrl?: string;
  logger: Logger;
}

/**
 * One Chrome and one page, either launched here or attached over CDP.
 */
export class BrowserSession {
  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    readonly page: Page,
    private readonly attached: boolean,
    private readonly log: Logger,
  ) {}

  static async open(opts: BrowserSessionOptions): Promise<BrowserSession> {
    const log = opts.logger.child('browser');

    if (opts.cdpUrl) {
      log.info(`connecting to Chrome at ${opts.cdpUrl}`);
      try {
        const browser = await chromium.connectOverCDP(opts.cdpUrl);
        const context = browser.contexts()[0] ?? (await browser.newContext());
        const page = context.pages()[0] ?? (await context.newPage());
        await waitForDocument(page);
        return new BrowserSession(browser, context, page, true, log);
      } catch (err) {
        throw new BrowserSetupError(`could not attach to Chrome at ${opts.cdpUrl}`, { cause: err });
      }
    }

    const executablePath = findLocalChrome(opts.chromePath);
    if (!executablePath) {
      throw new BrowserSetupError(
        opts.chromePath
          ? `CHROME_PATH ${opts.chromePath} does not exist`
          : 'Chrome not found. Install Google Chrome or set CHROME_PATH / CDP_URL.',
      );
    }

    log.info(`launching ${opts.headless ? 'headless ' : ''}Chrome (${executablePath})`);
    try {
      const browser = await chromium.launch({
        executablePath,
        headless: opts.headless,
        args: ['--window-size=1400,900'],
      });
      const context = await browser.newContext({ viewport: { width: 1400, height: 900 } });
      const page = await context.newPage();
      return new BrowserSession(browser, context, page, false, log);
    } catch (err) {
      throw new BrowserSetupError(`failed to launch Chrome at ${executablePath}`, { cause: err });
    }
  }

  async close(): Promise<void> {
    // An attached Chrome belongs to the user; only drop the connection.
    if (!this.attached) {
      await this.context.close().catch((err: unknown) => this.log.debug(`context close: ${String(err)}`));
    }
    await this.browser.close().catch((err: unknown) => this.log.debug(`browser close: ${String(err)}`));
    this.log.info('browser closed');
  }
}

async function waitForDocument(page: Page): Promise<void> {
  for (let retries = 0; retries < 30; retries++) {
    try {
      await page.evaluate('document.readyState');
      return;
    } catch {
      await new Promise((r) => setTimeout(r, 100));
    }
  }
}

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { platform } from 'os';
import { dirname, join, resolve } from 'path';
import type { Page } from 'playwright-core';

const MAC_APP = 'Contents/MacOS';

/**
 * Where a Chrome or Chromium build usually lives on `os`, most likely first.
 * Entries that depend on an unset environment variable are left out.
 */
export function chromeCandidates(os: NodeJS.Platform, env: NodeJS.ProcessEnv): string[] {
  switch (os) {
    case 'darwin':
      return [
        `/Applications/Google Chrome.app/${MAC_APP}/Google Chrome`,
        `/Applications/Chromium.app/${MAC_APP}/Chromium`,
        ...(env.HOME ? [`${env.HOME}/Applications/Google Chrome.app/${MAC_APP}/Google Chrome`] : []),
      ];
    case 'win32':
      return [
        'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
        'C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe',
        ...(env.LOCALAPPDATA ? [`${env.LOCALAPPDATA}\\Google\\Chrome\\Application\\chrome.exe`] : []),
      ];
    default:
      return [
        '/usr/bin/google-chrome',
        '/usr/bin/google-chrome-stable',
        '/usr/bin/chromium',
        '/usr/bin/chromium-browser',
        '/snap/bin/chromium',
        '/opt/google/chrome/chrome',
      ];
  }
}

/**
 * A configured path (CHROME_PATH) wins and is not second-guessed: when it
 * does not exist the result is undefined rather than some other install.
 */
export function findLocalChrome(
  configured?: string,
  os: NodeJS.Platform = platform(),
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  if (configured) return existsSync(configured) ? configured : undefined;
  return chromeCandidates(os, env).find((p) => existsSync(p));
}

/**
 * Walks up from `start` until `relativePath` exists. Lets the same code find
 * project files from both `src/` and `dist/src/`.
 */
export function findUp(relativePath: string, start: string): string | undefined {
  let dir = resolve(start);
  for (;;) {
    const candidate = join(dir, relativePath);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

/**
 * Saves a PNG of the current page under `<dir>/screenshot-<label>-<ts>.png`,
 * scaled down to fit 2000x2000. Returns the path.
 */
export async function takeScreenshot(page: Page, dir: string, label = 'page'): Promise<string> {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  const screenshotPath = join(dir, `screenshot-${label}-${timestamp}.png`);

  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const rawBuffer = await page.screenshot({ type: 'png' });

  const sharp = (await import('sharp')).default;
  const { width, height } = await sharp(rawBuffer).metadata();

  let finalBuffer: Buffer = rawBuffer;
  if (width && height && (width > 2000 || height > 2000)) {
    finalBuffer = await sharp(rawBuffer)
      .resize(2000, 2000, { fit: 'inside', withoutEnlargement: true })
      .png()
      .toBuffer();
  }

  writeFileSync(screenshotPath, finalBuffer);
  return screenshotPath;
}

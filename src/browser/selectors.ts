import { readFileSync } from 'fs';
import { dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { findUp } from './browser-utils.js';

const selectorList = z.array(z.string().min(1)).min(1);

export const siteSelectorsSchema = z.object({
  paths: z.object({
    login: z.string().startsWith('/'),
    board: z.string().startsWith('/'),
  }),
  popups: z.array(z.string().min(1)),
  login: z.object({
    username: selectorList,
    password: selectorList,
    submit: selectorList,
    success: selectorList,
  }),
  board: z.object({
    container: selectorList,
    pieces: z.string().min(1),
    flipped: z.array(z.string().min(1)),
    keyboardInput: z.array(z.string().min(1)),
  }),
});

export type SiteSelectors = z.infer<typeof siteSelectorsSchema>;

const DEFAULT_FILE = 'config/selectors.json';

/**
 * Reads the selector catalogue. Without an explicit path the bundled
 * `config/selectors.json` is used.
 */
export function loadSelectors(path?: string): SiteSelectors {
  const file = path ?? findUp(DEFAULT_FILE, dirname(fileURLToPath(import.meta.url)));
  if (!file) {
    throw new Error(`${DEFAULT_FILE} not found`);
  }
  const raw: unknown = JSON.parse(readFileSync(file, 'utf8'));
  const parsed = siteSelectorsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`invalid selectors in ${file}: ${issues}`);
  }
  return parsed.data;
}

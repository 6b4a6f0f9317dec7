/**
 * Markdown templates shipped in the package's templates/ directory.
 */
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { readFileSync } from '../utils/file-system.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
export const TEMPLATES_DIR = resolve(__dirname, '../../templates');

const templateCache = new Map<string, string>();

/**
 * Read a template once per process.
 */
export function loadTemplate(name: string): string {
  let text = templateCache.get(name);
  if (text === undefined) {
    text = readFileSync(resolve(TEMPLATES_DIR, name));
    templateCache.set(name, text);
  }
  return text;
}

/**
 * Substitute `{{key}}` placeholders; unknown keys are left in place.
 */
export function renderTemplate(text: string, vars: Record<string, string>): string {
  return text.replace(/\{\{(\w+)\}\}/g, (match, key: string) => vars[key] ?? match);
}

export function repoUrl(repo: string): string {
  return `https://github.com/${repo}`;
}

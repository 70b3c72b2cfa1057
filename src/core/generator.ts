/**
 * Candidate generation: wordlist entries joined with the base domain
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { WordlistError } from './errors.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_WORDLIST_PATH = fileURLToPath(
  new URL('../../templates/wordlists/common-subdomains.txt', import.meta.url)
);

/**
 * Split wordlist file content into labels. Blank lines and `#` comments are dropped.
 */
export function parseWordlist(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'));
}

/**
 * Load a wordlist file, one label per line
 * @throws WordlistError when the file cannot be read
 */
export async function loadWordlist(path: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new WordlistError(path, error);
  }

  const words = parseWordlist(content);
  logger.info(`Loaded ${words.length} words from ${path}`);
  return words;
}

/**
 * Built-in list of common subdomain labels
 */
export async function loadDefaultWordlist(): Promise<string[]> {
  return loadWordlist(DEFAULT_WORDLIST_PATH);
}

/**
 * Lazily yield `{word}.{domain}` for each distinct, non-blank word.
 * Single pass: re-invoke to start over.
 */
export function* generateCandidates(domain: string, words: Iterable<string>): Generator<string> {
  const seen = new Set<string>();

  for (const raw of words) {
    const word = raw.trim();
    if (!word) continue;

    const candidate = `${word}.${domain}`;
    if (seen.has(candidate)) continue;

    seen.add(candidate);
    yield candidate;
  }
}

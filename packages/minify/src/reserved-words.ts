import { readFileSync } from 'node:fs';

const DATA_URL = new URL('../data/reserved-words.json', import.meta.url);

function load(): ReadonlySet<string> {
  const parsed: unknown = JSON.parse(readFileSync(DATA_URL, 'utf8'));
  if (!Array.isArray(parsed) || !parsed.every((word): word is string => typeof word === 'string')) {
    throw new Error(`${DATA_URL.pathname} must be a JSON array of strings`);
  }
  return new Set(parsed);
}

/** ECMAScript reserved words, including strict-mode and future reserved words. */
export const RESERVED_WORDS = load();

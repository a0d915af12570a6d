import { malformed } from './errors.js';

// Low-level cursor helpers shared by the CSS and JS lexers. Each takes the
// index of the opening delimiter and returns the index just past the closing
// one, or throws MalformedInput when the construct never closes.

export function isWordChar(ch: string | undefined): boolean {
  if (ch === undefined) return false;
  return /[A-Za-z0-9_$\\]/.test(ch) || ch.charCodeAt(0) >= 0x80;
}

export function blockCommentEnd(text: string, start: number): number {
  const close = text.indexOf('*/', start + 2);
  if (close === -1) throw malformed('unterminated comment', start);
  return close + 2;
}

export function lineCommentEnd(text: string, start: number): number {
  let i = start + 2;
  while (i < text.length && text[i] !== '\n' && text[i] !== '\r') i++;
  return i;
}

/**
 * Escape-aware scan of a '…' or "…" literal. A backslash consumes the next
 * character, including a line terminator (line continuation); an unescaped
 * line terminator ends the scan with an error in both CSS and JS.
 */
export function quotedEnd(text: string, start: number): number {
  const quote = text[start];
  let i = start + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\') {
      i += text[i + 1] === '\r' && text[i + 2] === '\n' ? 3 : 2;
      continue;
    }
    if (ch === quote) return i + 1;
    if (ch === '\n' || ch === '\r') break;
    i++;
  }
  throw malformed('unterminated string', start);
}

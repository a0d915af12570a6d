import { malformed } from './errors.js';
import { blockCommentEnd, isWordChar, lineCommentEnd, quotedEnd } from './scan.js';

export type JsTokenKind =
  | 'comment'
  | 'important-comment'
  | 'string'
  | 'template'
  | 'regex'
  | 'word'
  | 'punct'
  | 'placeholder';

export type JsToken = {
  kind: JsTokenKind;
  start: number;
  end: number;
};

/** Keywords after which a `/` starts an expression, hence a regex literal. */
export const REGEX_AFTER_KEYWORDS = new Set([
  'return', 'typeof', 'case', 'in', 'instanceof', 'new', 'delete', 'void',
  'throw', 'yield', 'await', 'else', 'do', 'of',
]);

/** Statement keywords whose parenthesised header is followed by a statement, not an operator. */
export const CONTROL_KEYWORDS = new Set(['if', 'while', 'for', 'with']);

const PLACEHOLDER_AT_RE = /___([A-Z]+)_\d+___/y;

// Comment placeholders stand where a comment stood; comments never decide
// whether the next `/` divides.
const TRANSPARENT_PLACEHOLDERS = new Set(['COMMENT']);

type Significant = {
  kind: JsTokenKind;
  value: string;
  afterDot: boolean;
  /** A `)` that closes an `if`/`while`/`for`/`with` header. */
  controlClose: boolean;
};

function opensControlHeader(last: Significant | null, prior: Significant | null): boolean {
  if (!last || last.kind !== 'word' || last.afterDot) return false;
  if (last.value === 'await') return prior !== null && prior.kind === 'word' && prior.value === 'for';
  return CONTROL_KEYWORDS.has(last.value);
}

function regexAllowed(last: Significant | null): boolean {
  if (!last) return true;
  switch (last.kind) {
    case 'word':
      return !last.afterDot && REGEX_AFTER_KEYWORDS.has(last.value);
    case 'punct':
      if (last.value === ')') return last.controlClose;
      return last.value !== ']' && last.value !== '++' && last.value !== '--';
    default:
      // strings, templates, regexes and their placeholders are operands
      return false;
  }
}

function regexEnd(text: string, start: number): number {
  let i = start + 1;
  let inClass = false;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '\n' || ch === '\r') break;
    if (ch === '\\') {
      const next = text[i + 1];
      if (next === undefined || next === '\n' || next === '\r') break;
      i += 2;
      continue;
    }
    if (inClass) {
      if (ch === ']') inClass = false;
    } else if (ch === '[') {
      inClass = true;
    } else if (ch === '/') {
      i++;
      while (i < text.length && isWordChar(text[i]) && text[i] !== '\\') i++;
      return i;
    }
    i++;
  }
  throw malformed('unterminated regular expression', start);
}

function substitutionEnd(text: string, start: number): number {
  let depth = 1;
  let i = start;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '"' || ch === "'") {
      i = quotedEnd(text, i);
      continue;
    }
    if (ch === '`') {
      i = templateEnd(text, i);
      continue;
    }
    if (ch === '/' && text[i + 1] === '*') {
      i = blockCommentEnd(text, i);
      continue;
    }
    if (ch === '/' && text[i + 1] === '/') {
      i = lineCommentEnd(text, i);
      continue;
    }
    if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
    i++;
  }
  throw malformed('unterminated template substitution', start);
}

export function templateEnd(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === '`') return i + 1;
    if (ch === '$' && text[i + 1] === '{') {
      i = substitutionEnd(text, i + 2);
      continue;
    }
    i++;
  }
  throw malformed('unterminated template literal', start);
}

function wordEnd(text: string, start: number): number {
  const numeric = /[0-9.]/.test(text[start]);
  let i = start + 1;
  while (i < text.length && (isWordChar(text[i]) || (numeric && text[i] === '.'))) i++;
  return i;
}

/**
 * Split JS source into the tokens the extraction stages care about.
 * Whitespace is skipped; everything else is covered by exactly one token,
 * so a stage can splice any subset of tokens without re-scanning.
 *
 * A `/` is a regex literal only when the previous significant token allows
 * an expression to start (see `regexAllowed`); otherwise it is division.
 * Parentheses are tracked so that a `/` after `if (…)` starts a regex.
 */
export function tokenizeJs(text: string): JsToken[] {
  const tokens: JsToken[] = [];
  const parens: boolean[] = [];
  let last: Significant | null = null;
  let prior: Significant | null = null;
  let i = 0;

  const push = (kind: JsTokenKind, start: number, end: number, significant: boolean) => {
    tokens.push({ kind, start, end });
    if (!significant) return;
    const value = text.slice(start, end);
    const afterDot = last !== null && last.kind === 'punct' && last.value === '.';
    let controlClose = false;
    if (kind === 'punct' && value === '(') {
      parens.push(opensControlHeader(last, prior));
    } else if (kind === 'punct' && value === ')') {
      controlClose = parens.pop() ?? false;
    }
    prior = last;
    last = { kind, value, afterDot, controlClose };
  };

  while (i < text.length) {
    const ch = text[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === '/') {
      const next = text[i + 1];
      let end: number;
      if (next === '/') {
        end = lineCommentEnd(text, i);
        push('comment', i, end, false);
      } else if (next === '*') {
        end = blockCommentEnd(text, i);
        push(text[i + 2] === '!' ? 'important-comment' : 'comment', i, end, false);
      } else if (regexAllowed(last)) {
        end = regexEnd(text, i);
        push('regex', i, end, true);
      } else {
        end = i + 1;
        push('punct', i, end, true);
      }
      i = end;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const end = quotedEnd(text, i);
      push('string', i, end, true);
      i = end;
      continue;
    }

    if (ch === '`') {
      const end = templateEnd(text, i);
      push('template', i, end, true);
      i = end;
      continue;
    }

    if (ch === '_') {
      PLACEHOLDER_AT_RE.lastIndex = i;
      const m = PLACEHOLDER_AT_RE.exec(text);
      if (m) {
        const end = i + m[0].length;
        push('placeholder', i, end, !TRANSPARENT_PLACEHOLDERS.has(m[1]));
        i = end;
        continue;
      }
    }

    if (isWordChar(ch) || (ch === '.' && /[0-9]/.test(text[i + 1] ?? ''))) {
      const end = wordEnd(text, i);
      push('word', i, end, true);
      i = end;
      continue;
    }

    if ((ch === '+' || ch === '-') && text[i + 1] === ch) {
      push('punct', i, i + 2, true);
      i += 2;
      continue;
    }

    push('punct', i, i + 1, true);
    i++;
  }

  return tokens;
}

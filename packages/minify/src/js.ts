import { CONTROL_KEYWORDS, tokenizeJs } from './js-lexer.js';
import type { JsToken } from './js-lexer.js';
import { restoreStage } from './regions.js';
import type { RegionTable } from './regions.js';
import { RESERVED_WORDS } from './reserved-words.js';
import { isWordChar } from './scan.js';
import type { RegionKind, RuleSet, Stage } from './types.js';

// -- Extraction --

function extractTokens(
  text: string,
  regions: RegionTable,
  pick: (token: JsToken) => RegionKind | null,
): string {
  const parts: string[] = [];
  let copied = 0;
  for (const token of tokenizeJs(text)) {
    const kind = pick(token);
    if (!kind) continue;
    parts.push(text.slice(copied, token.start), regions.protect(kind, text.slice(token.start, token.end)));
    copied = token.end;
  }
  parts.push(text.slice(copied));
  return parts.join('');
}

const importantComments: Stage = {
  name: 'important-comments',
  phase: 'extract',
  run: (text, { regions }) =>
    extractTokens(text, regions, (token) => (token.kind === 'important-comment' ? 'ImportantComment' : null)),
};

const strings: Stage = {
  name: 'strings',
  phase: 'extract',
  run: (text, { regions }) =>
    extractTokens(text, regions, (token) => {
      if (token.kind === 'string') return 'StringLiteral';
      if (token.kind === 'template') return 'TemplateLiteral';
      return null;
    }),
};

const regexLiterals: Stage = {
  name: 'regex-literals',
  phase: 'extract',
  run: (text, { regions }) =>
    extractTokens(text, regions, (token) => (token.kind === 'regex' ? 'RegexLiteral' : null)),
};

// -- Strip --

/**
 * Comments become a single separator: a newline when the comment spanned
 * lines (ASI may depend on it), a space otherwise. Collapse removes the
 * separators that turn out to be unnecessary.
 */
export function stripJsComments(text: string): string {
  const parts: string[] = [];
  let copied = 0;
  for (const token of tokenizeJs(text)) {
    if (token.kind !== 'comment') continue;
    const comment = text.slice(token.start, token.end);
    parts.push(text.slice(copied, token.start), /[\n\r\u2028\u2029]/.test(comment) ? '\n' : ' ');
    copied = token.end;
  }
  parts.push(text.slice(copied));
  return parts.join('');
}

const stripComments: Stage = {
  name: 'strip-comments',
  phase: 'strip',
  run: (text) => stripJsComments(text),
};

// -- Collapse --

/** Keywords that keep one trailing space when an operand follows. */
const KEEP_SPACE_AFTER = new Set([
  'return', 'typeof', 'case', 'throw', 'new', 'delete', 'void', 'in', 'instanceof',
  'else', 'yield', 'await', 'of', 'do', 'extends',
]);
const KEEP_SPACE_BEFORE = new Set(['in', 'instanceof', 'of']);
/** A line break after these is a statement terminator. */
const RESTRICTED = new Set(['return', 'throw', 'break', 'continue', 'yield']);

const JOIN_AFTER = new Set('{([,;:=+-*/%&|^!~?<>.');
const JOIN_BEFORE = new Set(')]},;.?:=*/%&|^<>([+-');
const NO_OPERAND = new Set('{;)]},:');

function wordBefore(s: string, end: number): string {
  let i = end;
  while (i > 0 && isWordChar(s[i - 1])) i--;
  return s.slice(i, end);
}

function wordAfter(s: string, start: number): string {
  let i = start;
  while (i < s.length && isWordChar(s[i])) i++;
  return s.slice(start, i);
}

function endsWithPlaceholder(s: string, end: number, tag: string): boolean {
  return new RegExp(`___${tag}_\\d+___$`).test(s.slice(Math.max(0, end - 32), end));
}

/** Whether the whitespace at `i` must survive as a single space. */
function needsSpace(s: string, i: number): boolean {
  const prev = s[i - 1];
  const next = s[i + 1];
  if (prev === undefined || next === undefined) return false;
  if (isWordChar(prev) && isWordChar(next)) return true;

  // joins that would form a different token
  if ((prev === '+' || prev === '-') && next === prev) return true;
  if (prev === '<' && next === '!') return true;
  if (prev === '/' && (s.startsWith('___REGEX_', i + 1) || s.startsWith('___COMMENT_', i + 1))) return true;
  if (next === '/' && endsWithPlaceholder(s, i, 'REGEX')) return true;

  const before = wordBefore(s, i);
  if (KEEP_SPACE_AFTER.has(before) && !NO_OPERAND.has(next)) return true;
  if (KEEP_SPACE_BEFORE.has(wordAfter(s, i + 1))) return true;
  // `1 .toString()`
  return next === '.' && /^[0-9]/.test(before);
}

function newlineSeparator(s: string, i: number): string {
  const prev = s[i - 1];
  const next = s[i + 1];
  if (prev === undefined || next === undefined) return '';
  if (RESTRICTED.has(wordBefore(s, i))) return '\n';
  if (s.startsWith('++', i + 1) || s.startsWith('--', i + 1)) return '\n';
  if (next === '.' && /[0-9]/.test(s[i + 2] ?? '')) return '\n';

  const postfix = (prev === '+' || prev === '-') && s[i - 2] === prev;
  const joins = (JOIN_AFTER.has(prev) && !postfix) || JOIN_BEFORE.has(next);
  if (!joins) return '\n';
  return needsSpace(s, i) ? ' ' : '';
}

/**
 * Reduce every whitespace run to a newline, a space or nothing. A run that
 * contained a line break keeps it unless the neighbouring characters prove
 * the statement continues; a space run survives only where removing it
 * would merge tokens or change their meaning.
 */
export function collapseJs(text: string): string {
  const s = text
    .replace(/\r\n?/g, '\n')
    .replace(/\s+/g, (run: string) => (/[\n\u2028\u2029]/.test(run) ? '\n' : ' '));

  const parts: string[] = [];
  let copied = 0;
  for (let i = 0; i < s.length; i++) {
    const ch = s[i];
    if (ch !== ' ' && ch !== '\n') continue;
    parts.push(s.slice(copied, i));
    copied = i + 1;
    const separator = ch === '\n' ? newlineSeparator(s, i) : needsSpace(s, i) ? ' ' : '';
    if (separator) parts.push(separator);
  }
  parts.push(s.slice(copied));
  return parts.join('').trim();
}

const collapse: Stage = {
  name: 'collapse',
  phase: 'collapse',
  run: (text) => collapseJs(text),
};

// -- Rewrite --

type ParenKind = 'for' | 'control' | 'plain';

function skipBackSpace(out: string[], end: number): number {
  let j = end;
  while (j > 0 && (out[j - 1] === ' ' || out[j - 1] === '\n')) j--;
  return j;
}

function wordBeforeChars(out: string[], end: number): string {
  let i = end;
  while (i > 0 && isWordChar(out[i - 1])) i--;
  return out.slice(i, end).join('');
}

function headerKind(out: string[]): ParenKind {
  let end = skipBackSpace(out, out.length);
  let word = wordBeforeChars(out, end);
  if (word === 'await') {
    end = skipBackSpace(out, end - word.length);
    word = wordBeforeChars(out, end);
  }
  if (word === 'for') return 'for';
  return CONTROL_KEYWORDS.has(word) ? 'control' : 'plain';
}

/** A `;` that is the entire body of a statement cannot be dropped. */
function isEmptyStatement(out: string[], index: number, controlCloses: Set<number>): boolean {
  const j = skipBackSpace(out, index) - 1;
  const prev = out[j];
  if (prev === ')') return controlCloses.has(j);
  if (prev === ':') return true;
  const word = wordBeforeChars(out, j + 1);
  return word === 'else' || word === 'do';
}

/** Drop `;` before `}` and repeated `;`, leaving for-headers and empty statement bodies alone. */
export function trimSemicolons(text: string): string {
  const out: string[] = [];
  const parens: ParenKind[] = [];
  const controlCloses = new Set<number>();

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '(') {
      parens.push(headerKind(out));
    } else if (ch === ')') {
      const kind = parens.pop();
      if (kind === 'for' || kind === 'control') controlCloses.add(out.length);
    } else if (ch === ';' && parens[parens.length - 1] !== 'for') {
      if (out[out.length - 1] === ';') continue;
    } else if (ch === '}') {
      const last = out.length - 1;
      if (out[last] === ';' && !isEmptyStatement(out, last, controlCloses)) out.pop();
    }
    out.push(ch);
  }
  return out.join('');
}

const semicolons: Stage = {
  name: 'semicolons',
  phase: 'rewrite',
  run: (text) => trimSemicolons(text),
};

const BOOLEAN_RE = /(?<![\w$#.\\])(?:true|false)(?![\w$\\])/g;
/** Words after which `true`/`false` names a class member. */
const MEMBER_MODIFIERS = new Set(['static', 'get', 'set', 'async']);

/** `true` → `!0`, `false` → `!1`, except where the word is a property name or an assignment target. */
export function rewriteBooleans(text: string): string {
  return text.replace(BOOLEAN_RE, (word: string, offset: number, source: string) => {
    let k = offset + word.length;
    if (source[k] === ' ' || source[k] === '\n') k++;
    const next = source[k];
    const next2 = source[k + 1];
    let p = offset - 1;
    if (source[p] === ' ' || source[p] === '\n') p--;
    const prev = source[p];

    if (next === '.' || next === '[' || next === '(') return word;
    // `true?.x` is optional chaining; `true?.5:1` is a conditional
    if (next === '?' && next2 === '.' && !/[0-9]/.test(source[k + 2] ?? '')) return word;
    if (next === '*' && next2 === '*') return word;
    if (MEMBER_MODIFIERS.has(wordBefore(source, p + 1))) return word;
    if (next === '=' && next2 !== '=' && next2 !== '>') return word;
    if (next === ':' && (prev === '{' || prev === ',')) return word;
    return word === 'true' ? '!0' : '!1';
  });
}

const booleans: Stage = {
  name: 'booleans',
  phase: 'rewrite',
  run: (text) => rewriteBooleans(text),
};

const IDENTIFIER_RE = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
const STRING_MEMBER_RE = /\[(___STRING_\d+___)\]/g;

function openingParen(source: string, close: number): number {
  let depth = 0;
  for (let i = close; i >= 0; i--) {
    if (source[i] === ')') {
      depth++;
    } else if (source[i] === '(') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** Whether the `)` at `close` ends an `if`/`while`/`for`/`with` header, after which `[` opens an array. */
function closesControlHeader(source: string, close: number): boolean {
  const open = openingParen(source, close);
  if (open === -1) return false;
  let end = open;
  while (end > 0 && /\s/.test(source[end - 1])) end--;
  let word = wordBefore(source, end);
  if (word === 'await') {
    end -= word.length;
    while (end > 0 && /\s/.test(source[end - 1])) end--;
    word = wordBefore(source, end);
  }
  return CONTROL_KEYWORDS.has(word) && source[end - word.length - 1] !== '.';
}

function isMemberTarget(source: string, offset: number): boolean {
  const prev = source[offset - 1];
  if (prev === ']') return true;
  if (prev === ')') return !closesControlHeader(source, offset - 1);
  if (!isWordChar(prev)) return false;
  const word = wordBefore(source, offset);
  if (/^[0-9]/.test(word)) return false;
  return !RESERVED_WORDS.has(word) || word === 'this' || word === 'super';
}

/** `obj["name"]` → `obj.name` when the key is a plain, non-reserved identifier. */
export function rewriteDotNotation(text: string, regions: RegionTable): string {
  return text.replace(STRING_MEMBER_RE, (match: string, placeholder: string, offset: number, source: string) => {
    if (!isMemberTarget(source, offset)) return match;
    const region = regions.get(placeholder);
    if (!region) return match;
    const name = region.original_text.slice(1, -1);
    if (!IDENTIFIER_RE.test(name) || RESERVED_WORDS.has(name)) return match;
    return `.${name}`;
  });
}

const dotNotation: Stage = {
  name: 'dot-notation',
  phase: 'rewrite',
  run: (text, { regions }) => rewriteDotNotation(text, regions),
};

export const jsRuleSet: RuleSet = {
  language: 'js',
  stages: [
    importantComments,
    strings,
    regexLiterals,
    stripComments,
    collapse,
    semicolons,
    booleans,
    dotNotation,
    restoreStage,
  ],
};

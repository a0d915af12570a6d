import { malformed } from './errors.js';
import { restoreStage } from './regions.js';
import { blockCommentEnd, isWordChar, quotedEnd } from './scan.js';
import type { ResolvedCssRewriteOptions, RuleSet, Stage } from './types.js';

export const DEFAULT_ZERO_UNITS = [
  'px', 'em', 'rem', 'ex', 'ch', 'vw', 'vh', 'vmin', 'vmax', 'cm', 'mm', 'in', 'pt', 'pc', 'q',
];

export const DEFAULT_CSS_OPTIONS: ResolvedCssRewriteOptions = {
  stripLeadingZero: true,
  negativeLeadingZero: false,
  zeroUnits: DEFAULT_ZERO_UNITS,
  shortenHexColors: true,
};

// Properties whose unitless zero means something else (flex-basis `0` vs `0px`
// in the shorthand), plus custom properties, which are opaque token streams.
const ZERO_UNIT_UNSAFE_PROPS = new Set(['flex', '-webkit-flex', '-ms-flex']);

// -- Scanner --

type OpaqueKind = 'comment' | 'important-comment' | 'string';
type Hit = { end: number; replacement: string };

/**
 * Walk CSS source, stepping over comments, quoted strings and backslash
 * escapes. `onOpaque` may replace a comment or string; `onOther` is offered
 * every other position and may consume a construct starting there.
 */
function scanCss(
  text: string,
  onOpaque: (kind: OpaqueKind, start: number, end: number) => string | null,
  onOther?: (i: number) => Hit | null,
): string {
  const parts: string[] = [];
  let copied = 0;
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }

    let kind: OpaqueKind | null = null;
    let end = i;
    if (ch === '/' && text[i + 1] === '*') {
      end = blockCommentEnd(text, i);
      kind = text[i + 2] === '!' ? 'important-comment' : 'comment';
    } else if (ch === '"' || ch === "'") {
      end = quotedEnd(text, i);
      kind = 'string';
    }

    if (kind) {
      const replacement = onOpaque(kind, i, end);
      if (replacement !== null) {
        parts.push(text.slice(copied, i), replacement);
        copied = end;
      }
      i = end;
      continue;
    }

    const hit = onOther ? onOther(i) : null;
    if (hit) {
      parts.push(text.slice(copied, i), hit.replacement);
      copied = hit.end;
      i = hit.end;
      continue;
    }
    i++;
  }
  parts.push(text.slice(copied));
  return parts.join('');
}

function startsFunction(text: string, i: number): boolean {
  const prev = text[i - 1];
  return !isWordChar(prev) && prev !== '-';
}

function skipSpace(text: string, i: number): number {
  while (i < text.length && /\s/.test(text[i])) i++;
  return i;
}

// -- Extraction --

const URL_OPEN_RE = /url\(/iy;
const MATH_OPEN_RE = /(?:-webkit-|-moz-)?(?:calc|clamp|min|max)\(/iy;

function urlEnd(text: string, start: number, bodyStart: number): number {
  let i = skipSpace(text, bodyStart);
  if (text[i] === '"' || text[i] === "'") {
    i = skipSpace(text, quotedEnd(text, i));
    if (text[i] !== ')') throw malformed('unexpected content after quoted url()', i);
    return i + 1;
  }
  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === ')') return i + 1;
    i++;
  }
  throw malformed('unterminated url()', start);
}

function mathEnd(text: string, start: number, open: number): number {
  let depth = 0;
  let i = open;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === '"' || ch === "'") {
      i = quotedEnd(text, i);
      continue;
    }
    if (ch === '/' && text[i + 1] === '*') {
      i = blockCommentEnd(text, i);
      continue;
    }
    if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
      if (depth === 0) return i + 1;
    }
    i++;
  }
  throw malformed('unbalanced parentheses in math function', start);
}

function normalizeMath(expr: string): string {
  if (/["'/]/.test(expr)) return expr;
  return expr.replace(/\s+/g, ' ').replace(/\(\s/g, '(').replace(/\s\)/g, ')');
}

const importantComments: Stage = {
  name: 'important-comments',
  phase: 'extract',
  run: (text, { regions }) =>
    scanCss(text, (kind, start, end) =>
      kind === 'important-comment' ? regions.protect('ImportantComment', text.slice(start, end)) : null),
};

const urls: Stage = {
  name: 'urls',
  phase: 'extract',
  run: (text, { regions }) =>
    scanCss(text, () => null, (i) => {
      if (!startsFunction(text, i)) return null;
      URL_OPEN_RE.lastIndex = i;
      if (!URL_OPEN_RE.test(text)) return null;
      const end = urlEnd(text, i, i + 4);
      const original = text.slice(i, end);
      const kind = /^url\(\s*["']?\s*data:/i.test(original) ? 'DataUri' : 'UrlReference';
      return { end, replacement: regions.protect(kind, original) };
    }),
};

const mathFunctions: Stage = {
  name: 'math-functions',
  phase: 'extract',
  run: (text, { regions }) =>
    scanCss(text, () => null, (i) => {
      if (!startsFunction(text, i)) return null;
      MATH_OPEN_RE.lastIndex = i;
      const m = MATH_OPEN_RE.exec(text);
      if (!m) return null;
      const end = mathEnd(text, i, i + m[0].length - 1);
      return { end, replacement: regions.protect('CalcExpr', normalizeMath(text.slice(i, end))) };
    }),
};

const strings: Stage = {
  name: 'strings',
  phase: 'extract',
  run: (text, { regions }) =>
    scanCss(text, (kind, start, end) =>
      kind === 'string' ? regions.protect('StringLiteral', text.slice(start, end)) : null),
};

// -- Strip / collapse --

const stripComments: Stage = {
  name: 'strip-comments',
  phase: 'strip',
  run: (text) =>
    text.replace(/\/\*[\s\S]*?\*\//g, (comment: string, offset: number, source: string) =>
      isWordChar(source[offset - 1]) && isWordChar(source[offset + comment.length]) ? ' ' : ''),
};

/** True when the `:` at `offset` sits in a declaration rather than a selector. */
function inDeclaration(text: string, offset: number): boolean {
  for (let i = offset; i < text.length; i++) {
    const ch = text[i];
    if (ch === '{') return false;
    if (ch === ';' || ch === '}') return true;
  }
  return true;
}

export function collapseCss(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .replace(/\s*([{};,>~+])\s*/g, '$1')
    .replace(/\s+!important/gi, '!important')
    .replace(/:\s+/g, ':')
    .replace(/\s+:/g, (match: string, offset: number, source: string) =>
      inDeclaration(source, offset + match.length - 1) ? ':' : ' :')
    .replace(/;+}/g, '}')
    .replace(/;{2,}/g, ';')
    .trim();
}

const collapse: Stage = {
  name: 'collapse',
  phase: 'collapse',
  run: (text) => collapseCss(text),
};

// -- Rewrite --

function propertyAt(text: string, offset: number): string {
  const start = Math.max(
    text.lastIndexOf('{', offset),
    text.lastIndexOf(';', offset),
    text.lastIndexOf('}', offset),
  ) + 1;
  const declaration = text.slice(start, offset + 1);
  const colon = declaration.indexOf(':');
  return colon === -1 ? '' : declaration.slice(0, colon).trim().toLowerCase();
}

function zeroUnitAllowed(text: string, offset: number): boolean {
  const property = propertyAt(text, offset);
  return !property.startsWith('--') && !ZERO_UNIT_UNSAFE_PROPS.has(property);
}

export function rewriteCssNumbers(text: string, options: ResolvedCssRewriteOptions): string {
  let out = text;

  const units = options.zeroUnits.filter((unit) => /^[a-z]+$/i.test(unit));
  if (units.length > 0) {
    const zeroUnit = new RegExp(`(^|[\\s:,(])0(?:${units.join('|')})(?![\\w%.-])`, 'gi');
    out = out.replace(zeroUnit, (match: string, prefix: string, offset: number, source: string) =>
      zeroUnitAllowed(source, offset) ? `${prefix}0` : match);
  }

  if (options.stripLeadingZero) {
    out = out.replace(/(^|[\s:,(])0\.(\d)/g, '$1.$2');
    if (options.negativeLeadingZero) {
      out = out.replace(/(^|[\s:,(])-0\.(\d)/g, '$1-.$2');
    }
  }

  return out;
}

const numbers: Stage = {
  name: 'numbers',
  phase: 'rewrite',
  run: (text, { css }) => rewriteCssNumbers(text, css),
};

const HEX_COLOR_RE = /#([0-9a-f])\1([0-9a-f])\2([0-9a-f])\3(?![\w-])/gi;

/** `#aabbcc` → `#abc`. Id selectors are left alone: a value is followed by `;` or `}` before any `{`. */
export function shortenHexColors(text: string): string {
  return text.replace(HEX_COLOR_RE, (match: string, r: string, g: string, b: string, offset: number, source: string) =>
    inDeclaration(source, offset) ? `#${r}${g}${b}`.toLowerCase() : match);
}

const hexColors: Stage = {
  name: 'hex-colors',
  phase: 'rewrite',
  run: (text, { css }) => (css.shortenHexColors ? shortenHexColors(text) : text),
};

export const cssRuleSet: RuleSet = {
  language: 'css',
  stages: [
    importantComments,
    urls,
    mathFunctions,
    strings,
    stripComments,
    collapse,
    numbers,
    hexColors,
    restoreStage,
  ],
};

import { describe, it, expect } from 'vitest';
import { MinifyError } from '../src/errors.js';
import { tokenizeJs } from '../src/js-lexer.js';

function kinds(source: string): string[] {
  return tokenizeJs(source).map((t) => t.kind);
}

function texts(source: string): string[] {
  return tokenizeJs(source).map((t) => source.slice(t.start, t.end));
}

describe('tokenizeJs', () => {
  describe('regex vs division', () => {
    it('treats / after an identifier as division', () => {
      expect(kinds('a / b')).toEqual(['word', 'punct', 'word']);
    });

    it('treats / after = as a regex', () => {
      expect(texts('x = /re\\/x/g')).toEqual(['x', '=', '/re\\/x/g']);
      expect(kinds('x = /re\\/x/g')).toEqual(['word', 'punct', 'regex']);
    });

    it('treats / at start of input as a regex', () => {
      expect(kinds('/a/.test(s)')[0]).toBe('regex');
    });

    it('treats / after return as a regex', () => {
      expect(kinds('return /x/')).toEqual(['word', 'regex']);
    });

    it('treats / after a keyword used as a property as division', () => {
      expect(kinds('a.return / 2')).toEqual(['word', 'punct', 'word', 'punct', 'word']);
    });

    it('treats / after ) ] ++ -- as division', () => {
      expect(kinds('(a) / 2')[3]).toBe('punct');
      expect(kinds('a[0] / 2')[4]).toBe('punct');
      expect(texts('i++ / 2')).toEqual(['i', '++', '/', '2']);
    });

    it('treats / after an if or while header as a regex', () => {
      expect(texts('if (ok) / +/.test(s)')).toEqual(['if', '(', 'ok', ')', '/ +/', '.', 'test', '(', 's', ')']);
      expect(kinds('while (f(x)) /a/g.exec(s)')[7]).toBe('regex');
    });

    it('treats / after a call inside a header as division', () => {
      expect(texts('if (f(a) / 2) x')).toEqual(['if', '(', 'f', '(', 'a', ')', '/', '2', ')', 'x']);
    });

    it('does not treat a method named if as a header', () => {
      expect(kinds('a.if(x) / 2')[6]).toBe('punct');
    });

    it('treats / after } as a regex', () => {
      expect(kinds('{} /x/')).toEqual(['punct', 'punct', 'regex']);
    });

    it('keeps a / inside a character class within the regex', () => {
      expect(texts('r = /[/]+/g;')).toEqual(['r', '=', '/[/]+/g', ';']);
    });

    it('looks through comments when deciding', () => {
      expect(kinds('a /* c */ / b')).toEqual(['word', 'comment', 'punct', 'word']);
      expect(kinds('x = // c\n/y/')).toEqual(['word', 'punct', 'comment', 'regex']);
    });

    it('looks through comment placeholders but not other placeholders', () => {
      expect(kinds('___COMMENT_0___ /re/')).toEqual(['placeholder', 'regex']);
      expect(kinds('___STRING_0___ / 2')).toEqual(['placeholder', 'punct', 'word']);
    });
  });

  describe('literals', () => {
    it('scans template literals with nested substitutions', () => {
      const source = 'const t = `a ${ b ? "}" : `c ${d}` } e`;';
      expect(texts(source)).toEqual(['const', 't', '=', '`a ${ b ? "}" : `c ${d}` } e`', ';']);
    });

    it('marks important comments', () => {
      expect(kinds('/*! keep */ /* drop */')).toEqual(['important-comment', 'comment']);
    });

    it('reads a number with a fraction as one word', () => {
      expect(texts('x = .5 + 1.25')).toEqual(['x', '=', '.5', '+', '1.25']);
    });
  });

  describe('malformed input', () => {
    it('throws on an unterminated string', () => {
      expect(() => tokenizeJs('var s = "abc')).toThrow(MinifyError);
    });

    it('throws on an unterminated template', () => {
      expect(() => tokenizeJs('`abc ${x}')).toThrowError(/unterminated template literal at offset 0/);
    });

    it('throws on a regex broken by a newline', () => {
      expect(() => tokenizeJs('x = /abc\n/')).toThrowError(/unterminated regular expression at offset 4/);
    });

    it('throws on an unterminated block comment', () => {
      expect(() => tokenizeJs('a /* b')).toThrowError(/unterminated comment at offset 2/);
    });
  });
});

import { describe, it, expect } from 'vitest';
import { MinifyError } from '../src/errors.js';
import { RegionTable } from '../src/regions.js';

describe('RegionTable', () => {
  it('numbers placeholders across kinds in extraction order', () => {
    const table = new RegionTable('');
    expect(table.protect('StringLiteral', '"a"')).toBe('___STRING_0___');
    expect(table.protect('RegexLiteral', '/x/g')).toBe('___REGEX_1___');
    expect(table.protect('DataUri', 'url(data:,x)')).toBe('___DATAURI_2___');
    expect(table.size).toBe(3);
    expect(table.list().map((r) => r.kind)).toEqual(['StringLiteral', 'RegexLiteral', 'DataUri']);
  });

  it('restores every placeholder verbatim', () => {
    const table = new RegionTable('');
    const a = table.protect('StringLiteral', '"  spaced  "');
    const b = table.protect('ImportantComment', '/*! keep */');
    expect(table.restore(`${b}x=${a};`)).toBe('/*! keep */x="  spaced  ";');
  });

  it('expands placeholders nested inside an earlier region', () => {
    const table = new RegionTable('');
    const url = table.protect('UrlReference', 'url(a.png)');
    const calc = table.protect('CalcExpr', `calc(${url} + 1px)`);
    expect(table.restore(`x:${calc}`)).toBe('x:calc(url(a.png) + 1px)');
  });

  it('rejects source that already contains a placeholder-shaped token', () => {
    expect(() => new RegionTable('var ___STRING_3___ = 1;')).toThrow(MinifyError);
  });

  it('accepts identifiers that only resemble placeholders', () => {
    const table = new RegionTable('var ___string_3___ = __STRING_3__;');
    expect(table.size).toBe(0);
  });

  it('fails restore on a placeholder it never issued', () => {
    const table = new RegionTable('');
    try {
      table.restore('a ___CALC_9___');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MinifyError);
      expect(error instanceof MinifyError && error.kind).toBe('InternalError');
    }
  });
});

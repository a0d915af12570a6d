import { describe, it, expect, vi } from 'vitest';
import { cssRuleSet, DEFAULT_CSS_OPTIONS } from '../src/css.js';
import { MinifyError, malformed } from '../src/errors.js';
import { jsRuleSet } from '../src/js.js';
import { minify, runStage } from '../src/pipeline.js';
import { RegionTable } from '../src/regions.js';
import type { Language, MinifyRequest, Stage } from '../src/types.js';

function request(language: Language, raw: string, extra: Partial<MinifyRequest> = {}): MinifyRequest {
  return {
    language,
    raw_text: raw,
    identity: { handle: 'site-main', content_hash: 'test', source_mtime: 1700000000 },
    ...extra,
  };
}

describe('minify', () => {
  it('runs every css stage in order', () => {
    const onStage = vi.fn();
    minify(request('css', '.a { color: red }'), { onStage });
    expect(onStage.mock.calls.map(([name]) => name)).toEqual([
      'important-comments', 'urls', 'math-functions', 'strings',
      'strip-comments', 'collapse', 'numbers', 'hex-colors', 'restore',
    ]);
    expect(onStage).toHaveBeenCalledWith('collapse', 'css');
  });

  it('runs every js stage in order', () => {
    const onStage = vi.fn();
    minify(request('js', 'var a = 1;'), { onStage });
    expect(onStage.mock.calls.map(([name]) => name)).toEqual(jsRuleSet.stages.map((s) => s.name));
    expect(jsRuleSet.stages.at(-1)?.name).toBe('restore');
  });

  it('reports bytes saved', () => {
    const r = minify(request('css', '.a { color: red; }'));
    expect(r.output_text).toBe('.a{color:red}');
    expect(r.bytes_saved).toBe(5);
  });

  describe('size guard', () => {
    const raw = '.a{color:red}';

    it('processes input exactly at the limit', () => {
      const onStage = vi.fn();
      const r = minify(request('css', raw), { maxBytes: raw.length, onStage });
      expect(r.succeeded).toBe(true);
      expect(onStage).toHaveBeenCalledTimes(cssRuleSet.stages.length);
    });

    it('skips input one byte over the limit without running a stage', () => {
      const onStage = vi.fn();
      const r = minify(request('css', raw), { maxBytes: raw.length - 1, onStage });
      expect(r).toEqual({
        output_text: raw,
        bytes_saved: 0,
        succeeded: false,
        failure: { kind: 'SizeLimitExceeded', message: '13 bytes exceeds the 12 byte limit' },
      });
      expect(onStage).not.toHaveBeenCalled();
    });

    it('measures UTF-8 bytes, not characters', () => {
      const wide = '.a{content:"é"}';
      const r = minify(request('css', wide), { maxBytes: wide.length });
      expect(r.failure?.kind).toBe('SizeLimitExceeded');
    });
  });

  describe('exclusions', () => {
    it('skips already-minified assets by URL', () => {
      const onStage = vi.fn();
      const raw = 'var a = 1;';
      const r = minify(request('js', raw, { url: 'https://example.com/js/vendor.min.js' }), { onStage });
      expect(r.succeeded).toBe(false);
      expect(r.output_text).toBe(raw);
      expect(r.failure?.kind).toBe('Excluded');
      expect(onStage).not.toHaveBeenCalled();
    });

    it('adds configured patterns to the defaults', () => {
      const r = minify(
        { ...request('css', '.a { color: red }'), identity: { handle: 'vendor-grid', content_hash: 'test', source_mtime: 0 } },
        { exclude: ['vendor-*'] },
      );
      expect(r.failure?.kind).toBe('Excluded');
    });
  });

  it('stops at the failing stage', () => {
    const onStage = vi.fn();
    const r = minify(request('css', '.a{content:"abc}'), { onStage });
    expect(onStage).toHaveBeenCalledTimes(1);
    expect(r.failure).toEqual({
      kind: 'MalformedInput',
      stage: 'important-comments',
      message: 'unterminated string at offset 11',
    });
  });
});

describe('runStage', () => {
  const ctx = () => ({ regions: new RegionTable(''), css: DEFAULT_CSS_OPTIONS });

  it('passes through the stage output', () => {
    const stage: Stage = { name: 'upper', phase: 'rewrite', run: (text) => text.toUpperCase() };
    expect(runStage(stage, 'abc', ctx())).toEqual({ ok: true, text: 'ABC' });
  });

  it('keeps a MinifyError as is', () => {
    const error = malformed('bad', 3);
    const stage: Stage = { name: 'bad', phase: 'extract', run: () => { throw error; } };
    const result = runStage(stage, 'abc', ctx());
    expect(result).toEqual({ ok: false, error });
  });

  it('wraps anything else as InternalError', () => {
    const cause = new TypeError('boom');
    const stage: Stage = { name: 'bug', phase: 'collapse', run: () => { throw cause; } };
    const result = runStage(stage, 'abc', ctx());
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(MinifyError);
    expect(result.error.kind).toBe('InternalError');
    expect(result.error.message).toBe('boom');
    expect(result.error.cause).toBe(cause);
  });
});

import { describe, it, expect } from 'vitest';
import { DEFAULT_EXCLUDE, isExcluded } from '../src/exclusions.js';

describe('isExcluded', () => {
  it('matches minified URLs with the defaults', () => {
    expect(isExcluded(DEFAULT_EXCLUDE, { handle: 'jquery', url: 'https://example.com/js/jquery.min.js' })).toBe(true);
    expect(isExcluded(DEFAULT_EXCLUDE, { handle: 'app', url: 'https://example.com/js/app.js' })).toBe(false);
  });

  it('matches case-insensitively', () => {
    expect(isExcluded(['*.MIN.CSS'], { handle: 'theme', url: 'https://example.com/theme.min.css' })).toBe(true);
  });

  it('matches the handle as a whole', () => {
    expect(isExcluded(['admin-*'], { handle: 'admin-bar' })).toBe(true);
    expect(isExcluded(['admin-*'], { handle: 'site-admin-bar' })).toBe(false);
  });

  it('lets * cross path separators', () => {
    expect(isExcluded(['assets/*'], { handle: 'assets/vendor/grid.css' })).toBe(true);
  });

  it('matches any part of the URL', () => {
    expect(isExcluded(['jquery'], { handle: 'core', url: 'https://cdn.example.com/libs/jquery/core.js' })).toBe(true);
  });

  it('ignores blank patterns', () => {
    expect(isExcluded(['', '  '], { handle: 'anything', url: 'https://example.com/a.js' })).toBe(false);
  });
});

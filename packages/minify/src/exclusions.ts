import picomatch from 'picomatch';

/** Already-minified assets are never processed again. */
export const DEFAULT_EXCLUDE = ['*.min.css', '*.min.js'];

export type ExclusionTarget = {
  handle: string;
  url?: string;
};

const BASE_OPTIONS = { nocase: true, bash: true, dot: true };

/**
 * Patterns are globs. The handle must match a pattern as a whole; the URL
 * matches when any part of it does, so `jquery` excludes every URL that
 * mentions it.
 */
export function isExcluded(patterns: readonly string[], target: ExclusionTarget): boolean {
  const usable = patterns.map((pattern) => pattern.trim()).filter((pattern) => pattern.length > 0);
  if (usable.length === 0) return false;

  if (picomatch(usable, BASE_OPTIONS)(target.handle)) return true;
  if (!target.url) return false;
  return picomatch(usable, { ...BASE_OPTIONS, contains: true })(target.url);
}

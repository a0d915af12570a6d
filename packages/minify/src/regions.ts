import { MinifyError } from './errors.js';
import type { ProtectedRegion, RegionKind, Stage } from './types.js';

const KIND_TAGS: Record<RegionKind, string> = {
  ImportantComment: 'COMMENT',
  StringLiteral:    'STRING',
  RegexLiteral:     'REGEX',
  TemplateLiteral:  'TEMPLATE',
  DataUri:          'DATAURI',
  UrlReference:     'URL',
  CalcExpr:         'CALC',
};

/** Placeholders use only `_`, `A-Z` and digits so no collapse or rewrite rule can split one. */
export const PLACEHOLDER_RE = /___([A-Z]+)_(\d+)___/g;
const PLACEHOLDER_TEST_RE = /___[A-Z]+_\d+___/;

export function placeholderTag(kind: RegionKind): string {
  return KIND_TAGS[kind];
}

/**
 * Per-invocation bookkeeping for protected regions. One table is created for
 * each minify call and dropped with it; nothing here outlives the request.
 */
export class RegionTable {
  private readonly regions = new Map<string, ProtectedRegion>();
  private counter = 0;

  constructor(source: string) {
    if (PLACEHOLDER_TEST_RE.test(source)) {
      throw new MinifyError('MalformedInput', 'input already contains a placeholder-shaped token');
    }
  }

  protect(kind: RegionKind, text: string): string {
    const placeholder = `___${KIND_TAGS[kind]}_${this.counter++}___`;
    this.regions.set(placeholder, { placeholder, original_text: text, kind });
    return placeholder;
  }

  get(placeholder: string): ProtectedRegion | undefined {
    return this.regions.get(placeholder);
  }

  get size(): number {
    return this.regions.size;
  }

  /** Regions in extraction order. */
  list(): ProtectedRegion[] {
    return [...this.regions.values()];
  }

  /**
   * Substitute every placeholder with its original text in one pass. A region
   * may itself contain placeholders from an earlier stage (a url() inside a
   * calc()), so originals are expanded recursively before being spliced in.
   */
  restore(text: string): string {
    return text.replace(PLACEHOLDER_RE, (match) => {
      const region = this.regions.get(match);
      if (!region) {
        throw new MinifyError('InternalError', `unknown placeholder ${match}`);
      }
      return this.restore(region.original_text);
    });
  }
}

/** Final stage of every rule set. */
export const restoreStage: Stage = {
  name: 'restore',
  phase: 'restore',
  run: (text, ctx) => ctx.regions.restore(text),
};

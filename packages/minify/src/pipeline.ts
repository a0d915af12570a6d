import { cssRuleSet, DEFAULT_CSS_OPTIONS } from './css.js';
import { MinifyError } from './errors.js';
import { DEFAULT_EXCLUDE, isExcluded } from './exclusions.js';
import { jsRuleSet } from './js.js';
import { RegionTable } from './regions.js';
import type {
  Language,
  MinifyFailure,
  MinifyOptions,
  MinifyRequest,
  MinifyResult,
  ResolvedCssRewriteOptions,
  RuleSet,
  Stage,
  StageContext,
} from './types.js';

export const DEFAULT_MAX_BYTES = 1024 * 1024;

const RULE_SETS: Record<Language, RuleSet> = {
  css: cssRuleSet,
  js: jsRuleSet,
};

export type StageResult =
  | { ok: true; text: string }
  | { ok: false; error: MinifyError };

function toMinifyError(error: unknown): MinifyError {
  if (error instanceof MinifyError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new MinifyError('InternalError', message, { cause: error });
}

/** Run one stage; whatever it throws comes back as a typed failure. */
export function runStage(stage: Stage, text: string, ctx: StageContext): StageResult {
  try {
    return { ok: true, text: stage.run(text, ctx) };
  } catch (error) {
    return { ok: false, error: toMinifyError(error) };
  }
}

function resolveCssOptions(options: MinifyOptions): ResolvedCssRewriteOptions {
  return {
    stripLeadingZero: options.css?.stripLeadingZero ?? DEFAULT_CSS_OPTIONS.stripLeadingZero,
    negativeLeadingZero: options.css?.negativeLeadingZero ?? DEFAULT_CSS_OPTIONS.negativeLeadingZero,
    zeroUnits: options.css?.zeroUnits ?? DEFAULT_CSS_OPTIONS.zeroUnits,
    shortenHexColors: options.css?.shortenHexColors ?? DEFAULT_CSS_OPTIONS.shortenHexColors,
  };
}

function fallback(raw: string, failure: MinifyFailure): MinifyResult {
  return { output_text: raw, bytes_saved: 0, succeeded: false, failure };
}

// -- Entry point --

/**
 * Minify one asset. Excluded, oversized or malformed input and any stage
 * failure all come back as the raw text with `succeeded: false`; only an
 * `onStage` hook that throws can make this throw.
 */
export function minify(request: MinifyRequest, options: MinifyOptions = {}): MinifyResult {
  const raw = request.raw_text;

  const patterns = [...DEFAULT_EXCLUDE, ...(options.exclude ?? [])];
  if (isExcluded(patterns, { handle: request.identity.handle, url: request.url })) {
    return fallback(raw, { kind: 'Excluded', message: `${request.identity.handle} matches an exclusion pattern` });
  }

  const maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
  const size = Buffer.byteLength(raw, 'utf8');
  if (size > maxBytes) {
    return fallback(raw, { kind: 'SizeLimitExceeded', message: `${size} bytes exceeds the ${maxBytes} byte limit` });
  }

  let regions: RegionTable;
  try {
    regions = new RegionTable(raw);
  } catch (error) {
    const failure = toMinifyError(error);
    return fallback(raw, { kind: failure.kind, message: failure.message });
  }

  const ctx: StageContext = { regions, css: resolveCssOptions(options) };
  let text = raw;
  for (const stage of RULE_SETS[request.language].stages) {
    options.onStage?.(stage.name, request.language);
    const result = runStage(stage, text, ctx);
    if (!result.ok) {
      return fallback(raw, { kind: result.error.kind, stage: stage.name, message: result.error.message });
    }
    text = result.text;
  }

  return {
    output_text: text,
    bytes_saved: size - Buffer.byteLength(text, 'utf8'),
    succeeded: true,
  };
}

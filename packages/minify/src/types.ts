import type { RegionTable } from './regions.js';

export type Language = 'css' | 'js';

export type RegionKind =
  | 'ImportantComment'
  | 'StringLiteral'
  | 'RegexLiteral'
  | 'TemplateLiteral'
  | 'DataUri'
  | 'UrlReference'
  | 'CalcExpr';

export type ProtectedRegion = {
  placeholder: string;
  original_text: string;
  kind: RegionKind;
};

/**
 * Identity of one source asset. Any change to the handle, the content or the
 * source file's mtime produces a different identity, which is the only way a
 * cached asset is invalidated.
 */
export type AssetIdentity = {
  handle: string;
  /** SHA-256 hex digest of the raw UTF-8 bytes. */
  content_hash: string;
  source_mtime: number;
};

export type MinifyRequest = {
  language: Language;
  raw_text: string;
  identity: AssetIdentity;
  /** Public URL of the asset, matched against the exclusion list. */
  url?: string;
};

export type MinifyErrorKind =
  | 'MalformedInput'
  | 'SizeLimitExceeded'
  | 'Excluded'
  | 'InternalError';

export type MinifyFailure = {
  kind: MinifyErrorKind;
  /** Stage that raised the error; absent for failures decided before stage 1. */
  stage?: string;
  message: string;
};

export type MinifyResult = {
  output_text: string;
  bytes_saved: number;
  /** false = fallback path, `output_text` is the raw input. */
  succeeded: boolean;
  failure?: MinifyFailure;
};

export type CssRewriteOptions = {
  /** `0.5` → `.5`. Default: true. */
  stripLeadingZero?: boolean;
  /** `-0.5em` → `-.5em`. Default: false. */
  negativeLeadingZero?: boolean;
  /** Units whose zero value is rewritten to a bare `0`. Default: length units only. */
  zeroUnits?: string[];
  /** `#aabbcc` → `#abc` in declaration values. Default: true. */
  shortenHexColors?: boolean;
};

export type MinifyOptions = {
  /** Inputs larger than this many UTF-8 bytes are returned unchanged. Default: 1 MiB. */
  maxBytes?: number;
  /** Glob patterns matched against the handle and the URL. Added to `DEFAULT_EXCLUDE`. */
  exclude?: string[];
  css?: CssRewriteOptions;
  /** Called before each stage runs. */
  onStage?: (stage: string, language: Language) => void;
};

export type ResolvedCssRewriteOptions = Required<CssRewriteOptions>;

export type StageContext = {
  regions: RegionTable;
  css: ResolvedCssRewriteOptions;
};

export type StagePhase = 'extract' | 'strip' | 'collapse' | 'rewrite' | 'restore';

export type Stage = {
  name: string;
  phase: StagePhase;
  run: (text: string, ctx: StageContext) => string;
};

export type RuleSet = {
  language: Language;
  /** Ordered; the pipeline runs them front to back and never reorders. */
  stages: Stage[];
};

// Primary
export { minify, runStage, DEFAULT_MAX_BYTES } from './pipeline.js';
export type { StageResult } from './pipeline.js';

// Rule sets
export { cssRuleSet, DEFAULT_CSS_OPTIONS, DEFAULT_ZERO_UNITS } from './css.js';
export { jsRuleSet } from './js.js';

// Helpers
export { isExcluded, DEFAULT_EXCLUDE } from './exclusions.js';
export type { ExclusionTarget } from './exclusions.js';
export { RegionTable } from './regions.js';
export { MinifyError } from './errors.js';

// Types
export type {
  AssetIdentity,
  CssRewriteOptions,
  Language,
  MinifyErrorKind,
  MinifyFailure,
  MinifyOptions,
  MinifyRequest,
  MinifyResult,
  ProtectedRegion,
  RegionKind,
  RuleSet,
  Stage,
  StageContext,
  StagePhase,
} from './types.js';

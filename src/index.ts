export {
  createStyleSheet,
  RuleNode,
  self,
  pseudo,
  descendant,
  child,
  adjacent,
  sibling,
  compound,
  media,
} from "./ir.js";
export type {
  CombinatorKind,
  ComponentStyleSheet,
  Declaration,
  KeyframeStep,
  KeyframesDefinition,
  RuleTree,
  SelectorSpec,
  StyleModule,
  StyleSheetBuilder,
} from "./ir.js";
export {
  normalizeStyleSheet,
  normalizeKeyframes,
  isNormalizedStyleSheet,
} from "./internal/normalize.js";
export type { NormalizedRule, NormalizedStyleSheet } from "./internal/normalize.js";
export { emitStyleSheet, emitKeyframes } from "./internal/emit-css.js";
export type { EmitOptions } from "./internal/emit-css.js";
export { aggregateModules, compileSheet, compileKeyframes } from "./internal/aggregate.js";
export type {
  AggregateOptions,
  AggregateResult,
  CompiledFunction,
  GeneratedFile,
  OutputLayout,
} from "./internal/aggregate.js";
export { verifyRoundTrip, describeMismatch } from "./internal/round-trip.js";
export type { FlatRule, RoundTripMismatch } from "./internal/round-trip.js";
export { DEFAULT_RUST_TARGET } from "./internal/rust-codegen.js";
export type { RustTarget } from "./internal/rust-codegen.js";
export { StyleCompileError, isStyleCompileError } from "./internal/errors.js";
export type { StyleErrorCode } from "./internal/errors.js";
export { parseStyleSource, parseStylesheet } from "./css-parser.js";
export type { CssRule, ParsedStyleSource, ParsedStylesheet, ValueMapper } from "./css-parser.js";
export { convertString, buildModules } from "./convert.js";
export type { ConversionResult } from "./convert.js";
export { analyzeCss, validateCss } from "./internal/css-analysis.js";
export type { CssAnalysis, CssValidationIssue } from "./internal/css-analysis.js";
export { DEFAULT_MAPPINGS, mapValue, mappingCategoryFor } from "./internal/value-mappings.js";
export type { MappingTables } from "./internal/value-mappings.js";
export { defineOptions, resolveOptions, loadConfigFile, loadMappingsFile } from "./config.js";
export type { ConvertOptions, ResolvedConvertOptions } from "./config.js";
export { runConvert } from "./run.js";
export type { RunConvertOptions, RunConvertResult } from "./run.js";

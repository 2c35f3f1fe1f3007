/**
 * Converts flat stylesheets into Rust style functions.
 * Core concepts: one sheet per base selector (or variant), one module per component,
 * media rules merged into the sheet of the selector they style.
 */
import { parseStylesheet, type ParsedStylesheet } from "./css-parser.js";
import { resolveOptions, type ConvertOptions, type ResolvedConvertOptions } from "./config.js";
import {
  createStyleSheet,
  media,
  type KeyframesDefinition,
  type RuleNode,
  type StyleModule,
  type StyleSheetBuilder,
} from "./ir.js";
import {
  aggregateModules,
  type CompiledFunction,
  type GeneratedFile,
} from "./internal/aggregate.js";
import type { StyleCompileError } from "./internal/errors.js";
import type { WarningLog } from "./internal/logger.js";
import {
  componentNameForSelector,
  functionNameForSelector,
  parseNestedSelector,
  splitBaseSelector,
} from "./internal/selectors.js";
import { createUtilitySheets } from "./internal/utility-sheets.js";
import { mapValue } from "./internal/value-mappings.js";

/** Module that holds every function when rules are not grouped by component. */
export const SINGLE_MODULE_NAME = "styles";
export const ANIMATIONS_MODULE_NAME = "animations";
export const UTILITIES_MODULE_NAME = "utils";

export interface ConversionResult {
  /** Generated files, relative to the output file's directory or the output directory */
  files: GeneratedFile[];
  functions: CompiledFunction[];
  errors: StyleCompileError[];
  warnings: WarningLog[];
}

/**
 * Converts a stylesheet to Rust source.
 *
 * @example
 * ```ts
 * const { files } = convertString(".btn { padding: 8px } .btn:hover { opacity: 0.9 }");
 * // files[0].contents holds `pub fn btn() -> Style`
 * ```
 */
export function convertString(
  css: string,
  options: ConvertOptions = {},
  singleFileName = "styles.rs",
): ConversionResult {
  const resolved = resolveOptions(options);
  const parsed = parseStylesheet(css, {
    mapValue: resolved.applyMappings
      ? (property, value) => mapValue(resolved.mappings, property, value)
      : undefined,
  });
  const { modules, warnings } = buildModules(parsed, resolved);
  const result = aggregateModules(modules, {
    layout: resolved.groupByComponent ? "modules" : "single-file",
    singleFileName,
    target: resolved.target,
    indent: resolved.indent,
    verifyOutput: resolved.verifyOutput,
  });
  return { ...result, warnings: [...parsed.warnings, ...warnings] };
}

/**
 * Groups parsed rules into modules of style sheets.
 *
 * Every rule is split into its base selector and the rest: the base names the sheet
 * (and, with `groupByComponent`, the module), the rest becomes a nested rule of that
 * sheet. Rules with the same base and nesting merge into one block.
 */
export function buildModules(
  parsed: ParsedStylesheet,
  options: ResolvedConvertOptions,
): { modules: StyleModule[]; warnings: WarningLog[] } {
  const warnings: WarningLog[] = [];
  const sheets = new Map<string, StyleSheetBuilder>();
  const moduleSheets = new Map<string, StyleSheetBuilder[]>();

  for (const rule of parsed.rules) {
    const split = splitBaseSelector(rule.selector);
    if (!("base" in split)) {
      warnings.push({
        severity: "warning",
        type:
          split.reason === "universal"
            ? "Universal selectors (`*`) are currently unsupported"
            : "Rule without a class, id or element selector is skipped",
        loc: rule.loc,
        context: { selector: rule.selector },
      });
      continue;
    }

    if (rule.media !== null && !rule.media.trimStart().startsWith("(")) {
      warnings.push({
        severity: "warning",
        type: "Media query without a leading `(feature)` is skipped",
        loc: rule.loc,
        context: { selector: rule.selector, media: rule.media },
      });
      continue;
    }

    const name = functionNameForSelector(split.base, options.extractVariants);
    let sheet = sheets.get(name);
    if (!sheet) {
      sheet = createStyleSheet(name);
      sheets.set(name, sheet);
      const moduleName = options.groupByComponent
        ? componentNameForSelector(split.base)
        : SINGLE_MODULE_NAME;
      moduleSheets.set(moduleName, [...(moduleSheets.get(moduleName) ?? []), sheet]);
    }

    const scope: RuleNode = rule.media ? sheet.root.ensureChild(media(rule.media)) : sheet.root;
    const target = parseNestedSelector(split.nested)
      .filter((spec) => spec.kind !== "self")
      .reduce((node, spec) => node.ensureChild(spec), scope);
    for (const { property, value } of rule.declarations) {
      target.addDeclaration(property, value);
    }
  }

  const modules: StyleModule[] = [...moduleSheets].map(([name, moduleSheetList]) => ({
    name,
    sheets: moduleSheetList,
  }));

  appendToModule(
    modules,
    options.groupByComponent ? ANIMATIONS_MODULE_NAME : SINGLE_MODULE_NAME,
    [],
    parsed.keyframes,
  );

  if (options.includeUtilities) {
    const utilities = createUtilitySheets(new Set(sheets.keys()), (property, value) =>
      options.applyMappings ? mapValue(options.mappings, property, value) : value,
    );
    appendToModule(
      modules,
      options.groupByComponent ? UTILITIES_MODULE_NAME : SINGLE_MODULE_NAME,
      utilities,
      [],
    );
  }

  return { modules, warnings };
}

function appendToModule(
  modules: StyleModule[],
  name: string,
  sheets: StyleModule["sheets"],
  keyframes: readonly KeyframesDefinition[],
): void {
  if (sheets.length === 0 && keyframes.length === 0) {
    return;
  }
  const index = modules.findIndex((m) => m.name === name);
  const existing = modules[index];
  if (index === -1 || !existing) {
    modules.push({ name, sheets, keyframes });
    return;
  }
  modules[index] = {
    name,
    sheets: [...existing.sheets, ...sheets],
    keyframes: [...(existing.keyframes ?? []), ...keyframes],
  };
}

/**
 * Statistics and conversion checks for flat stylesheets.
 * Core concepts: the same rule list the converter reads, value functions found with postcss-value-parser.
 */
import valueParser from "postcss-value-parser";
import { parseStylesheet, type CssRule } from "../css-parser.js";
import type { WarningType } from "./logger.js";
import {
  componentNameForSelector,
  parseNestedSelector,
  splitBaseSelector,
} from "./selectors.js";
import { mapValue, mergeMappings, type MappingTables } from "./value-mappings.js";

export type Difficulty = "easy" | "medium" | "hard";

export interface CssAnalysis {
  totalRules: number;
  totalKeyframes: number;
  /** Rules inside a media query */
  mediaQueries: number;
  /** Rules whose selector has a pseudo-class or pseudo-element */
  pseudoSelectors: number;
  uniqueSelectors: number;
  totalProperties: number;
  uniqueProperties: number;
  /** Rule count per component */
  components: Record<string, number>;
  /** Declarations a mapping table rewrites */
  mappableValues: number;
  /** e.g. `"42.9%"` */
  mappingCoverage: string;
  complexity: {
    calcFunctions: number;
    cssVariables: number;
    complexSelectors: number;
    difficulty: Difficulty;
  };
}

/**
 * Counts what the converter will see. `mappings` defaults to the built-in tables.
 * The difficulty weighs media queries, keyframes, `calc()` and combinators above plain rules.
 */
export function analyzeCss(
  css: string,
  mappings: MappingTables = mergeMappings(undefined),
): CssAnalysis {
  const { rules, keyframes } = parseStylesheet(css);

  const components: Record<string, number> = {};
  const properties: string[] = [];
  let pseudoSelectors = 0;
  let complexSelectors = 0;
  let mappableValues = 0;
  let calcFunctions = 0;
  let cssVariables = 0;

  for (const rule of rules) {
    const shape = selectorShape(rule.selector);
    if (shape.pseudo) pseudoSelectors++;
    if (shape.complex) complexSelectors++;
    if (shape.component) {
      components[shape.component] = (components[shape.component] ?? 0) + 1;
    }

    for (const { property, value } of rule.declarations) {
      properties.push(property);
      if (mapValue(mappings, property, value) !== value.trim()) {
        mappableValues++;
      }
      for (const fn of functionsIn(value)) {
        if (fn.value === "calc") calcFunctions++;
        if (fn.value === "var") cssVariables++;
      }
    }
  }

  const mediaQueries = rules.filter((rule) => rule.media !== null).length;
  const score =
    rules.length +
    new Set(rules.flatMap((rule) => (rule.media === null ? [] : [rule.media]))).size * 2 +
    keyframes.length * 3 +
    pseudoSelectors * 0.5 +
    calcFunctions * 2 +
    complexSelectors * 1.5;

  return {
    totalRules: rules.length,
    totalKeyframes: keyframes.length,
    mediaQueries,
    pseudoSelectors,
    uniqueSelectors: new Set(rules.map((rule) => rule.selector)).size,
    totalProperties: properties.length,
    uniqueProperties: new Set(properties).size,
    components,
    mappableValues,
    mappingCoverage:
      properties.length > 0 ? `${((mappableValues / properties.length) * 100).toFixed(1)}%` : "0%",
    complexity: {
      calcFunctions,
      cssVariables,
      complexSelectors,
      difficulty: score < 10 ? "easy" : score < 50 ? "medium" : "hard",
    },
  };
}

export interface CssValidationIssue {
  type: WarningType;
  message: string;
  loc: { line: number; column: number } | null;
}

/**
 * Finds what converts poorly: empty rules, selectors with combinators, `calc()` and
 * `var()` references that are not custom properties.
 */
export function validateCss(css: string): CssValidationIssue[] {
  const { rules, warnings } = parseStylesheet(css);
  const issues: CssValidationIssue[] = [];

  for (const warning of warnings) {
    if (warning.type === "Empty rule is skipped") {
      const selector = warning.context?.selector;
      issues.push({
        type: warning.type,
        message: `Empty rule found: ${typeof selector === "string" ? selector : ""}`,
        loc: warning.loc ?? null,
      });
    }
  }

  for (const rule of rules) {
    if (selectorShape(rule.selector).complex) {
      issues.push({
        type: "Complex selector may not convert well",
        message: `Complex selector may not convert well: ${rule.selector}`,
        loc: rule.loc,
      });
    }
    issues.push(...declarationIssues(rule));
  }
  return issues;
}

function declarationIssues(rule: CssRule): CssValidationIssue[] {
  const issues: CssValidationIssue[] = [];
  for (const { property, value } of rule.declarations) {
    for (const fn of functionsIn(value)) {
      if (fn.value === "calc") {
        issues.push({
          type: "`calc()` values are passed through unchecked",
          message: `CSS calc() function found in ${rule.selector}.${property}`,
          loc: rule.loc,
        });
      }
      if (fn.value === "var" && !isCustomPropertyReference(fn)) {
        issues.push({
          type: "Non-standard `var()` reference",
          message: `Non-standard CSS variable in ${rule.selector}.${property}`,
          loc: rule.loc,
        });
      }
    }
  }
  return issues;
}

type SelectorShape = {
  component: string | null;
  pseudo: boolean;
  /** Reaches other elements through a combinator */
  complex: boolean;
};

function selectorShape(selector: string): SelectorShape {
  const split = splitBaseSelector(selector);
  if (!("base" in split)) {
    return {
      component: null,
      pseudo: selector.includes(":"),
      complex: /[\s>+~]/.test(selector),
    };
  }
  const chain = parseNestedSelector(split.nested);
  return {
    component: componentNameForSelector(split.base),
    pseudo: chain.some((spec) => spec.kind === "pseudoState"),
    complex: chain.some((spec) => spec.kind === "combinator" && spec.combinator !== "compound"),
  };
}

/** Every function node in a value, nested ones included. */
function functionsIn(value: string): valueParser.FunctionNode[] {
  const found: valueParser.FunctionNode[] = [];
  valueParser(value).walk((node) => {
    if (node.type === "function") {
      found.push(node);
    }
  });
  return found;
}

function isCustomPropertyReference(fn: valueParser.FunctionNode): boolean {
  const first = fn.nodes.find((node) => node.type !== "space");
  return first?.type === "word" && first.value.startsWith("--");
}

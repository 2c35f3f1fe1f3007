/**
 * CSS front ends built on stylis.
 *
 * stylis compiles a source into a flat element list in which nested rules keep a
 * `parent` pointer, `value` holds the selector as written (with `&`), and `props`
 * holds it resolved against the parents. Nested authored sources are rebuilt into a
 * Style IR tree from the parent pointers; flat stylesheets are read as a list of
 * complete selectors.
 */

import { compile } from "stylis";
import type { Element } from "stylis";
import {
  createStyleSheet,
  descendant,
  media,
  type Declaration,
  type KeyframeStep,
  type KeyframesDefinition,
  type RuleNode,
  type StyleSheetBuilder,
} from "./ir.js";
import { StyleCompileError } from "./internal/errors.js";
import type { WarningLog } from "./internal/logger.js";
import { sanitizeRustIdentifier } from "./internal/rust-identifiers.js";
import { parseNestedSelector, splitSelectorList } from "./internal/selectors.js";

/** Rewrites a declaration value, e.g. to a design-token reference. */
export type ValueMapper = (property: string, value: string) => string;

export interface ParseOptions {
  mapValue?: ValueMapper;
}

export interface ParsedStyleSource {
  sheet: StyleSheetBuilder;
  keyframes: KeyframesDefinition[];
  warnings: WarningLog[];
}

/**
 * Parse nested authored CSS into a style sheet.
 *
 * Root-level declarations (or a bare root `{ … }` block) belong to the root rule;
 * `&:hover`, `& > .icon`, `&.active` and `@media (…)` blocks become nested rules.
 * Selectors are validated by normalization: a nested block without a selector becomes
 * a combinator with no target, which normalization rejects. Text that stylis would
 * silently repair (`&: hover`, `{;`) is rejected here, before compiling.
 *
 * @throws StyleCompileError (`MalformedPseudoSelector`) naming the line and column
 */
export function parseStyleSource(
  name: string,
  css: string,
  options: ParseOptions = {},
): ParsedStyleSource {
  const defect = findAuthoringDefect(css);
  if (defect) {
    throw new StyleCompileError({
      code: "MalformedPseudoSelector",
      detail: `${defect.reason} (line ${defect.line}, column ${defect.column})`,
      sheet: name,
      path: ["root"],
    });
  }

  const sheet = createStyleSheet(name);
  const keyframes: KeyframesDefinition[] = [];
  const warnings: WarningLog[] = [];
  const nodesByElement = new Map<Element, RuleNode[]>();

  const targetsOf = (element: Element | null): RuleNode[] =>
    (element && nodesByElement.get(element)) || [sheet.root];

  const visit = (elements: readonly Element[]): void => {
    for (const element of elements) {
      switch (element.type) {
        case "decl": {
          const { property, value } = declarationOf(element, options.mapValue);
          for (const node of targetsOf(element.parent)) {
            node.addDeclaration(property, value);
          }
          break;
        }
        case "rule": {
          const selector = selectorTextOf(element);
          const parents = targetsOf(element.parent);
          if (selector === "") {
            nodesByElement.set(
              element,
              element.parent === null ? parents : parents.map((p) => p.addChild(descendant(null))),
            );
          } else {
            const chains = splitSelectorList(selector).map(parseNestedSelector);
            nodesByElement.set(
              element,
              parents.flatMap((parent) =>
                chains.map((chain) => chain.reduce((node, spec) => node.addChild(spec), parent)),
              ),
            );
          }
          visit(childElements(element));
          break;
        }
        case "@media": {
          const condition = mediaConditionOf(element);
          nodesByElement.set(
            element,
            targetsOf(element.parent).map((parent) => parent.addChild(media(condition))),
          );
          visit(childElements(element));
          break;
        }
        case "comm":
          break;
        default:
          if (isKeyframesElement(element)) {
            keyframes.push(keyframesOf(element, options.mapValue));
          } else {
            warnings.push(unsupportedAtRule(element));
          }
      }
    }
  };

  visit(compile(css));
  return { sheet, keyframes, warnings };
}

/** A rule of a flat stylesheet, one per complete selector. */
export interface CssRule {
  /** Complete selector, e.g. `.btn:hover` */
  selector: string;
  declarations: Declaration[];
  /** Media condition without the `@media` keyword, `null` outside media blocks */
  media: string | null;
  loc: { line: number; column: number };
}

export interface ParsedStylesheet {
  rules: CssRule[];
  keyframes: KeyframesDefinition[];
  warnings: WarningLog[];
}

/**
 * Parse a flat stylesheet into one rule per selector.
 * A rule with a selector list yields one rule per selector, all sharing the declarations.
 */
export function parseStylesheet(css: string, options: ParseOptions = {}): ParsedStylesheet {
  const rules: CssRule[] = [];
  const keyframes: KeyframesDefinition[] = [];
  const warnings: WarningLog[] = [];
  const elements = compile(css);
  const parents = collectParents(elements);

  const visit = (nodes: readonly Element[], condition: string | null): void => {
    for (const element of nodes) {
      switch (element.type) {
        case "rule": {
          const declarations = childElements(element)
            .filter((child) => child.type === "decl")
            .map((child) => declarationOf(child, options.mapValue));
          if (declarations.length === 0) {
            if (!parents.has(element)) {
              warnings.push({
                severity: "warning",
                type: "Empty rule is skipped",
                loc: locOf(element),
                context: { selector: resolvedSelectorsOf(element).join(", ") },
              });
            }
            break;
          }
          const selectors = resolvedSelectorsOf(element);
          if (selectors.length > 1) {
            warnings.push({
              severity: "info",
              type: "Selector list is split across several functions",
              loc: locOf(element),
              context: { selectors },
            });
          }
          for (const selector of selectors) {
            rules.push({ selector, declarations, media: condition, loc: locOf(element) });
          }
          break;
        }
        case "@media": {
          const own = mediaConditionOf(element);
          const inner = childElements(element);
          if (inner.some((child) => child.type === "decl")) {
            warnings.push({
              severity: "warning",
              type: "Media query without a selector rule is skipped",
              loc: locOf(element),
              context: { media: own },
            });
          }
          visit(inner, condition ? `${condition} and ${own}` : own);
          break;
        }
        case "decl":
          warnings.push({
            severity: "warning",
            type: "Rule without a class, id or element selector is skipped",
            loc: locOf(element),
            context: { declaration: element.value },
          });
          break;
        case "comm":
          break;
        default:
          if (isKeyframesElement(element)) {
            keyframes.push(keyframesOf(element, options.mapValue));
          } else {
            warnings.push(unsupportedAtRule(element));
          }
      }
    }
  };

  visit(elements, null);
  return { rules, keyframes, warnings };
}

// -- source checks

type AuthoringDefect = { reason: string; line: number; column: number };

/**
 * First `&: name` (space after the colon) or `{` followed by `;`, outside comments,
 * strings and parentheses.
 */
function findAuthoringDefect(css: string): AuthoringDefect | null {
  let line = 1;
  let column = 1;
  let depth = 0;
  for (let i = 0; i < css.length; i++) {
    const ch = css.charAt(i);
    if (ch === "/" && css.charAt(i + 1) === "*") {
      const end = css.indexOf("*/", i + 2);
      const skipped = end === -1 ? css.slice(i) : css.slice(i, end + 2);
      ({ line, column } = advance(skipped, line, column));
      i += skipped.length - 1;
      continue;
    }
    if (ch === '"' || ch === "'") {
      let end = i + 1;
      while (end < css.length && css.charAt(end) !== ch && css.charAt(end) !== "\n") {
        end += css.charAt(end) === "\\" ? 2 : 1;
      }
      const skipped = css.slice(i, end + 1);
      ({ line, column } = advance(skipped, line, column));
      i += skipped.length - 1;
      continue;
    }
    if (ch === "(") depth++;
    else if (ch === ")") depth = Math.max(0, depth - 1);
    else if (depth === 0 && ch === "&") {
      const spaced = /^&:\s+([\w-]*)/.exec(css.slice(i));
      if (spaced) {
        return { reason: `space after ":" in "&: ${spaced[1] ?? ""}"`, line, column };
      }
    } else if (depth === 0 && ch === "{" && /^\{\s*;/.test(css.slice(i))) {
      return { reason: 'semicolon directly after "{"', line, column };
    }
    ({ line, column } = advance(ch, line, column));
  }
  return null;
}

function advance(text: string, line: number, column: number): { line: number; column: number } {
  for (const ch of text) {
    if (ch === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { line, column };
}

// -- element helpers

function childElements(element: Element): Element[] {
  return Array.isArray(element.children) ? element.children : [];
}

/** Elements that some other element names as its parent. */
function collectParents(elements: readonly Element[]): Set<Element> {
  const parents = new Set<Element>();
  const visit = (nodes: readonly Element[]): void => {
    for (const node of nodes) {
      if (node.parent) {
        parents.add(node.parent);
      }
      visit(childElements(node));
    }
  };
  visit(elements);
  return parents;
}

function selectorTextOf(element: Element): string {
  return element.value.replaceAll("\f", "").trim();
}

function resolvedSelectorsOf(element: Element): string[] {
  const props = Array.isArray(element.props) ? element.props : [element.props];
  return props.map((selector) => selector.replaceAll("\f", "").trim()).filter(Boolean);
}

function declarationOf(element: Element, mapValue: ValueMapper | undefined): Declaration {
  const property = typeof element.props === "string" ? element.props.trim() : "";
  const value = typeof element.children === "string" ? element.children.trim() : "";
  return { property, value: mapValue && property ? mapValue(property, value) : value };
}

function mediaConditionOf(element: Element): string {
  return element.value.replace(/^@media\b/i, "").trim();
}

function isKeyframesElement(element: Element): boolean {
  return /^@(-[a-z]+-)?keyframes$/.test(element.type);
}

function keyframesOf(element: Element, mapValue: ValueMapper | undefined): KeyframesDefinition {
  const name = element.value.replace(/^@(-[a-z]+-)?keyframes\s*/i, "").trim();
  const frames: KeyframeStep[] = childElements(element)
    .filter((child) => child.type === "rule")
    .map((rule) => ({
      selector: selectorTextOf(rule),
      declarations: childElements(rule)
        .filter((child) => child.type === "decl")
        .map((child) => declarationOf(child, mapValue)),
    }));
  return {
    name,
    functionName: `animation_${sanitizeRustIdentifier(name.toLowerCase())}`,
    frames,
  };
}

function unsupportedAtRule(element: Element): WarningLog {
  return {
    severity: "warning",
    type: "Unsupported at-rule is ignored",
    loc: locOf(element),
    context: { atRule: element.value },
  };
}

function locOf(element: Element): { line: number; column: number } {
  return { line: element.line, column: element.column };
}

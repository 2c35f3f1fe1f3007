/**
 * Validates a Style IR tree and rewrites it into the canonical form the emitter accepts.
 * Core concepts: selector composition with `&`, media condition canonicalization,
 * declaration cleanup and empty-block pruning.
 */
import selectorParser from "postcss-selector-parser";
import type {
  CombinatorKind,
  ComponentStyleSheet,
  Declaration,
  KeyframesDefinition,
  RuleTree,
  SelectorSpec,
} from "../ir.js";
import { StyleCompileError, type StyleErrorCode } from "./errors.js";

export interface NormalizedRule extends RuleTree {
  readonly selector: SelectorSpec;
  /** Selector text as emitted: `&`, `&:hover`, `& > .icon`, `@media (max-width: 768px)` */
  readonly selectorText: string;
  readonly declarations: readonly Declaration[];
  readonly children: readonly NormalizedRule[];
}

export interface NormalizedStyleSheet extends ComponentStyleSheet {
  readonly name: string;
  readonly root: NormalizedRule;
}

const normalizedSheets = new WeakSet<object>();

/**
 * True only for sheets produced by `normalizeStyleSheet`. The emitter refuses
 * anything else.
 */
export function isNormalizedStyleSheet(sheet: unknown): sheet is NormalizedStyleSheet {
  return typeof sheet === "object" && sheet !== null && normalizedSheets.has(sheet);
}

/**
 * Normalize one sheet. Throws a `StyleCompileError` attributed to the sheet on the
 * first invalid node. Normalizing an already-normalized sheet yields an equal sheet.
 */
export function normalizeStyleSheet(sheet: ComponentStyleSheet): NormalizedStyleSheet {
  const fail = (code: StyleErrorCode, detail: string, path: readonly string[]): never => {
    throw new StyleCompileError({ code, detail, sheet: sheet.name, path });
  };

  if (sheet.root.selector.kind !== "self") {
    fail("InvalidIR", `root rule must use the self selector, got "${sheet.root.selector.kind}"`, [
      "root",
    ]);
  }

  const visit = (
    node: RuleTree,
    selector: SelectorSpec,
    selectorText: string,
    path: readonly string[],
    depth: number,
  ): NormalizedRule | null => {
    const declarations = node.declarations.map((decl) => {
      const result = normalizeDeclaration(decl);
      return typeof result === "string" ? fail("MalformedDeclaration", result, path) : result;
    });

    const children: NormalizedRule[] = [];
    node.children.forEach((child, index) => {
      const childPath = [...path, `#${index}`];
      if (child.selector.kind === "mediaQuery" && depth > 0) {
        fail(
          "MisplacedMediaQuery",
          "media queries are only allowed directly under the root rule",
          childPath,
        );
      }
      const resolved = resolveSelector(child.selector);
      if (!resolved.ok) {
        fail(resolved.code, resolved.reason, childPath);
        return;
      }
      const normalized = visit(
        child,
        resolved.selector,
        resolved.text,
        [...path, resolved.text],
        depth + 1,
      );
      if (normalized) children.push(normalized);
    });

    if (depth > 0 && declarations.length === 0 && children.length === 0) {
      return null;
    }

    return Object.freeze({
      selector: Object.freeze({ ...selector }),
      selectorText,
      declarations: Object.freeze(declarations.map((d) => Object.freeze(d))),
      children: Object.freeze(children),
    });
  };

  const root = visit(sheet.root, { kind: "self" }, "&", ["root"], 0);
  if (!root) {
    // Unreachable: the root is never pruned.
    return fail("InvalidIR", "root rule was pruned", ["root"]);
  }

  const normalized: NormalizedStyleSheet = Object.freeze({ name: sheet.name, root });
  normalizedSheets.add(normalized);
  return normalized;
}

const KEYFRAMES_NAME = /^-?[_a-zA-Z][_a-zA-Z0-9-]*$/;
const KEYFRAME_SELECTOR = /^(from|to|\d+(\.\d+)?%)$/;

/**
 * Validate a keyframes definition: a CSS identifier as animation name, `from`/`to`/percentage
 * frame selectors (comma lists allowed) and well-formed declarations.
 */
export function normalizeKeyframes(keyframes: KeyframesDefinition): KeyframesDefinition {
  const fail = (code: StyleErrorCode, detail: string, path: readonly string[]): never => {
    throw new StyleCompileError({ code, detail, sheet: keyframes.functionName, path });
  };
  const root = `@keyframes ${keyframes.name}`;

  if (!KEYFRAMES_NAME.test(keyframes.name)) {
    fail("MalformedSelector", `invalid animation name "${keyframes.name}"`, [root]);
  }

  const frames = keyframes.frames.map((frame, index) => {
    const selector = frame.selector
      .split(",")
      .map((part) => part.trim())
      .join(", ");
    if (!selector) {
      fail("MissingSelector", "keyframe has no selector", [root, `#${index}`]);
    }
    const bad = selector.split(", ").find((part) => !KEYFRAME_SELECTOR.test(part));
    if (bad !== undefined) {
      fail("MalformedSelector", `"${bad}" is not from, to or a percentage`, [root, `#${index}`]);
    }
    const declarations = frame.declarations.map((decl) => {
      const result = normalizeDeclaration(decl);
      return typeof result === "string"
        ? fail("MalformedDeclaration", result, [root, selector])
        : result;
    });
    return { selector, declarations };
  });

  return Object.freeze({ name: keyframes.name, functionName: keyframes.functionName, frames });
}

// ────────────────────────────────────────────────────────────────────────────
// Selectors
// ────────────────────────────────────────────────────────────────────────────

type ResolvedSelector =
  | { ok: true; selector: SelectorSpec; text: string }
  | { ok: false; code: StyleErrorCode; reason: string };

const COMBINATOR_PREFIX: Record<CombinatorKind, string> = {
  descendant: "& ",
  child: "& > ",
  adjacent: "& + ",
  sibling: "& ~ ",
  compound: "&",
};

export function resolveSelector(spec: SelectorSpec): ResolvedSelector {
  switch (spec.kind) {
    case "self":
      return { ok: true, selector: { kind: "self" }, text: "&" };
    case "pseudoState": {
      const problem = checkPseudoName(spec.name);
      if (problem) return problem;
      return { ok: true, selector: { kind: "pseudoState", name: spec.name }, text: `&:${spec.name}` };
    }
    case "combinator": {
      const target = (spec.target ?? "").trim();
      if (!target) {
        return {
          ok: false,
          code: "MissingSelector",
          reason: `${spec.combinator} rule has no target selector`,
        };
      }
      const problem = checkCombinatorTarget(spec.combinator, target);
      if (problem) return { ok: false, code: "MalformedSelector", reason: problem };
      return {
        ok: true,
        selector: { kind: "combinator", combinator: spec.combinator, target },
        text: `${COMBINATOR_PREFIX[spec.combinator]}${target}`,
      };
    }
    case "mediaQuery": {
      const result = normalizeMediaCondition(spec.condition);
      if (!result.ok) return result;
      return {
        ok: true,
        selector: { kind: "mediaQuery", condition: result.condition },
        text: `@media ${result.condition}`,
      };
    }
  }
}

const PSEUDO_NAME = /^:?[a-zA-Z][a-zA-Z0-9-]*(\(.*\))?$/;

function checkPseudoName(name: string): ResolvedSelector | null {
  const malformed = (reason: string): ResolvedSelector => ({
    ok: false,
    code: "MalformedPseudoSelector",
    reason,
  });

  if (name === "") {
    return { ok: false, code: "MissingSelector", reason: "pseudo-state rule has no name" };
  }
  if (/^\s|\s$/.test(name)) {
    return malformed(`whitespace around pseudo-state name "&:${name}"`);
  }
  if (/[;{}]/.test(name)) {
    return malformed(`pseudo-state "&:${name}" contains ";", "{" or "}"`);
  }
  if (!PSEUDO_NAME.test(name)) {
    return malformed(`"&:${name}" is not a single pseudo-class or pseudo-element`);
  }

  try {
    const ast = selectorParser().astSync(`&:${name}`);
    const nodes = ast.nodes.length === 1 ? (ast.nodes[0]?.nodes ?? []) : [];
    if (nodes.length !== 2 || nodes[0]?.type !== "nesting" || nodes[1]?.type !== "pseudo") {
      return malformed(`"&:${name}" is not a single pseudo-class or pseudo-element`);
    }
  } catch (e) {
    return malformed(
      `"&:${name}" does not parse: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
  return null;
}

function checkCombinatorTarget(combinator: CombinatorKind, target: string): string | null {
  if (/[;{}]/.test(target)) {
    return `target selector "${target}" contains ";", "{" or "}"`;
  }
  let nodes: selectorParser.Node[];
  try {
    const ast = selectorParser().astSync(target);
    if (ast.nodes.length !== 1) {
      return `target "${target}" is a selector list; use one rule per selector`;
    }
    nodes = ast.nodes[0]?.nodes ?? [];
  } catch (e) {
    return `target "${target}" does not parse: ${e instanceof Error ? e.message : String(e)}`;
  }

  const first = nodes[0];
  const last = nodes[nodes.length - 1];
  if (!first || !last) {
    return `target "${target}" is empty`;
  }
  if (first.type === "combinator") {
    return `target "${target}" begins with a combinator`;
  }
  if (last.type === "combinator") {
    return `target "${target}" ends with a combinator`;
  }
  if (
    combinator === "compound" &&
    first.type !== "class" &&
    first.type !== "attribute" &&
    first.type !== "id" &&
    first.type !== "pseudo"
  ) {
    return `compound target "${target}" must start with a class, id, attribute or pseudo selector`;
  }
  return null;
}

// ────────────────────────────────────────────────────────────────────────────
// Media conditions
// ────────────────────────────────────────────────────────────────────────────

type MediaConditionResult =
  | { ok: true; condition: string }
  | { ok: false; code: StyleErrorCode; reason: string };

const MEDIA_KEYWORDS = new Set(["and", "or", "not", "only"]);

/**
 * Canonicalizes a media condition: strips a leading `@media`, collapses whitespace and
 * re-spaces each `(feature: value)`. The condition must start with a parenthesized
 * feature and every parenthesis must close inside the condition itself.
 * @example normalizeMediaCondition("@media (max-width:768px)") => "(max-width: 768px)"
 */
export function normalizeMediaCondition(raw: string): MediaConditionResult {
  const malformed = (reason: string): MediaConditionResult => ({
    ok: false,
    code: "MalformedMediaQuery",
    reason,
  });

  const stripped = raw
    .trim()
    .replace(/^@media\b/i, "")
    .replace(/\s+/g, " ")
    .trim();
  if (!stripped) {
    return { ok: false, code: "MissingSelector", reason: "media query has no condition" };
  }
  if (/[;{}]/.test(stripped)) {
    return malformed(`media condition "${stripped}" contains ";", "{" or "}"`);
  }
  if (!stripped.startsWith("(")) {
    return malformed(`media condition "${stripped}" must begin with a parenthesized feature`);
  }

  let out = "";
  let depth = 0;
  let groupStart = 0;
  for (let i = 0; i < stripped.length; i++) {
    const ch = stripped.charAt(i);
    if (ch === "(") {
      if (depth === 0) {
        groupStart = i;
        out += " ";
      }
      depth++;
      continue;
    }
    if (ch === ")") {
      depth--;
      if (depth < 0) {
        return malformed(`unbalanced parentheses in media condition "${stripped}"`);
      }
      if (depth === 0) {
        const feature = stripped.slice(groupStart + 1, i).trim();
        if (!feature) {
          return malformed(`empty media feature in "${stripped}"`);
        }
        const colon = feature.indexOf(":");
        if (colon === -1) {
          out += `(${feature}) `;
        } else {
          const name = feature.slice(0, colon).trim();
          const value = feature.slice(colon + 1).trim();
          if (!name || !value) {
            return malformed(`incomplete media feature "(${feature})" in "${stripped}"`);
          }
          out += `(${name}: ${value}) `;
        }
      }
      continue;
    }
    if (depth === 0) out += ch;
  }
  if (depth !== 0) {
    return malformed(`unterminated media feature in "${stripped}"`);
  }

  const condition = out
    .replace(/\s+/g, " ")
    .replace(/\s*,\s*/g, ", ")
    .trim();

  const outside = condition.replace(/\([^()]*(\([^()]*\)[^()]*)*\)/g, " ").split(/[\s,]+/);
  const stray = outside.find((word) => word !== "" && !MEDIA_KEYWORDS.has(word.toLowerCase()));
  if (stray !== undefined) {
    return malformed(`unexpected "${stray}" in media condition "${condition}"`);
  }
  if (/(\band|\bor|\bnot|\bonly|,)$/i.test(condition)) {
    return malformed(`media condition "${condition}" is truncated`);
  }
  return { ok: true, condition };
}

// ────────────────────────────────────────────────────────────────────────────
// Declarations
// ────────────────────────────────────────────────────────────────────────────

const PROPERTY_NAME = /^(--[A-Za-z0-9_-]+|-?[A-Za-z][A-Za-z0-9-]*)$/;

/** Returns the cleaned declaration, or the reason it cannot be emitted. */
export function normalizeDeclaration(decl: Declaration): Declaration | string {
  const property = decl.property.trim();
  if (!property) {
    return "declaration has an empty property name";
  }
  if (!PROPERTY_NAME.test(property)) {
    return `invalid property name "${property}"`;
  }
  const value = decl.value.trim().replace(/(\s*;)+$/, "").trim();
  if (!value) {
    return `empty value for "${property}"`;
  }
  const problem = findValueProblem(value);
  if (problem !== null) {
    return `value for "${property}" ${problem}`;
  }
  return { property, value };
}

/** Scans a value for text that would end or swallow the surrounding block. */
function findValueProblem(value: string): string | null {
  let quote: string | null = null;
  let depth = 0;
  for (let i = 0; i < value.length; i++) {
    const ch = value.charAt(i);
    if (quote) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === "/" && value.charAt(i + 1) === "*") return 'contains a "/*" comment opener';
    else if (ch === "(") depth++;
    else if (ch === ")") {
      if (depth === 0) return 'has an unmatched ")"';
      depth--;
    } else if (depth === 0 && (ch === ";" || ch === "{" || ch === "}")) {
      return 'contains ";", "{" or "}"';
    }
  }
  if (quote) return `has an unterminated ${quote} string`;
  if (depth > 0) return 'has an unclosed "("';
  return null;
}

/**
 * Re-parses emitted style text with stylis and compares it with the normalized IR.
 * Core concepts: flattened rules keyed by media scope and resolved selector.
 */
import { compile } from "stylis";
import type { Element } from "stylis";
import type { NormalizedRule, NormalizedStyleSheet } from "./normalize.js";

export type FlatRule = {
  /** Media condition without the `@media` keyword, `null` outside media blocks */
  scope: string | null;
  /** Selector with `&` resolved against the implicit root, whitespace-canonical */
  selector: string;
  /** `property:value` pairs with whitespace removed */
  declarations: string[];
};

export type RoundTripMismatch = {
  index: number;
  expected: FlatRule | null;
  actual: FlatRule | null;
};

/**
 * Returns every position where the rules stylis reads back from `text` differ from the
 * rules the sheet describes. An empty list means the text round-trips.
 */
export function verifyRoundTrip(sheet: NormalizedStyleSheet, text: string): RoundTripMismatch[] {
  const expected = flattenSheet(sheet);
  const actual = flattenStylis(compile(text));
  const mismatches: RoundTripMismatch[] = [];
  const count = Math.max(expected.length, actual.length);
  for (let i = 0; i < count; i++) {
    const e = expected[i] ?? null;
    const a = actual[i] ?? null;
    if (!e || !a || !sameFlatRule(e, a)) {
      mismatches.push({ index: i, expected: e, actual: a });
    }
  }
  return mismatches;
}

export function describeMismatch(mismatch: RoundTripMismatch): string {
  const show = (rule: FlatRule | null): string =>
    rule
      ? `${rule.scope ? `@media ${rule.scope} ` : ""}"${rule.selector}" { ${rule.declarations.join("; ")} }`
      : "nothing";
  return `rule #${mismatch.index}: expected ${show(mismatch.expected)}, parsed ${show(mismatch.actual)}`;
}

// -- IR side

export function flattenSheet(sheet: NormalizedStyleSheet): FlatRule[] {
  const rules: FlatRule[] = [];
  const { root } = sheet;

  if (root.declarations.length > 0) {
    rules.push({ scope: null, selector: "", declarations: flatDeclarations(root) });
  }

  const visit = (rule: NormalizedRule, parent: string, scope: string | null): void => {
    const selector = canonicalSelector(rule.selectorText.replaceAll("&", parent));
    rules.push({ scope, selector, declarations: flatDeclarations(rule) });
    for (const child of rule.children) visit(child, selector, scope);
  };

  for (const child of root.children) {
    if (child.selector.kind === "mediaQuery") {
      const scope = canonicalScope(child.selector.condition);
      if (child.declarations.length > 0) {
        rules.push({ scope, selector: "", declarations: flatDeclarations(child) });
      }
      for (const nested of child.children) visit(nested, "", scope);
    } else {
      visit(child, "", null);
    }
  }
  return rules;
}

function flatDeclarations(rule: NormalizedRule): string[] {
  return rule.declarations.map((d) => canonicalDeclaration(`${d.property}:${d.value}`));
}

// -- stylis side

function flattenStylis(elements: Element[]): FlatRule[] {
  const rules: FlatRule[] = [];

  const visit = (nodes: Element[], scope: string | null): void => {
    for (const node of nodes) {
      if (node.type === "rule") {
        rules.push({
          scope,
          selector: canonicalSelector(selectorOf(node)),
          declarations: declarationsOf(node),
        });
        continue;
      }
      if (node.type === "@media" && Array.isArray(node.children)) {
        visit(node.children, canonicalScope(String(node.value ?? "")));
      }
    }
  };

  visit(elements, null);
  return rules;
}

function selectorOf(node: Element): string {
  const props = Array.isArray(node.props) ? node.props : [node.props];
  return props.join(",");
}

function declarationsOf(node: Element): string[] {
  if (!Array.isArray(node.children)) return [];
  return node.children
    .filter((child) => child.type === "decl")
    .map((child) => canonicalDeclaration(String(child.value ?? "")));
}

// -- canonical forms

function canonicalSelector(selector: string): string {
  return selector
    .replaceAll("\f", "")
    .replace(/\s*([>+~,])\s*/g, "$1")
    .replace(/\s+/g, " ")
    .trim();
}

function canonicalScope(condition: string): string {
  return condition
    .replace(/^@media\b/i, "")
    .replace(/\s+/g, "")
    .trim();
}

function canonicalDeclaration(declaration: string): string {
  return declaration.replace(/\s+/g, "").replace(/;+$/, "");
}

function sameFlatRule(a: FlatRule, b: FlatRule): boolean {
  return (
    a.scope === b.scope &&
    a.selector === b.selector &&
    a.declarations.length === b.declarations.length &&
    a.declarations.every((d, i) => d === b.declarations[i])
  );
}

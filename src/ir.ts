/**
 * Style IR
 *
 * In-memory tree for one component's style sheet: a root declaration block plus
 * nested rules (pseudo-states, combinator selectors, media queries), each with an
 * ordered list of declarations. Builders never validate; empty or malformed
 * selectors are reported by `normalizeStyleSheet`.
 */

export type Declaration = {
  property: string;
  value: string;
};

export type CombinatorKind = "descendant" | "child" | "adjacent" | "sibling" | "compound";

export type SelectorSpec =
  | { kind: "self" }
  | { kind: "pseudoState"; name: string }
  | { kind: "combinator"; combinator: CombinatorKind; target: string | null }
  | { kind: "mediaQuery"; condition: string };

/**
 * Read-only view of a rule tree. Both builder trees and normalized trees satisfy it,
 * so a normalized tree can be normalized again.
 */
export interface RuleTree {
  readonly selector: SelectorSpec;
  readonly declarations: readonly Declaration[];
  readonly children: readonly RuleTree[];
}

export class RuleNode implements RuleTree {
  readonly selector: SelectorSpec;
  readonly declarations: Declaration[] = [];
  readonly children: RuleNode[] = [];

  constructor(selector: SelectorSpec = SELF) {
    this.selector = selector;
  }

  addDeclaration(property: string, value: string): this {
    this.declarations.push({ property, value });
    return this;
  }

  /** Appends every declaration of a `{ property: value }` record, in key order. */
  addDeclarations(declarations: Record<string, string>): this {
    for (const [property, value] of Object.entries(declarations)) {
      this.addDeclaration(property, value);
    }
    return this;
  }

  /** Appends a nested rule and returns it. */
  addChild(selector: SelectorSpec): RuleNode {
    const child = new RuleNode(selector);
    this.children.push(child);
    return child;
  }

  /**
   * Returns the existing child with an equal selector, or appends a new one.
   * Used by the CSS front ends so repeated rules merge into one block.
   */
  ensureChild(selector: SelectorSpec): RuleNode {
    const existing = this.children.find((c) => sameSelectorSpec(c.selector, selector));
    return existing ?? this.addChild(selector);
  }
}

export interface ComponentStyleSheet {
  /** Maps 1:1 to the generated function identifier */
  readonly name: string;
  readonly root: RuleTree;
}

export interface StyleSheetBuilder extends ComponentStyleSheet {
  readonly root: RuleNode;
}

export function createStyleSheet(name: string): StyleSheetBuilder {
  return { name, root: new RuleNode(SELF) };
}

export type KeyframeStep = {
  /** `from`, `to` or a percentage such as `50%` */
  selector: string;
  declarations: Declaration[];
};

export interface KeyframesDefinition {
  /** Animation name used in `@keyframes <name>` */
  readonly name: string;
  /** Generated function identifier, e.g. `animation_fade_in` */
  readonly functionName: string;
  readonly frames: readonly KeyframeStep[];
}

/** One generated Rust module (file) and the sheets it owns. */
export interface StyleModule {
  readonly name: string;
  readonly sheets: readonly ComponentStyleSheet[];
  readonly keyframes?: readonly KeyframesDefinition[];
}

// -- Selector spec builders

const SELF: SelectorSpec = { kind: "self" };

export function self(): SelectorSpec {
  return SELF;
}

export function pseudo(name: string): SelectorSpec {
  return { kind: "pseudoState", name };
}

export function descendant(target: string | null): SelectorSpec {
  return { kind: "combinator", combinator: "descendant", target };
}

export function child(target: string | null): SelectorSpec {
  return { kind: "combinator", combinator: "child", target };
}

export function adjacent(target: string | null): SelectorSpec {
  return { kind: "combinator", combinator: "adjacent", target };
}

export function sibling(target: string | null): SelectorSpec {
  return { kind: "combinator", combinator: "sibling", target };
}

export function compound(target: string | null): SelectorSpec {
  return { kind: "combinator", combinator: "compound", target };
}

export function media(condition: string): SelectorSpec {
  return { kind: "mediaQuery", condition };
}

export function sameSelectorSpec(a: SelectorSpec, b: SelectorSpec): boolean {
  switch (a.kind) {
    case "self":
      return b.kind === "self";
    case "pseudoState":
      return b.kind === "pseudoState" && a.name === b.name;
    case "combinator":
      return b.kind === "combinator" && a.combinator === b.combinator && a.target === b.target;
    case "mediaQuery":
      return b.kind === "mediaQuery" && a.condition === b.condition;
  }
}

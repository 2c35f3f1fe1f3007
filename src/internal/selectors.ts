/**
 * Parses selectors into Style IR selector specs and derives generated names from them.
 * Core concepts: nesting-relative chains, base-selector splitting and variant naming.
 */
import selectorParser from "postcss-selector-parser";
import {
  adjacent,
  child,
  compound,
  descendant,
  pseudo,
  self,
  sibling,
  type SelectorSpec,
} from "../ir.js";
import { sanitizeRustIdentifier } from "./rust-identifiers.js";

/**
 * Split a selector list on its top-level commas.
 * Commas inside `:is(a, b)` or attribute values are kept.
 */
export function splitSelectorList(selector: string): string[] {
  try {
    const ast = selectorParser().astSync(selector);
    return ast.nodes.map((node) => node.toString().trim()).filter(Boolean);
  } catch {
    return selector
      .split(",")
      .map((part) => part.trim())
      .filter(Boolean);
  }
}

/**
 * Parse one nesting-relative selector into the chain of specs that reaches it.
 *
 * @example parseNestedSelector("&:hover .icon") => [pseudo("hover"), descendant(".icon")]
 * @example parseNestedSelector("> li") => [child("li")]
 *
 * Text that cannot be parsed is kept verbatim in the spec it most resembles so that
 * normalization reports it against the right node.
 */
export function parseNestedSelector(selector: string): SelectorSpec[] {
  const text = selector.trim();
  if (text === "" || text === "&") {
    return [self()];
  }
  // "&: hover" parses as a pseudo with an empty name; keep the raw text instead
  if (/^&:\s/.test(text)) {
    return [pseudo(text.slice(2))];
  }

  let nodes: selectorParser.Node[];
  try {
    const ast = selectorParser().astSync(text);
    const first = ast.nodes[0];
    if (ast.nodes.length !== 1 || !first) {
      return [descendant(text)];
    }
    nodes = first.nodes;
  } catch {
    return text.startsWith("&:") ? [pseudo(text.slice(2))] : [descendant(text)];
  }

  const head = nodes[0];
  if (head?.type !== "nesting") {
    if (head?.type === "combinator") {
      return [combinatorSpec(head.value, joinNodes(nodes.slice(1)))];
    }
    return [descendant(text)];
  }

  const chain: SelectorSpec[] = [];
  let attached = "";
  const flush = (): void => {
    if (attached) {
      chain.push(compound(attached));
      attached = "";
    }
  };

  for (let i = 1; i < nodes.length; i++) {
    const node = nodes[i];
    if (!node || node.type === "comment") {
      continue;
    }
    if (node.type === "combinator") {
      flush();
      chain.push(combinatorSpec(node.value, joinNodes(nodes.slice(i + 1))));
      return chain;
    }
    if (node.type === "pseudo") {
      flush();
      chain.push(pseudo(node.toString().trim().slice(1)));
      continue;
    }
    attached += node.toString().trim();
  }
  flush();
  return chain.length > 0 ? chain : [self()];
}

function combinatorSpec(value: string, target: string): SelectorSpec {
  const targetOrNull = target === "" ? null : target;
  switch (value.trim()) {
    case ">":
      return child(targetOrNull);
    case "+":
      return adjacent(targetOrNull);
    case "~":
      return sibling(targetOrNull);
    default:
      return descendant(targetOrNull);
  }
}

function joinNodes(nodes: selectorParser.Node[]): string {
  return nodes
    .map((node) => node.toString())
    .join("")
    .trim();
}

/** A complete selector split into the simple selector it starts with and the rest. */
export type SplitSelector = {
  /** `.btn`, `#main`, `ul` or `:root` */
  base: string;
  /** The remainder rewritten relative to the base, e.g. `&:hover` or `& > .icon` */
  nested: string;
};

export type SplitSelectorFailure = {
  reason: "universal" | "no-base";
};

/**
 * Split a complete (non-nested) selector on its leading simple selector.
 * @example splitBaseSelector(".btn:hover") => { base: ".btn", nested: "&:hover" }
 */
export function splitBaseSelector(selector: string): SplitSelector | SplitSelectorFailure {
  let nodes: selectorParser.Node[];
  try {
    const first = selectorParser().astSync(selector.trim()).nodes[0];
    if (!first) {
      return { reason: "no-base" };
    }
    nodes = first.nodes.filter((node) => node.type !== "comment");
  } catch {
    return { reason: "no-base" };
  }

  const head = nodes[0];
  if (!head) {
    return { reason: "no-base" };
  }
  switch (head.type) {
    case "universal":
      return { reason: "universal" };
    case "class":
    case "id":
    case "tag":
      break;
    case "pseudo":
      if (head.value !== ":root") {
        return { reason: "no-base" };
      }
      break;
    default:
      return { reason: "no-base" };
  }

  const rest = nodes
    .slice(1)
    .map((node) => node.toString())
    .join("");
  return { base: head.toString().trim(), nested: `&${rest}`.trimEnd() };
}

export type VariantName = {
  base: string;
  variant: string | null;
};

const VARIANT_PATTERNS = [
  /^([a-zA-Z]+)[-_](primary|secondary|success|danger|warning|info|light|dark)/i,
  /^([a-zA-Z]+)[-_](small|sm|large|lg|xl|xs)/i,
  /^([a-zA-Z]+)[-_](outline|solid|ghost|link)/i,
  /^([a-zA-Z]+)[-_]([a-zA-Z]+)/i,
];

/**
 * Split a class name into its base and variant.
 * Only the first two words count, so `btn-outline-primary` is the `outline` variant of `btn`.
 */
export function splitVariantName(selector: string): VariantName {
  const clean = selector.replace(/^[.\s]+/, "");
  for (const pattern of VARIANT_PATTERNS) {
    const match = pattern.exec(clean);
    if (match?.[1] && match[2]) {
      return { base: match[1].toLowerCase(), variant: match[2].toLowerCase() };
    }
  }
  return { base: clean.toLowerCase(), variant: null };
}

/**
 * Generated function name for a base selector.
 * @example functionNameForSelector(".btn-secondary", true) => "btn_secondary"
 * @example functionNameForSelector(".btn-outline-primary", true) => "btn_outline"
 * @example functionNameForSelector(".btn-outline-primary", false) => "btn_outline_primary"
 */
export function functionNameForSelector(selector: string, extractVariants: boolean): string {
  let key = selector.replace(/^[.#:]+/, "");
  if (extractVariants) {
    const { base, variant } = splitVariantName(key);
    key = variant ? `${base}_${variant}` : base;
  }
  return sanitizeRustIdentifier(key.toLowerCase());
}

const COMPONENT_PREFIXES: ReadonlyArray<readonly [prefix: string, component: string]> = [
  ["btn", "button"],
  ["card", "card"],
  ["nav", "navbar"],
  ["modal", "modal"],
  ["form", "form"],
  ["input", "input"],
  ["table", "table"],
  ["alert", "alert"],
];

/**
 * Component (module) a base selector belongs to.
 * @example componentNameForSelector(".btn-primary") => "button"
 * @example componentNameForSelector(".flex-center") => "flex"
 */
export function componentNameForSelector(selector: string): string {
  const clean = selector.replace(/^[.#:\s]+/, "");
  for (const [prefix, component] of COMPONENT_PREFIXES) {
    if (clean.startsWith(prefix)) {
      return component;
    }
  }
  const firstWord = clean.split(/[-_\s]/)[0]?.toLowerCase() ?? "";
  return firstWord ? sanitizeRustIdentifier(firstWord) : "component";
}

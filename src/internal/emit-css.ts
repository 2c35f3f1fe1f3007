/**
 * Serializes normalized sheets into the nested CSS text embedded in generated functions.
 * Core concepts: root block first, nested blocks in insertion order, media blocks at the top level.
 */
import type { Declaration, KeyframesDefinition } from "../ir.js";
import { StyleCompileError } from "./errors.js";
import {
  isNormalizedStyleSheet,
  type NormalizedRule,
  type NormalizedStyleSheet,
} from "./normalize.js";

export interface EmitOptions {
  /**
   * One indentation level
   * @default "    "
   */
  indent?: string;
}

export interface EmittedStyleSheet {
  name: string;
  text: string;
}

/**
 * Emit a sheet produced by `normalizeStyleSheet`. Any other tree is rejected with
 * `InvalidIR`; there is no best-effort serialization.
 */
export function emitStyleSheet(
  sheet: NormalizedStyleSheet,
  options: EmitOptions = {},
): EmittedStyleSheet {
  const candidate: unknown = sheet;
  if (!isNormalizedStyleSheet(candidate)) {
    throw new StyleCompileError({
      code: "InvalidIR",
      detail: "emitStyleSheet() requires a sheet returned by normalizeStyleSheet()",
      sheet: sheetNameOf(candidate),
    });
  }

  const indent = options.indent ?? DEFAULT_INDENT;
  const lines: string[] = [];
  const { root } = sheet;

  if (root.declarations.length > 0) {
    lines.push("{");
    pushDeclarations(lines, root.declarations, indent);
    lines.push("}");
  }

  for (const child of root.children) {
    if (child.selector.kind === "mediaQuery") {
      pushMediaBlock(lines, child, indent);
    } else {
      pushRule(lines, child, indent, 0);
    }
  }

  return { name: sheet.name, text: lines.join("\n") };
}

/** Emit a `@keyframes` block; frame selectors and declarations are taken as given. */
export function emitKeyframes(keyframes: KeyframesDefinition, options: EmitOptions = {}): string {
  const indent = options.indent ?? DEFAULT_INDENT;
  const lines = [`@keyframes ${keyframes.name} {`];
  for (const frame of keyframes.frames) {
    lines.push(`${indent}${frame.selector} {`);
    pushDeclarations(lines, frame.declarations, indent, 2);
    lines.push(`${indent}}`);
  }
  lines.push("}");
  return lines.join("\n");
}

const DEFAULT_INDENT = "    ";

function sheetNameOf(value: unknown): string | null {
  if (typeof value !== "object" || value === null || !("name" in value)) {
    return null;
  }
  return typeof value.name === "string" ? value.name : null;
}

function pushRule(lines: string[], rule: NormalizedRule, indent: string, level: number): void {
  const pad = indent.repeat(level);
  lines.push(`${pad}${rule.selectorText} {`);
  pushDeclarations(lines, rule.declarations, indent, level + 1);
  for (const child of rule.children) {
    pushRule(lines, child, indent, level + 1);
  }
  lines.push(`${pad}}`);
}

function pushMediaBlock(lines: string[], rule: NormalizedRule, indent: string): void {
  lines.push(`${rule.selectorText} {`);
  if (rule.declarations.length > 0) {
    lines.push(`${indent}& {`);
    pushDeclarations(lines, rule.declarations, indent, 2);
    lines.push(`${indent}}`);
  }
  for (const child of rule.children) {
    pushRule(lines, child, indent, 1);
  }
  lines.push("}");
}

function pushDeclarations(
  lines: string[],
  declarations: readonly Declaration[],
  indent: string,
  level = 1,
): void {
  const pad = indent.repeat(level);
  for (const { property, value } of declarations) {
    lines.push(`${pad}${property}: ${value};`);
  }
}

/**
 * Renders Rust source around emitted style text.
 * Core concepts: raw string delimiters, per-component module files and the `mod.rs` re-export surface.
 */

export interface RustTarget {
  /**
   * Crate the style type is imported from
   * @default "stylist"
   */
  crate: string;
  /**
   * Type whose `new(&str)` constructor parses the style text
   * @default "Style"
   */
  styleType: string;
}

export const DEFAULT_RUST_TARGET: RustTarget = { crate: "stylist", styleType: "Style" };

const BODY_INDENT = "        ";

/**
 * Renders `pub fn <name>() -> Style` returning `Style::new(r#"…"#)`.
 */
export function renderStyleFunction(
  name: string,
  text: string,
  target: RustTarget = DEFAULT_RUST_TARGET,
): string {
  const hashes = "#".repeat(rawStringHashCount(text));
  const body = text
    .split("\n")
    .map((line) => (line.trim() ? `${BODY_INDENT}${line}` : ""))
    .join("\n");

  return [
    `/// ${humanize(name)} styles`,
    `pub fn ${name}() -> ${target.styleType} {`,
    `    ${target.styleType}::new(`,
    `        r${hashes}"`,
    body,
    `    "${hashes},`,
    "    )",
    `    .expect("Failed to create ${name} styles")`,
    "}",
  ].join("\n");
}

/**
 * Smallest number of `#` for which `"` followed by that many `#` never occurs in `text`.
 * @example rawStringHashCount('content: "#";') => 2
 */
export function rawStringHashCount(text: string): number {
  let count = 1;
  while (text.includes(`"${"#".repeat(count)}`)) {
    count++;
  }
  return count;
}

/** One component module: a doc header, the style type import and its functions. */
export function renderModuleFile(
  moduleName: string,
  functions: readonly string[],
  target: RustTarget = DEFAULT_RUST_TARGET,
): string {
  return renderFile(`${humanize(moduleName)} component styles`, functions, target);
}

/** Every function in one file, used by the single-file layout. */
export function renderSingleFile(
  functions: readonly string[],
  target: RustTarget = DEFAULT_RUST_TARGET,
): string {
  return renderFile("Generated CSS styles", functions, target);
}

/** `mod.rs`: declares each module, then glob re-exports all of them. */
export function renderModFile(moduleNames: readonly string[]): string {
  const sorted = [...moduleNames].sort();
  const lines = ["//! Style modules", ""];
  for (const name of sorted) lines.push(`pub mod ${name};`);
  lines.push("", "// Re-export all component styles");
  for (const name of sorted) lines.push(`pub use ${name}::*;`);
  return lines.join("\n") + "\n";
}

function renderFile(title: string, functions: readonly string[], target: RustTarget): string {
  const header = `//! ${title}\n\nuse ${target.crate}::${target.styleType};\n`;
  if (functions.length === 0) {
    return header;
  }
  return `${header}\n${functions.join("\n\n")}\n`;
}

/**
 * @example humanize("button_secondary") => "Button Secondary"
 */
export function humanize(identifier: string): string {
  return identifier
    .split("_")
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

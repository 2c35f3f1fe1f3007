/**
 * Layout utilities added by `includeUtilities`.
 */
import { createStyleSheet, type ComponentStyleSheet } from "../ir.js";

const UTILITIES: ReadonlyArray<readonly [name: string, declarations: Record<string, string>]> = [
  ["flex_center", { display: "flex", "align-items": "center", "justify-content": "center" }],
  ["flex_column", { display: "flex", "flex-direction": "column" }],
  ["flex_row", { display: "flex", "flex-direction": "row" }],
  [
    "absolute_center",
    { position: "absolute", top: "50%", left: "50%", transform: "translate(-50%, -50%)" },
  ],
  ["full_width", { width: "100%" }],
  ["full_height", { height: "100%" }],
  ["hidden", { display: "none" }],
  ["visible", { display: "block" }],
];

/**
 * Utility sheets, leaving out any name in `taken`.
 * `mapValue` rewrites each value the same way stylesheet values are rewritten.
 */
export function createUtilitySheets(
  taken: ReadonlySet<string> = new Set(),
  mapValue: (property: string, value: string) => string = (_property, value) => value,
): ComponentStyleSheet[] {
  return UTILITIES.filter(([name]) => !taken.has(name)).map(([name, declarations]) => {
    const sheet = createStyleSheet(name);
    for (const [property, value] of Object.entries(declarations)) {
      sheet.root.addDeclaration(property, mapValue(property, value));
    }
    return sheet;
  });
}

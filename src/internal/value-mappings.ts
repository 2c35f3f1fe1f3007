/**
 * Maps literal CSS values to design-token references (`#007bff` → `var(--color-primary)`).
 * Core concepts: per-category tables selected by property name, custom tables merged over the defaults.
 */
import defaultTables from "./value-mappings.json" with { type: "json" };
import { describeValue } from "./public-api-validation.js";

/** Category name → literal value → replacement. */
export type MappingTables = Record<string, Record<string, string>>;

export const DEFAULT_MAPPINGS: Readonly<MappingTables> = defaultTables;

/**
 * Default tables with `custom` merged over them, category by category.
 * Unknown categories are added as they are.
 */
export function mergeMappings(custom: MappingTables | undefined): MappingTables {
  return overlayMappings(DEFAULT_MAPPINGS, custom);
}

/** Copy of `base` with the entries of `overlay` replacing or adding to them. */
export function overlayMappings(
  base: Readonly<MappingTables>,
  overlay: MappingTables | undefined,
): MappingTables {
  const merged: MappingTables = {};
  for (const [category, values] of Object.entries(base)) {
    merged[category] = { ...values };
  }
  for (const [category, values] of Object.entries(overlay ?? {})) {
    merged[category] = { ...merged[category], ...values };
  }
  return merged;
}

/**
 * Table that applies to a property, by keyword, first match wins.
 * @example mappingCategoryFor("background-color") => "colors"
 * @example mappingCategoryFor("max-width") => "breakpoints"
 */
export function mappingCategoryFor(property: string): string | null {
  const name = property.toLowerCase();
  if (name.includes("color") || name.includes("background")) return "colors";
  if (["padding", "margin", "gap", "spacing"].some((k) => name.includes(k))) return "spacing";
  if (name.includes("border-radius")) return "border_radius";
  if (name.includes("font-size")) return "font_sizes";
  if (name.includes("font-weight")) return "font_weights";
  if (name.includes("shadow")) return "shadows";
  if (name.includes("transition")) return "transitions";
  if (name.includes("width")) return "breakpoints";
  return null;
}

/**
 * Replacement for a whole declaration value, or the trimmed value when no table has one.
 * Properties outside every category are looked up in all tables.
 */
export function mapValue(tables: MappingTables, property: string, value: string): string {
  const trimmed = value.trim();
  const category = mappingCategoryFor(property);
  if (category !== null && Object.hasOwn(tables, category)) {
    return lookup(tables[category], trimmed) ?? trimmed;
  }
  for (const table of Object.values(tables)) {
    const mapped = lookup(table, trimmed);
    if (mapped !== undefined) {
      return mapped;
    }
  }
  return trimmed;
}

/** Own entries only, so names such as `constructor` never hit `Object.prototype`. */
function lookup(table: Record<string, string> | undefined, key: string): string | undefined {
  return table !== undefined && Object.hasOwn(table, key) ? table[key] : undefined;
}

/**
 * Validates parsed JSON as mapping tables.
 * @throws Error naming the first entry that is not a string-to-string table
 */
export function assertMappingTables(value: unknown, source: string): MappingTables {
  if (!isPlainObject(value)) {
    throw new Error(
      [
        `Value mappings in ${source} must be an object of category tables.`,
        `Received: ${describeValue(value)}`,
      ].join("\n"),
    );
  }
  const tables: MappingTables = {};
  for (const [category, table] of Object.entries(value)) {
    if (!isPlainObject(table)) {
      throw new Error(
        [
          `Value mappings in ${source}: category "${category}" must be an object of string values.`,
          `Received: ${describeValue(table)}`,
        ].join("\n"),
      );
    }
    const entries: Record<string, string> = {};
    for (const [literal, replacement] of Object.entries(table)) {
      if (typeof replacement !== "string") {
        throw new Error(
          [
            `Value mappings in ${source}: "${category}.${literal}" must be a string.`,
            `Received: ${describeValue(replacement)}`,
          ].join("\n"),
        );
      }
      entries[literal] = replacement;
    }
    tables[category] = entries;
  }
  return tables;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

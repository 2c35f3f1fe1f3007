import type { ConvertOptions } from "../config.js";

export function describeValue(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (value === undefined) {
    return "undefined";
  }
  if (Array.isArray(value)) {
    return `Array(${value.length})`;
  }
  if (typeof value === "string") {
    // Keep strings readable while still showing quotes.
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (typeof value === "symbol") {
    return value.description ? `Symbol(${value.description})` : "Symbol()";
  }
  if (typeof value === "function") {
    return "[Function]";
  }
  if (typeof value === "object") {
    const constructor: unknown = value.constructor;
    const ctor =
      typeof constructor === "function" && constructor.name ? constructor.name : "Object";
    const keys = Object.keys(value);
    const preview = keys.slice(0, 5).join(", ");
    const suffix = keys.length > 5 ? ", ..." : "";
    return keys.length ? `${ctor} { ${preview}${suffix} }` : ctor;
  }
  return "[Unknown]";
}

const BOOLEAN_OPTIONS = [
  "groupByComponent",
  "extractVariants",
  "includeUtilities",
  "applyMappings",
  "verifyOutput",
] as const;

const KNOWN_OPTIONS = new Set<string>([
  ...BOOLEAN_OPTIONS,
  "mappings",
  "mappingsFile",
  "target",
  "indent",
]);

export function assertValidOptions(
  candidate: unknown,
  where: string,
): asserts candidate is ConvertOptions {
  if (!isRecord(candidate)) {
    throw new Error(
      [
        `${where}: expected an options object.`,
        `Received: ${describeValue(candidate)}`,
        "",
        "Options shape:",
        "  {",
        "    groupByComponent?: boolean,",
        "    extractVariants?: boolean,",
        "    includeUtilities?: boolean,",
        "    applyMappings?: boolean,",
        "    mappings?: { [category]: { [value]: replacement } },",
        "    mappingsFile?: string,",
        '    target?: { crate?: string, styleType?: string },',
        "    indent?: string,",
        "    verifyOutput?: boolean",
        "  }",
      ].join("\n"),
    );
  }

  const unknownKeys = Object.keys(candidate).filter((key) => !KNOWN_OPTIONS.has(key));
  if (unknownKeys.length > 0) {
    throw new Error(
      [
        `${where}: unknown option(s) ${unknownKeys.map((k) => `"${k}"`).join(", ")}.`,
        `Known options: ${[...KNOWN_OPTIONS].join(", ")}`,
      ].join("\n"),
    );
  }

  for (const key of BOOLEAN_OPTIONS) {
    const value = candidate[key];
    if (value !== undefined && typeof value !== "boolean") {
      throw new Error(
        [`${where}: ${key} must be a boolean.`, `Received: ${key}=${describeValue(value)}`].join(
          "\n",
        ),
      );
    }
  }

  const { mappings, mappingsFile, target, indent } = candidate;
  if (mappings !== undefined && !isRecord(mappings)) {
    throw new Error(
      [
        `${where}: mappings must be an object of category tables.`,
        `Received: mappings=${describeValue(mappings)}`,
        "",
        "Expected shape:",
        '  { colors: { "#007bff": "var(--color-primary)" } }',
      ].join("\n"),
    );
  }

  if (mappingsFile !== undefined && (typeof mappingsFile !== "string" || !mappingsFile.trim())) {
    throw new Error(
      [
        `${where}: mappingsFile must be a non-empty string.`,
        `Received: mappingsFile=${describeValue(mappingsFile)}`,
      ].join("\n"),
    );
  }

  if (target !== undefined) {
    if (!isRecord(target)) {
      throw new Error(
        [
          `${where}: target must be an object.`,
          `Received: target=${describeValue(target)}`,
          "",
          "Expected shape:",
          '  { crate: "stylist", styleType: "Style" }',
        ].join("\n"),
      );
    }
    for (const key of ["crate", "styleType"] as const) {
      const value = target[key];
      if (
        value !== undefined &&
        (typeof value !== "string" || !/^[A-Za-z_][A-Za-z0-9_:]*$/.test(value))
      ) {
        throw new Error(
          [
            `${where}: target.${key} must be a Rust path such as "stylist" or "Style".`,
            `Received: ${key}=${describeValue(value)}`,
          ].join("\n"),
        );
      }
    }
  }

  if (indent !== undefined && (typeof indent !== "string" || !/^[ \t]+$/.test(indent))) {
    throw new Error(
      [
        `${where}: indent must be a non-empty string of spaces or tabs.`,
        `Received: indent=${describeValue(indent)}`,
      ].join("\n"),
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

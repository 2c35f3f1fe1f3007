/**
 * Converter options: defaults, validation and JSON config files.
 */
import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import type { WarningLog } from "./internal/logger.js";
import { assertValidOptions, describeValue } from "./internal/public-api-validation.js";
import { DEFAULT_RUST_TARGET, type RustTarget } from "./internal/rust-codegen.js";
import {
  assertMappingTables,
  mergeMappings,
  type MappingTables,
} from "./internal/value-mappings.js";

export interface ConvertOptions {
  /**
   * Write one Rust module per component (`button.rs`, `card.rs`, …) plus `mod.rs`,
   * instead of a single file
   * @default false
   */
  groupByComponent?: boolean;
  /**
   * Name functions by base and variant, so `.btn-outline` and `.btn-outline-primary`
   * share `btn_outline`
   * @default true
   */
  extractVariants?: boolean;
  /**
   * Add `flex_center`, `hidden` and the other utility functions
   * @default false
   */
  includeUtilities?: boolean;
  /**
   * Replace literal values with the design-token references of the mapping tables
   * @default true
   */
  applyMappings?: boolean;
  /** Tables merged over the default value mappings */
  mappings?: MappingTables;
  /**
   * JSON file of mapping tables. Read by `runConvert` and the CLI, relative to the
   * config file that names it or to the working directory.
   */
  mappingsFile?: string;
  /** Crate and type the generated functions return */
  target?: Partial<RustTarget>;
  /**
   * Indentation of the emitted style text
   * @default "    "
   */
  indent?: string;
  /**
   * Re-parse every emitted style text and fail sheets that do not round-trip
   * @default false
   */
  verifyOutput?: boolean;
}

export interface ResolvedConvertOptions {
  groupByComponent: boolean;
  extractVariants: boolean;
  includeUtilities: boolean;
  applyMappings: boolean;
  /** Default tables with the custom ones merged over them */
  mappings: MappingTables;
  target: RustTarget;
  indent: string;
  verifyOutput: boolean;
}

export type OptionDescription = {
  name: keyof ConvertOptions;
  description: string;
  default: boolean;
};

/** Boolean switches, as listed by `css-to-stylist options`. */
export const CONVERSION_OPTIONS: readonly OptionDescription[] = [
  {
    name: "groupByComponent",
    description: "Group CSS rules by component and write one module per component",
    default: false,
  },
  {
    name: "extractVariants",
    description: "Extract style variants (e.g. btn-primary, btn-secondary)",
    default: true,
  },
  {
    name: "includeUtilities",
    description: "Include common utility functions",
    default: false,
  },
  {
    name: "applyMappings",
    description: "Apply value mappings to CSS variables",
    default: true,
  },
  {
    name: "verifyOutput",
    description: "Re-parse the emitted style text and reject sheets that do not round-trip",
    default: false,
  },
];

/**
 * Validates options and returns them unchanged, for typed config modules.
 *
 * @example
 * ```ts
 * export default defineOptions({ groupByComponent: true, target: { crate: "stylist" } });
 * ```
 */
export function defineOptions(options: ConvertOptions): ConvertOptions {
  assertValidOptions(options, "defineOptions(options)");
  if (options.mappings !== undefined) {
    assertMappingTables(options.mappings, "defineOptions(options).mappings");
  }
  return options;
}

/**
 * Fills defaults and merges the mapping tables.
 * A `mappingsFile` must have been loaded (see `loadMappingsFile`) before this point.
 */
export function resolveOptions(options: ConvertOptions = {}): ResolvedConvertOptions {
  assertValidOptions(options, "resolveOptions(options)");
  if (options.mappingsFile !== undefined) {
    throw new Error(
      [
        "resolveOptions(options): mappingsFile is only read by runConvert and the CLI.",
        `Received: mappingsFile=${describeValue(options.mappingsFile)}`,
        "Load the file with loadMappingsFile(path) and pass the tables as `mappings`.",
      ].join("\n"),
    );
  }
  const mappings =
    options.mappings === undefined
      ? undefined
      : assertMappingTables(options.mappings, "resolveOptions(options).mappings");

  return {
    groupByComponent: options.groupByComponent ?? false,
    extractVariants: options.extractVariants ?? true,
    includeUtilities: options.includeUtilities ?? false,
    applyMappings: options.applyMappings ?? true,
    mappings: mergeMappings(mappings),
    target: { ...DEFAULT_RUST_TARGET, ...options.target },
    indent: options.indent ?? "    ",
    verifyOutput: options.verifyOutput ?? false,
  };
}

export type LoadedMappings = {
  mappings: MappingTables | undefined;
  warnings: WarningLog[];
};

/**
 * Reads a JSON mappings file. A missing or unparseable file is a warning and
 * conversion continues with the default tables; a file with the wrong shape throws.
 */
export async function loadMappingsFile(path: string): Promise<LoadedMappings> {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(path, "utf-8"));
  } catch (e) {
    return {
      mappings: undefined,
      warnings: [
        {
          severity: "warning",
          type: "Custom value mappings could not be loaded",
          loc: null,
          context: { path, reason: e instanceof Error ? e.message : String(e) },
        },
      ],
    };
  }
  return { mappings: assertMappingTables(json, path), warnings: [] };
}

/**
 * Reads options from a JSON config file. `mappingsFile` is resolved against the
 * config file's directory.
 */
export async function loadConfigFile(path: string): Promise<ConvertOptions> {
  const source = await readFile(path, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(source);
  } catch (e) {
    throw new Error(
      [
        `Config file ${path} is not valid JSON.`,
        `Reason: ${e instanceof Error ? e.message : String(e)}`,
      ].join("\n"),
    );
  }
  assertValidOptions(json, `Config file ${path}`);
  if (json.mappings !== undefined) {
    assertMappingTables(json.mappings, path);
  }
  return json.mappingsFile === undefined
    ? json
    : { ...json, mappingsFile: resolve(dirname(path), json.mappingsFile) };
}

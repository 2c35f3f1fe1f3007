/**
 * Compiles every sheet of every module and composes the generated Rust files.
 * Core concepts: per-sheet error isolation, serialized name registration, output layouts.
 */
import type { ComponentStyleSheet, KeyframesDefinition, StyleModule } from "../ir.js";
import { emitKeyframes, emitStyleSheet, type EmitOptions } from "./emit-css.js";
import { StyleCompileError } from "./errors.js";
import { normalizeKeyframes, normalizeStyleSheet } from "./normalize.js";
import { describeMismatch, verifyRoundTrip } from "./round-trip.js";
import {
  DEFAULT_RUST_TARGET,
  renderModFile,
  renderModuleFile,
  renderSingleFile,
  renderStyleFunction,
  type RustTarget,
} from "./rust-codegen.js";
import { isValidRustIdentifier } from "./rust-identifiers.js";

export type OutputLayout = "modules" | "single-file";

export interface AggregateOptions extends EmitOptions {
  /**
   * `modules`: one `<module>.rs` per module plus `mod.rs`.
   * `single-file`: every function in one file.
   * @default "modules"
   */
  layout?: OutputLayout;
  /**
   * File name used by the single-file layout
   * @default "styles.rs"
   */
  singleFileName?: string;
  target?: RustTarget;
  /**
   * Re-parse every emitted text and fail the sheet when it does not round-trip
   * @default false
   */
  verifyOutput?: boolean;
}

export interface CompiledFunction {
  /** Generated function identifier */
  name: string;
  /** Module the function belongs to */
  module: string;
  /** Emitted style text */
  text: string;
  /** Rendered Rust function */
  source: string;
}

export interface GeneratedFile {
  /** Path relative to the output directory */
  path: string;
  contents: string;
}

export interface AggregateResult {
  /** Empty when an aggregation-level error (name collision) aborted the module */
  files: GeneratedFile[];
  functions: CompiledFunction[];
  /** Every error found, per-sheet and aggregation-level */
  errors: StyleCompileError[];
}

/**
 * Compile and aggregate. Sheets compile independently; a failing sheet is left out and
 * reported, the others are still generated. Duplicate function or module names abort
 * the whole output.
 */
export function aggregateModules(
  modules: readonly StyleModule[],
  options: AggregateOptions = {},
): AggregateResult {
  const layout = options.layout ?? "modules";
  const target = options.target ?? DEFAULT_RUST_TARGET;

  const collisions = findNameCollisions(modules, layout);
  const errors: StyleCompileError[] = [];

  const compiledByModule = new Map<string, CompiledFunction[]>();
  for (const module of modules) {
    if (layout === "modules" && !isValidRustIdentifier(module.name)) {
      errors.push(
        new StyleCompileError({
          code: "InvalidIdentifier",
          detail: `module name "${module.name}" is not a valid Rust identifier`,
        }),
      );
      continue;
    }
    const compiled = compiledByModule.get(module.name) ?? [];
    compiledByModule.set(module.name, compiled);

    for (const sheet of module.sheets) {
      const result = capture(() => compileSheet(sheet, module.name, target, options));
      if (result instanceof StyleCompileError) errors.push(result);
      else compiled.push(result);
    }
    for (const keyframes of module.keyframes ?? []) {
      const result = capture(() => compileKeyframes(keyframes, module.name, target, options));
      if (result instanceof StyleCompileError) errors.push(result);
      else compiled.push(result);
    }
  }

  const functions = [...compiledByModule.values()].flat();
  if (collisions.length > 0) {
    return { files: [], functions, errors: [...collisions, ...errors] };
  }

  const files: GeneratedFile[] = [];
  if (layout === "single-file") {
    files.push({
      path: options.singleFileName ?? "styles.rs",
      contents: renderSingleFile(
        functions.map((f) => f.source),
        target,
      ),
    });
  } else {
    for (const [moduleName, compiled] of compiledByModule) {
      files.push({
        path: `${moduleName}.rs`,
        contents: renderModuleFile(
          moduleName,
          compiled.map((f) => f.source),
          target,
        ),
      });
    }
    files.push({ path: "mod.rs", contents: renderModFile([...compiledByModule.keys()]) });
  }

  return { files, functions, errors };
}

/** Normalize, emit and render one sheet. */
export function compileSheet(
  sheet: ComponentStyleSheet,
  moduleName: string,
  target: RustTarget = DEFAULT_RUST_TARGET,
  options: EmitOptions & { verifyOutput?: boolean } = {},
): CompiledFunction {
  assertIdentifier(sheet.name);
  const normalized = normalizeStyleSheet(sheet);
  const { text } = emitStyleSheet(normalized, options);

  if (options.verifyOutput) {
    const mismatches = verifyRoundTrip(normalized, text);
    if (mismatches.length > 0) {
      throw new StyleCompileError({
        code: "InvalidIR",
        detail: [
          "emitted text does not parse back to the same rules",
          ...mismatches.map((m) => `  ${describeMismatch(m)}`),
        ].join("\n"),
        sheet: sheet.name,
      });
    }
  }

  return {
    name: sheet.name,
    module: moduleName,
    text,
    source: renderStyleFunction(sheet.name, text, target),
  };
}

export function compileKeyframes(
  keyframes: KeyframesDefinition,
  moduleName: string,
  target: RustTarget = DEFAULT_RUST_TARGET,
  options: EmitOptions = {},
): CompiledFunction {
  assertIdentifier(keyframes.functionName);
  const text = emitKeyframes(normalizeKeyframes(keyframes), options);
  return {
    name: keyframes.functionName,
    module: moduleName,
    text,
    source: renderStyleFunction(keyframes.functionName, text, target),
  };
}

function assertIdentifier(name: string): void {
  if (!isValidRustIdentifier(name)) {
    throw new StyleCompileError({
      code: "InvalidIdentifier",
      detail: `"${name}" is not a valid Rust function name`,
      sheet: name,
    });
  }
}

/**
 * Registers every generated name in one pass. Functions share a namespace across
 * modules because `mod.rs` glob re-exports all of them; module names share another.
 */
function findNameCollisions(
  modules: readonly StyleModule[],
  layout: OutputLayout,
): StyleCompileError[] {
  const collisions: StyleCompileError[] = [];
  const functionOwners = new Map<string, string>();
  const moduleNames = new Set<string>();

  for (const module of modules) {
    if (layout === "modules") {
      if (moduleNames.has(module.name)) {
        collisions.push(
          new StyleCompileError({
            code: "NameCollision",
            detail: `module "${module.name}" is defined more than once`,
          }),
        );
      }
      moduleNames.add(module.name);
    }

    const names = [
      ...module.sheets.map((s) => s.name),
      ...(module.keyframes ?? []).map((k) => k.functionName),
    ];
    for (const name of names) {
      const owner = functionOwners.get(name);
      if (owner !== undefined) {
        collisions.push(
          new StyleCompileError({
            code: "NameCollision",
            detail:
              owner === module.name
                ? `"${name}" is defined more than once in module "${module.name}"`
                : `"${name}" is defined in both "${owner}" and "${module.name}"`,
            sheet: name,
          }),
        );
        continue;
      }
      functionOwners.set(name, module.name);
    }
  }
  return collisions;
}

function capture<T>(fn: () => T): T | StyleCompileError {
  try {
    return fn();
  } catch (e) {
    if (e instanceof StyleCompileError) return e;
    throw e;
  }
}
